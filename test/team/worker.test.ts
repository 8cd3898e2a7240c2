import { describe, expect, it } from "vitest";
import { BackendRejectedError, BackendUnavailableError, WorkerBusyError } from "../../src/errors.js";
import { Worker } from "../../src/team/worker.js";
import { makeTask, member, scriptedGenerator } from "./helpers.js";

const sales = member("sales", { name: "Mike", role: "Sales Consultant", capability: "Helps buyers." });

describe("Worker", () => {
  it("builds the context from name, role and capability", () => {
    const worker = new Worker(1, sales, scriptedGenerator(() => "ok"));
    const req = worker.buildRequest(makeTask());
    expect(req.context).toBe("You are Mike, a Sales Consultant. Helps buyers.");
    expect(req.prompt).toBe("Find a hatchback under 15k");
    expect(req.model).toBeUndefined();
    expect(req.format).toBeUndefined();
  });

  it("adds task context, priority, tools, model and format", () => {
    const worker = new Worker(1, { ...sales, model: "mistral" }, scriptedGenerator(() => "ok"));
    const req = worker.buildRequest(
      makeTask({
        priority: 4,
        context: { budget: "15k", trade_in: "2012 sedan" },
        tools: ["inventory", "loan-calculator"],
        format: "json",
      }),
    );
    expect(req.context).toBe(
      "You are Mike, a Sales Consultant. Helps buyers.\n\nAdditional Context:\n- budget: 15k\n- trade_in: 2012 sedan",
    );
    expect(req.prompt).toBe(
      "[HIGH PRIORITY] Find a hatchback under 15k\n\nAvailable tools: inventory, loan-calculator",
    );
    expect(req.model).toBe("mistral");
    expect(req.format).toBe("json");
  });

  it("lists the member's own tools and knowledge before the task context", () => {
    const worker = new Worker(
      1,
      { ...sales, tools: ["inventory_search", "price_calculator"], knowledge: { price_ranges: { budget: "<$15k" } } },
      scriptedGenerator(() => "ok"),
    );
    const req = worker.buildRequest(makeTask({ context: { budget: "15k" } }));
    expect(req.context).toBe(
      [
        "You are Mike, a Sales Consultant. Helps buyers.",
        "",
        "Your tools: inventory_search, price_calculator",
        "",
        "Knowledge Base:",
        "{",
        '  "price_ranges": {',
        '    "budget": "<$15k"',
        "  }",
        "}",
        "",
        "Additional Context:",
        "- budget: 15k",
      ].join("\n"),
    );
    expect(req.prompt).toBe("Find a hatchback under 15k");
  });

  it("does not flag priority 3 as high", () => {
    const worker = new Worker(1, sales, scriptedGenerator(() => "ok"));
    expect(worker.buildRequest(makeTask({ priority: 3 })).prompt).toBe("Find a hatchback under 15k");
  });

  it("returns the generated text and stays Working until settled", async () => {
    let seenStatus = "";
    let worker: Worker | undefined;
    const gen = scriptedGenerator(() => {
      seenStatus = worker?.status ?? "";
      return "Try the 2019 hatchback.";
    });
    worker = new Worker(1, sales, gen);
    const task = makeTask({ id: 7 });

    const outcome = await worker.process(task);

    expect(outcome).toMatchObject({ ok: true, text: "Try the 2019 hatchback.", attempts: 1 });
    expect(seenStatus).toBe("working");
    expect(worker.status).toBe("working");
    expect(worker.currentTaskId).toBe(7);
    expect(worker.interactions).toBe(1);

    worker.settle("completed");
    expect(worker.status).toBe("completed");
    expect(worker.currentTaskId).toBeNull();
    worker.acknowledge();
    expect(worker.status).toBe("idle");
  });

  it("never writes to the task", async () => {
    const worker = new Worker(1, sales, scriptedGenerator(() => "done"));
    const task = Object.freeze(makeTask());
    await expect(worker.process(task)).resolves.toMatchObject({ ok: true });
    expect(task.status).toBe("in_progress");
    expect(task.result).toBeNull();
  });

  it("refuses a second task while Working", async () => {
    let release: () => void = () => {};
    const gen = scriptedGenerator(
      () =>
        new Promise<string>((resolve) => {
          release = () => resolve("first");
        }),
    );
    const worker = new Worker(3, sales, gen);
    const first = worker.process(makeTask({ id: 1 }));

    await expect(worker.process(makeTask({ id: 2 }))).rejects.toBeInstanceOf(WorkerBusyError);
    await expect(worker.process(makeTask({ id: 2 }))).rejects.toThrow("Worker 3 cannot take a task while working");

    release();
    await expect(first).resolves.toMatchObject({ ok: true, text: "first" });
    expect(gen.requests).toHaveLength(1);
  });

  it("refuses a task until acknowledged after settling", async () => {
    const worker = new Worker(1, sales, scriptedGenerator(() => "ok"));
    await worker.process(makeTask());
    worker.settle("error");
    await expect(worker.process(makeTask({ id: 2 }))).rejects.toBeInstanceOf(WorkerBusyError);
  });

  it("cannot be acknowledged mid-task", async () => {
    const worker = new Worker(1, sales, scriptedGenerator(() => "ok"));
    await worker.process(makeTask());
    expect(() => worker.acknowledge()).toThrow(WorkerBusyError);
  });

  it("counts a backend rejection as an interaction", async () => {
    const worker = new Worker(
      1,
      sales,
      scriptedGenerator(() => {
        throw new BackendRejectedError(404, "model 'x' not found");
      }),
    );
    const outcome = await worker.process(makeTask());
    expect(outcome).toMatchObject({
      ok: false,
      error: { code: "BACKEND_REJECTED", message: "Backend rejected request (HTTP 404): model 'x' not found" },
    });
    expect(worker.interactions).toBe(1);
  });

  it("does not count an exchange that never completed", async () => {
    const worker = new Worker(
      1,
      sales,
      scriptedGenerator(() => {
        throw new BackendUnavailableError(3, new Error("connect ECONNREFUSED"));
      }),
    );
    const outcome = await worker.process(makeTask());
    expect(outcome).toMatchObject({ ok: false, error: { code: "BACKEND_UNAVAILABLE" } });
    expect(worker.interactions).toBe(0);
  });

  it("reports unexpected errors as INTERNAL failures", async () => {
    const worker = new Worker(
      1,
      sales,
      scriptedGenerator(() => {
        throw new TypeError("bad state");
      }),
    );
    await expect(worker.process(makeTask())).resolves.toMatchObject({
      ok: false,
      error: { code: "INTERNAL", message: "bad state" },
    });
  });

  it("accepts unassigned tasks and ones naming its key, name or role", () => {
    const worker = new Worker(1, sales, scriptedGenerator(() => "ok"));
    expect(worker.accepts({})).toBe(true);
    expect(worker.accepts({ assignTo: "sales" })).toBe(true);
    expect(worker.accepts({ assignTo: "MIKE" })).toBe(true);
    expect(worker.accepts({ assignTo: "sales consultant" })).toBe(true);
    expect(worker.accepts({ assignTo: "finance" })).toBe(false);
  });

  it("hands out frozen snapshots", async () => {
    const worker = new Worker(2, sales, scriptedGenerator(() => "ok"));
    await worker.process(makeTask({ id: 5 }));
    const snap = worker.snapshot();
    expect(Object.isFrozen(snap)).toBe(true);
    expect(snap).toEqual({
      id: 2,
      key: "sales",
      name: "Mike",
      role: "Sales Consultant",
      capability: "Helps buyers.",
      status: "working",
      currentTaskId: 5,
      interactions: 1,
    });
  });
});
