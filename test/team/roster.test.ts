import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/errors.js";
import { Roster, defaultTeamPath, loadTeamFile } from "../../src/team/roster.js";
import { makeTask, member, scriptedGenerator } from "./helpers.js";

describe("Roster", () => {
  it("hands out ids in registration order", () => {
    const roster = new Roster(scriptedGenerator(() => "ok"));
    const a = roster.add(member("sales"));
    const b = roster.add(member("finance"));
    expect([a.id, b.id]).toEqual([1, 2]);
    expect(roster.list().map((w) => w.key)).toEqual(["sales", "finance"]);
    expect(roster.get(2)?.key).toBe("finance");
    expect(roster.byKey("sales")?.id).toBe(1);
    expect(roster.size).toBe(2);
  });

  it("rejects duplicate keys", () => {
    const roster = new Roster(scriptedGenerator(() => "ok"));
    roster.add(member("sales"));
    expect(() => roster.add(member("sales", { name: "Someone Else" }))).toThrow(ValidationError);
    expect(() => roster.add(member("sales"))).toThrow('Team member "sales" already registered');
  });

  it("lists only non-working members as available", async () => {
    let release: () => void = () => {};
    const gen = scriptedGenerator(
      () =>
        new Promise<string>((resolve) => {
          release = () => resolve("ok");
        }),
    );
    const roster = new Roster(gen);
    const first = roster.add(member("sales"));
    roster.add(member("finance"));

    const pending = first.process(makeTask());
    expect(roster.available().map((w) => w.key)).toEqual(["finance"]);

    release();
    await pending;
    first.settle("completed");
    expect(roster.available().map((w) => w.key)).toEqual(["sales", "finance"]);
  });

  it("knows whether anyone can serve a task", () => {
    const roster = new Roster(scriptedGenerator(() => "ok"));
    roster.add(member("sales"));
    expect(roster.canServe({})).toBe(true);
    expect(roster.canServe({ assignTo: "sales" })).toBe(true);
    expect(roster.canServe({ assignTo: "appraisal" })).toBe(false);
  });
});

describe("loadTeamFile", () => {
  it("loads the bundled team", async () => {
    expect(defaultTeamPath()).toMatch(/config[\\/]team\.json$/);
    const members = await loadTeamFile();
    expect(members.map((m) => m.key)).toEqual(["sales", "appraisal", "finance", "manager"]);
    expect(members[1]).toMatchObject({ name: "Sarah Chen", role: "Appraisal Manager" });
    expect(members[2].tools).toEqual(["loan_calculator", "credit_analyzer", "payment_optimizer", "insurance_estimator"]);
    expect(members[0].knowledge).toHaveProperty("price_ranges", { budget: "<$15k", mid: "$15k-$30k", premium: "$30k+" });
  });

  it("rejects files that are not valid JSON or fail validation", async () => {
    const dir = await mkdtemp(join(tmpdir(), "team-dispatch-"));
    const broken = join(dir, "broken.json");
    const invalid = join(dir, "invalid.json");
    await writeFile(broken, "{ members: ");
    await writeFile(invalid, JSON.stringify({ members: [{ key: "x", name: "X" }] }));

    await expect(loadTeamFile(broken)).rejects.toThrow("is not valid JSON");
    await expect(loadTeamFile(invalid)).rejects.toThrow(ValidationError);
    await expect(loadTeamFile(invalid)).rejects.toThrow("members.0.role: Required");
  });
});
