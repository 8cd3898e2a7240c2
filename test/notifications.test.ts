import { describe, expect, it, vi } from "vitest";
import { ConsoleSink, invokeSink } from "../src/notifications.js";
import type { Logger } from "../src/utils/logger.js";

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe("invokeSink", () => {
  it("reports a sink that throws", () => {
    const logger = fakeLogger();
    invokeSink(
      "onLog",
      () => {
        throw new Error("renderer gone");
      },
      logger,
    );
    expect(logger.warn).toHaveBeenCalledWith("Notification sink failed in onLog", { error: "renderer gone" });
  });

  it("reports a sink that rejects", async () => {
    const logger = fakeLogger();
    invokeSink("onComplete", async () => Promise.reject(new Error("socket closed")), logger);
    await new Promise((r) => setTimeout(r, 0));
    expect(logger.warn).toHaveBeenCalledWith("Notification sink failed in onComplete", { error: "socket closed" });
  });

  it("stays quiet when the sink behaves", async () => {
    const logger = fakeLogger();
    invokeSink("onDispatch", () => {}, logger);
    invokeSink("onDispatch", async () => {}, logger);
    await new Promise((r) => setTimeout(r, 0));
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("ConsoleSink", () => {
  it("logs progress lines at info and events at debug", () => {
    const logger = fakeLogger();
    const sink = new ConsoleSink(logger);
    sink.onLog("[ASSIGN] task_001 → Mike Rodriguez");
    sink.onDispatch(1, 1);
    sink.onError(null, 2, { code: "CANCELLED", message: "Cancelled" });

    expect(logger.info).toHaveBeenCalledWith("[ASSIGN] task_001 → Mike Rodriguez");
    expect(logger.debug).toHaveBeenNthCalledWith(1, "dispatch", { workerId: 1, taskId: 1 });
    expect(logger.debug).toHaveBeenNthCalledWith(2, "error", { workerId: null, taskId: 2, code: "CANCELLED" });
  });
});
