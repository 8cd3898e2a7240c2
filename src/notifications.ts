import type { InteractionEvent } from "./backend/types.js";
import type { FailureReason } from "./errors.js";
import { createLogger, type Logger } from "./utils/logger.js";

/**
 * Lifecycle events for an outside observer (a dashboard, a renderer).
 * Called from the orchestrator's context; a sink should hand work off
 * rather than block. Returned promises are not awaited.
 */
export interface NotificationSink {
  onDispatch(workerId: number, taskId: number): void | Promise<void>;
  onComplete(workerId: number, taskId: number, resultText: string): void | Promise<void>;
  /** `workerId` is null for tasks that failed before reaching a worker. */
  onError(workerId: number | null, taskId: number, reason: FailureReason): void | Promise<void>;
  onLog(message: string): void | Promise<void>;
  /** Raw backend traffic, when the generation client is wired to report it. */
  onInteraction?(event: InteractionEvent): void | Promise<void>;
}

export const nullSink: NotificationSink = {
  onDispatch() {},
  onComplete() {},
  onError() {},
  onLog() {},
};

/**
 * Run one sink call, isolating the caller from whatever it throws or rejects with.
 */
export function invokeSink(label: string, call: () => void | Promise<void>, logger: Logger): void {
  const report = (err: unknown) => {
    logger.warn(`Notification sink failed in ${label}`, { error: err instanceof Error ? err.message : String(err) });
  };
  try {
    const ret = call();
    if (ret instanceof Promise) ret.catch(report);
  } catch (err) {
    report(err);
  }
}

/** Writes every event through the logger. Used by the CLI. */
export class ConsoleSink implements NotificationSink {
  private log: Logger;

  constructor(logger: Logger = createLogger("team")) {
    this.log = logger;
  }

  onDispatch(workerId: number, taskId: number): void {
    this.log.debug("dispatch", { workerId, taskId });
  }

  onComplete(workerId: number, taskId: number, resultText: string): void {
    this.log.debug("complete", { workerId, taskId, length: resultText.length });
  }

  onError(workerId: number | null, taskId: number, reason: FailureReason): void {
    this.log.debug("error", { workerId, taskId, code: reason.code });
  }

  onLog(message: string): void {
    this.log.info(message);
  }

  onInteraction(event: InteractionEvent): void {
    this.log.debug(`backend ${event.type}`, { requestId: event.requestId, attempt: event.attempt, model: event.model });
  }
}
