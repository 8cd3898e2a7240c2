import type { Generator } from "./backend/types.js";
import { getConfig } from "./config.js";
import { CancelledError, NoEligibleWorkerError, toFailure, type FailureReason } from "./errors.js";
import { invokeSink, nullSink, type NotificationSink } from "./notifications.js";
import { TaskSpecSchema, parseOrThrow, type TaskSpec, type WorkerSpec } from "./schemas.js";
import { Roster } from "./team/roster.js";
import { TaskQueue } from "./team/task-queue.js";
import {
  isTerminal,
  taskLabel,
  type Task,
  type TaskOutcome,
  type TaskResult,
  type TaskSnapshot,
  type TaskStatus,
  type WorkerSnapshot,
} from "./team/types.js";
import type { Worker } from "./team/worker.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("orchestrator");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OrchestratorOptions = {
  client: Generator;
  workers?: WorkerSpec[];
  sink?: NotificationSink;
  /** Per generation exchange (default: config timeouts.generationMs) */
  timeoutMs?: number;
  /** How long in-flight tasks may run on after a cancel (default: config timeouts.cancelGraceMs) */
  cancelGraceMs?: number;
};

export type RunOptions = {
  /** Aborting cancels the run, as `cancel()` does */
  signal?: AbortSignal;
};

export type TaskSummary = {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
  tasks: Array<{
    id: number;
    label: string;
    description: string;
    assignTo: string | null;
    status: TaskStatus;
    workerId: number | null;
    completedAt: number | null;
  }>;
};

export type WorkerStatusReport = Pick<WorkerSnapshot, "id" | "key" | "name" | "role" | "status" | "interactions">;

type InFlight = {
  task: Task;
  worker: Worker;
  controller: AbortController;
  done: Promise<void>;
};

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Owns the team and every task. All status transitions happen here, on the
 * event loop, so no two contexts ever move the same task or worker.
 */
export class Orchestrator {
  private roster: Roster;
  private sink: NotificationSink;
  private queue = new TaskQueue();
  private allTasks = new Map<number, Task>();
  /** Tasks submitted since the last drain finished */
  private batch: Task[] = [];
  private nextTaskId = 1;
  private inFlight = new Map<number, InFlight>();
  private timeoutMs?: number;
  private cancelGraceMs: number;
  private active: Promise<TaskResult[]> | null = null;
  /** Set synchronously on entry to the drain loop, before `active` is assigned */
  private draining = false;
  private cancelReason: string | null = null;
  private graceTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(opts: OrchestratorOptions) {
    this.roster = new Roster(opts.client);
    this.sink = opts.sink ?? nullSink;
    this.timeoutMs = opts.timeoutMs;
    this.cancelGraceMs = opts.cancelGraceMs ?? getConfig().timeouts.cancelGraceMs;
    for (const spec of opts.workers ?? []) this.roster.add(spec);
  }

  addWorker(spec: WorkerSpec): WorkerSnapshot {
    return this.roster.add(spec).snapshot();
  }

  /** Queue tasks. Returns their initial snapshots, in submission order. */
  submit(specs: Array<string | TaskSpec>): TaskSnapshot[] {
    const parsed: TaskSpec[] = specs.map((s, i) => parseOrThrow(TaskSpecSchema, s, `task #${i + 1}`));
    const created: Task[] = [];

    for (const spec of parsed) {
      const task: Task = {
        id: this.nextTaskId++,
        description: spec.description,
        assignTo: spec.assignTo,
        priority: spec.priority ?? 1,
        context: spec.context ?? {},
        tools: spec.tools ?? [],
        format: spec.format,
        status: "pending",
        workerId: null,
        result: null,
        error: null,
        createdAt: Date.now(),
        startedAt: null,
        completedAt: null,
      };
      this.allTasks.set(task.id, task);
      this.batch.push(task);
      created.push(task);

      if (this.cancelReason !== null) {
        this.failUnassigned(task, new CancelledError(this.cancelReason));
      } else if (!this.roster.canServe(task)) {
        this.failUnassigned(task, new NoEligibleWorkerError(task.assignTo ?? "any"));
      } else {
        this.queue.enqueue(task);
      }
    }

    if (this.draining) this.dispatch();
    return created.map(snapshotTask);
  }

  /**
   * Process everything queued until no task is pending or in progress.
   * Resolves with the results of every task submitted since the last drain,
   * ordered by task id. A second call while one is running joins it.
   */
  drain(opts?: RunOptions): Promise<TaskResult[]> {
    if (!this.active) {
      this.active = this.drainLoop(opts).finally(() => {
        this.active = null;
      });
    }
    return this.active;
  }

  async run(specs: Array<string | TaskSpec>, opts?: RunOptions): Promise<TaskResult[]> {
    this.submit(specs);
    return this.drain(opts);
  }

  /**
   * Fail every pending task with CANCELLED. In-flight tasks get the grace
   * period to finish, then their exchanges are aborted.
   */
  cancel(reason = "Cancelled"): void {
    const first = this.draining && this.cancelReason === null;
    if (first) this.cancelReason = reason;

    const pending = this.queue.drain();
    for (const task of pending) this.failUnassigned(task, new CancelledError(reason));
    if (pending.length > 0) {
      this.emitLog(`[CANCEL] ${pending.length} pending task(s) cancelled: ${reason}`);
    }

    if (first && this.inFlight.size > 0) {
      this.graceTimer = setTimeout(() => {
        this.graceTimer = null;
        for (const f of this.inFlight.values()) f.controller.abort();
      }, this.cancelGraceMs);
    }
  }

  private async drainLoop(opts?: RunOptions): Promise<TaskResult[]> {
    this.draining = true;
    const signal = opts?.signal;
    const onAbort = () => this.cancel("Run aborted");
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      if (signal?.aborted) onAbort();
      this.emitLog(`[PROCESS] Starting processing of ${this.batch.length} tasks...`);
      this.dispatch();
      while (this.inFlight.size > 0) {
        await Promise.race([...this.inFlight.values()].map((f) => f.done));
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (this.graceTimer) clearTimeout(this.graceTimer);
      this.graceTimer = null;
      this.cancelReason = null;
      this.draining = false;
    }

    const batch = this.batch;
    this.batch = [];
    this.logSummary(batch);
    return batch.map(toResult);
  }

  /** Give each available worker, lowest id first, the oldest task it accepts. */
  private dispatch(): void {
    if (this.cancelReason !== null) return;
    for (const worker of this.roster.available()) {
      const task = this.queue.next(worker);
      if (task) this.start(worker, task);
    }
  }

  private start(worker: Worker, task: Task): void {
    worker.acknowledge();
    task.status = "in_progress";
    task.workerId = worker.id;
    task.startedAt = Date.now();

    this.emitLog(`[ASSIGN] ${taskLabel(task.id)} → ${worker.name}`);
    this.emitLog(`   Task: ${preview(task.description, getConfig().limits.previewLength)}`, true);
    invokeSink("onDispatch", () => this.sink.onDispatch(worker.id, task.id), log);

    const controller = new AbortController();
    const entry: InFlight = { task, worker, controller, done: Promise.resolve() };
    this.inFlight.set(task.id, entry);
    entry.done = this.execute(entry);
  }

  private async execute({ task, worker, controller }: InFlight): Promise<void> {
    let outcome: TaskOutcome;
    try {
      outcome = await Promise.race([
        worker.process(task, { timeoutMs: this.timeoutMs, signal: controller.signal }),
        whenAborted(controller.signal, () => this.cancelReason ?? "Cancelled"),
      ]);
    } catch (err) {
      // Only reachable if dispatch handed a busy worker a task; leave that worker alone.
      log.error(`Worker ${worker.id} refused ${taskLabel(task.id)}`, { error: String(err) });
      this.inFlight.delete(task.id);
      this.failUnassigned(task, err, worker.id);
      this.dispatch();
      return;
    }
    this.inFlight.delete(task.id);
    this.finish(worker, task, outcome);
    this.dispatch();
  }

  private finish(worker: Worker, task: Task, outcome: TaskOutcome): void {
    const previewLength = getConfig().limits.previewLength;
    task.completedAt = Date.now();

    if (outcome.ok) {
      task.status = "completed";
      task.result = outcome.text;
      worker.settle("completed");
      this.emitLog(`[COMPLETE] ${worker.name} finished ${taskLabel(task.id)}`);
      this.emitLog(`   Result: ${preview(outcome.text, previewLength)}`, true);
      invokeSink("onComplete", () => this.sink.onComplete(worker.id, task.id, outcome.text), log);
      return;
    }

    task.status = "failed";
    task.error = outcome.error;
    worker.settle("error");
    this.emitLog(`[FAILED] ${worker.name} failed ${taskLabel(task.id)}`);
    this.emitLog(`   Error: ${preview(outcome.error.message, previewLength)}`);
    invokeSink("onError", () => this.sink.onError(worker.id, task.id, outcome.error), log);
  }

  /** Pending (or refused) → Failed, without a worker transition. */
  private failUnassigned(task: Task, err: unknown, workerId: number | null = null): void {
    const reason: FailureReason = toFailure(err);
    task.status = "failed";
    task.error = reason;
    task.completedAt = Date.now();
    invokeSink("onError", () => this.sink.onError(workerId, task.id, reason), log);
  }

  private logSummary(batch: Task[]): void {
    const total = batch.length;
    const failed = batch.filter((t) => t.status === "failed");
    const completed = total - failed.length;
    if (failed.length === 0) {
      this.emitLog(`[DONE] All ${total} tasks completed successfully!`);
      return;
    }
    this.emitLog(`[SUMMARY] ${completed}/${total} tasks completed, ${failed.length} failed`);
    for (const t of failed) {
      this.emitLog(`   Failed: ${taskLabel(t.id)} - ${preview(t.description, getConfig().limits.summaryLength)}`);
    }
  }

  /** Progress line for the sink. Detail lines go to the debug log only. */
  private emitLog(message: string, detail = false): void {
    log.debug(message);
    if (detail) return;
    invokeSink("onLog", () => this.sink.onLog(message), log);
  }

  // -------------------------------------------------------------------------
  // Read-only views
  // -------------------------------------------------------------------------

  task(id: number): TaskSnapshot | undefined {
    const task = this.allTasks.get(id);
    return task ? snapshotTask(task) : undefined;
  }

  tasks(): TaskSnapshot[] {
    return [...this.allTasks.values()].map(snapshotTask);
  }

  workers(): WorkerSnapshot[] {
    return this.roster.list().map((w) => w.snapshot());
  }

  isRunning(): boolean {
    return this.active !== null;
  }

  summary(): TaskSummary {
    const tasks = [...this.allTasks.values()];
    const count = (s: TaskStatus) => tasks.filter((t) => t.status === s).length;
    const summaryLength = getConfig().limits.summaryLength;
    return {
      total: tasks.length,
      pending: count("pending"),
      inProgress: count("in_progress"),
      completed: count("completed"),
      failed: count("failed"),
      tasks: tasks.map((t) => ({
        id: t.id,
        label: taskLabel(t.id),
        description: preview(t.description, summaryLength),
        assignTo: t.assignTo ?? null,
        status: t.status,
        workerId: t.workerId,
        completedAt: t.completedAt,
      })),
    };
  }

  workerStatus(): WorkerStatusReport[] {
    return this.roster.list().map((w) => ({
      id: w.id,
      key: w.key,
      name: w.name,
      role: w.role,
      status: w.status,
      interactions: w.interactions,
    }));
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Resolves with a cancelled outcome once the signal aborts. */
function whenAborted(signal: AbortSignal, reason: () => string): Promise<TaskOutcome> {
  return new Promise((resolve) => {
    const settle = () =>
      resolve({ ok: false, error: toFailure(new CancelledError(reason())), latencyMs: 0 });
    if (signal.aborted) settle();
    else signal.addEventListener("abort", settle, { once: true });
  });
}

function snapshotTask(task: Task): TaskSnapshot {
  return Object.freeze({
    ...task,
    context: Object.freeze({ ...task.context }),
    tools: Object.freeze([...task.tools]),
    error: task.error ? Object.freeze({ ...task.error }) : null,
  });
}

function toResult(task: Task): TaskResult {
  if (!isTerminal(task.status)) {
    throw new Error(`${taskLabel(task.id)} is still ${task.status}`);
  }
  return {
    taskId: task.id,
    label: taskLabel(task.id),
    description: task.description,
    workerId: task.workerId,
    status: task.status,
    text: task.result,
    error: task.error,
    durationMs: task.startedAt !== null && task.completedAt !== null ? task.completedAt - task.startedAt : null,
  };
}
