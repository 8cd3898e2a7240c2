import type { FailureReason } from "../errors.js";

export type TaskStatus = "pending" | "in_progress" | "completed" | "failed";

export type WorkerStatus = "idle" | "working" | "completed" | "error";

export type Task = {
  /** Monotonic, starting at 1 */
  id: number;
  description: string;
  /** Worker key, name or role this task is meant for. Any worker when absent. */
  assignTo?: string;
  /** 1..5; above 3 is flagged as high priority in the prompt */
  priority: number;
  context: Record<string, string>;
  tools: string[];
  format?: "json";
  status: TaskStatus;
  workerId: number | null;
  result: string | null;
  error: FailureReason | null;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
};

export type TerminalStatus = Extract<TaskStatus, "completed" | "failed">;

export function isTerminal(status: TaskStatus): status is TerminalStatus {
  return status === "completed" || status === "failed";
}

/** Human-facing label, e.g. `task_007`. */
export function taskLabel(id: number): string {
  return `task_${String(id).padStart(3, "0")}`;
}

/** What a worker hands back to the orchestrator for one task. */
export type TaskOutcome =
  | { ok: true; text: string; latencyMs: number; attempts: number }
  | { ok: false; error: FailureReason; latencyMs: number };

/** Final per-task record returned from a run. */
export type TaskResult = {
  taskId: number;
  label: string;
  description: string;
  workerId: number | null;
  status: TerminalStatus;
  text: string | null;
  error: FailureReason | null;
  durationMs: number | null;
};

export type WorkerSnapshot = Readonly<{
  id: number;
  key: string;
  name: string;
  role: string;
  capability: string;
  model?: string;
  status: WorkerStatus;
  currentTaskId: number | null;
  interactions: number;
}>;

export type TaskSnapshot = Readonly<Omit<Task, "context" | "tools">> & {
  readonly context: Readonly<Record<string, string>>;
  readonly tools: readonly string[];
};
