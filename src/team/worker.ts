import type { GenerationRequest, Generator } from "../backend/types.js";
import { BackendRejectedError, WorkerBusyError, toFailure } from "../errors.js";
import type { WorkerSpec } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { taskLabel, type Task, type TaskOutcome, type WorkerSnapshot, type WorkerStatus } from "./types.js";

const log = createLogger("worker");

export type ProcessOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * One team member. Turns a task into a generation request and reports the
 * outcome; status changes other than Idle → Working belong to the orchestrator.
 */
export class Worker {
  readonly id: number;
  readonly key: string;
  readonly name: string;
  readonly role: string;
  readonly capability: string;
  readonly model?: string;
  readonly tools: readonly string[];
  readonly knowledge?: Readonly<Record<string, unknown>>;

  private client: Generator;
  private _status: WorkerStatus = "idle";
  private _currentTask: Readonly<Task> | null = null;
  private _interactions = 0;

  constructor(id: number, spec: WorkerSpec, client: Generator) {
    this.id = id;
    this.key = spec.key;
    this.name = spec.name;
    this.role = spec.role;
    this.capability = spec.capability;
    this.model = spec.model;
    this.tools = spec.tools ?? [];
    this.knowledge = spec.knowledge;
    this.client = client;
  }

  get status(): WorkerStatus {
    return this._status;
  }

  get currentTaskId(): number | null {
    return this._currentTask?.id ?? null;
  }

  get interactions(): number {
    return this._interactions;
  }

  /** Whether this worker may take the task, judged by its `assignTo`. */
  accepts(task: Pick<Task, "assignTo">): boolean {
    if (!task.assignTo) return true;
    const wanted = task.assignTo.toLowerCase();
    return [this.key, this.name, this.role].some((v) => v.toLowerCase() === wanted);
  }

  async process(task: Readonly<Task>, opts?: ProcessOptions): Promise<TaskOutcome> {
    if (this._status !== "idle") {
      throw new WorkerBusyError(this.id, this._status);
    }
    this._status = "working";
    this._currentTask = task;

    const start = Date.now();
    try {
      const result = await this.client.generate(this.buildRequest(task), opts);
      this._interactions++;
      return { ok: true, text: result.text, latencyMs: result.latencyMs, attempts: result.attempts };
    } catch (err) {
      if (err instanceof BackendRejectedError) this._interactions++;
      log.debug(`${this.name} could not complete ${taskLabel(task.id)}`, { error: String(err) });
      return { ok: false, error: toFailure(err), latencyMs: Date.now() - start };
    }
  }

  buildRequest(task: Readonly<Task>): GenerationRequest {
    return {
      context: this.buildContext(task),
      prompt: this.buildPrompt(task),
      ...(this.model ? { model: this.model } : {}),
      ...(task.format ? { format: task.format } : {}),
    };
  }

  private buildContext(task: Readonly<Task>): string {
    let context = `You are ${this.name}, a ${this.role}. ${this.capability}`;
    if (this.tools.length > 0) context += `\n\nYour tools: ${this.tools.join(", ")}`;
    if (this.knowledge) context += `\n\nKnowledge Base:\n${JSON.stringify(this.knowledge, null, 2)}`;
    const entries = Object.entries(task.context);
    if (entries.length > 0) {
      context += "\n\nAdditional Context:\n" + entries.map(([k, v]) => `- ${k}: ${v}`).join("\n");
    }
    return context;
  }

  private buildPrompt(task: Readonly<Task>): string {
    let prompt = task.description;
    if (task.priority > 3) prompt = `[HIGH PRIORITY] ${prompt}`;
    if (task.tools.length > 0) prompt += `\n\nAvailable tools: ${task.tools.join(", ")}`;
    return prompt;
  }

  /** Working → Completed | Error. Orchestrator only. */
  settle(status: "completed" | "error"): void {
    this._status = status;
    this._currentTask = null;
  }

  /** Completed | Error → Idle, ahead of the next dispatch. Orchestrator only. */
  acknowledge(): void {
    if (this._status === "working") {
      throw new WorkerBusyError(this.id, this._status);
    }
    this._status = "idle";
  }

  snapshot(): WorkerSnapshot {
    return Object.freeze({
      id: this.id,
      key: this.key,
      name: this.name,
      role: this.role,
      capability: this.capability,
      ...(this.model ? { model: this.model } : {}),
      status: this._status,
      currentTaskId: this.currentTaskId,
      interactions: this._interactions,
    });
  }
}
