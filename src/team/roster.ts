import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Generator } from "../backend/types.js";
import { ValidationError } from "../errors.js";
import { TeamFileSchema, parseOrThrow, type WorkerSpec } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { Task } from "./types.js";
import { Worker } from "./worker.js";

/** Fixed pool of workers, ids handed out in registration order starting at 1. */
export class Roster {
  private workers = new Map<number, Worker>();
  private nextId = 1;
  private client: Generator;

  constructor(client: Generator) {
    this.client = client;
  }

  add(spec: WorkerSpec): Worker {
    if (this.byKey(spec.key)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Team member "${spec.key}" already registered`);
    }
    const worker = new Worker(this.nextId++, spec, this.client);
    this.workers.set(worker.id, worker);
    log.debug(`Registered team member "${worker.name}"`, { id: worker.id, role: worker.role });
    return worker;
  }

  get(id: number): Worker | undefined {
    return this.workers.get(id);
  }

  byKey(key: string): Worker | undefined {
    return this.list().find((w) => w.key === key);
  }

  /** All workers, ascending id. */
  list(): Worker[] {
    return [...this.workers.values()].sort((a, b) => a.id - b.id);
  }

  /** Workers not currently Working, ascending id. */
  available(): Worker[] {
    return this.list().filter((w) => w.status !== "working");
  }

  /** Whether any worker, busy or not, accepts the task. */
  canServe(task: Pick<Task, "assignTo">): boolean {
    return this.list().some((w) => w.accepts(task));
  }

  get size(): number {
    return this.workers.size;
  }
}

/** The bundled dealership team. */
export function defaultTeamPath(): string {
  return fileURLToPath(new URL("../../config/team.json", import.meta.url));
}

export async function loadTeamFile(path: string = defaultTeamPath()): Promise<WorkerSpec[]> {
  const raw = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError("VALIDATION_FAILED", `Team file ${path} is not valid JSON: ${String(err)}`);
  }
  return parseOrThrow(TeamFileSchema, data, `team file ${path}`).members;
}
