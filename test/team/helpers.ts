import type { GenerateOptions, GenerationRequest, Generator } from "../../src/backend/types.js";
import type { WorkerSpec } from "../../src/schemas.js";
import type { Task } from "../../src/team/types.js";

/** Generator stand-in: `reply` produces the text, or throws to fail the exchange. */
export function scriptedGenerator(
  reply: (req: GenerationRequest, opts?: GenerateOptions) => string | Promise<string>,
): Generator & { requests: GenerationRequest[] } {
  const requests: GenerationRequest[] = [];
  return {
    requests,
    async generate(req, opts) {
      requests.push(req);
      const text = await reply(req, opts);
      return { text, model: req.model ?? "test-model", latencyMs: 1, attempts: 1 };
    },
  };
}

/** The worker name a request was built for, from its "You are <name>, a ..." context. */
export function speaker(req: GenerationRequest): string {
  return /^You are ([^,]+),/.exec(req.context)?.[1] ?? "?";
}

export function member(key: string, overrides: Partial<WorkerSpec> = {}): WorkerSpec {
  return {
    key,
    name: key.toUpperCase(),
    role: "Sales Consultant",
    capability: "Answer customer questions.",
    ...overrides,
  };
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 1,
    description: "Find a hatchback under 15k",
    priority: 1,
    context: {},
    tools: [],
    status: "in_progress",
    workerId: null,
    result: null,
    error: null,
    createdAt: 0,
    startedAt: null,
    completedAt: null,
    ...overrides,
  };
}
