import { z } from "zod";
import { ValidationError } from "./errors.js";

/** Accepts `{ text }` and the Ollama-style `{ response }` success bodies. */
export const GenerationResponseSchema = z.union([
  z.object({ text: z.string() }).transform((b) => b.text),
  z.object({ response: z.string() }).transform((b) => b.response),
]);

export const BackendErrorSchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

export type BackendErrorBody = z.infer<typeof BackendErrorSchema>;

export function backendErrorMessage(body: BackendErrorBody): string {
  return typeof body.error === "string" ? body.error : body.error.message;
}

const TaskSpecObjectSchema = z.object({
  description: z.string().trim().min(1, "description must not be empty"),
  assignTo: z.string().min(1).optional(),
  priority: z.number().int().min(1).max(5).optional(),
  context: z.record(z.string()).optional(),
  tools: z.array(z.string().min(1)).optional(),
  format: z.literal("json").optional(),
});

/** A task as submitted. A bare string is shorthand for `{ description }`. */
export const TaskSpecSchema = z.union([
  z
    .string()
    .trim()
    .min(1, "description must not be empty")
    .transform((description) => ({ description })),
  TaskSpecObjectSchema,
]);

export type TaskSpec = z.infer<typeof TaskSpecObjectSchema>;

export const BatchFileSchema = z.union([
  z.array(TaskSpecSchema),
  z.object({ tasks: z.array(TaskSpecSchema) }).transform((b) => b.tasks),
]);

export const WorkerSpecSchema = z.object({
  key: z.string().regex(/^[a-z][a-z0-9-]*$/, "Must be lowercase with hyphens"),
  name: z.string().min(1),
  role: z.string().min(1),
  capability: z.string().min(1),
  model: z.string().min(1).optional(),
  /** Tools this member can name in answers, listed in its system context */
  tools: z.array(z.string().min(1)).optional(),
  /** Reference data rendered into its system context as JSON */
  knowledge: z.record(z.unknown()).optional(),
});

export type WorkerSpec = z.infer<typeof WorkerSpecSchema>;

export const TeamFileSchema = z.object({
  members: z.array(WorkerSpecSchema).min(1, "a team needs at least one member"),
});

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${issues}`);
  }
  return result.data;
}
