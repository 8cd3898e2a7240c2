import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import {
  BatchFileSchema,
  GenerationResponseSchema,
  TaskSpecSchema,
  TeamFileSchema,
  parseOrThrow,
} from "../src/schemas.js";

describe("schemas", () => {
  it("reads generated text from either body shape", () => {
    expect(GenerationResponseSchema.parse({ text: "hi" })).toBe("hi");
    expect(GenerationResponseSchema.parse({ response: "hello", done: true })).toBe("hello");
    expect(GenerationResponseSchema.safeParse({ output: "nope" }).success).toBe(false);
  });

  it("accepts a bare string as a task", () => {
    expect(parseOrThrow(TaskSpecSchema, "  Quote a trade-in  ", "task")).toEqual({ description: "Quote a trade-in" });
  });

  it("validates task fields", () => {
    expect(() => parseOrThrow(TaskSpecSchema, { description: "x", priority: 9 }, "task")).toThrow(ValidationError);
    expect(() => parseOrThrow(TaskSpecSchema, "   ", "task")).toThrow(ValidationError);
  });

  it("accepts a batch as an array or under tasks", () => {
    const tasks = ["a", { description: "b", assignTo: "finance" }];
    expect(parseOrThrow(BatchFileSchema, tasks, "batch")).toEqual([
      { description: "a" },
      { description: "b", assignTo: "finance" },
    ]);
    expect(parseOrThrow(BatchFileSchema, { tasks }, "batch")).toHaveLength(2);
  });

  it("names the failing path in the error", () => {
    expect(() =>
      parseOrThrow(TeamFileSchema, { members: [{ key: "Sales Team", name: "A", role: "B", capability: "C" }] }, "team"),
    ).toThrow("Invalid team: members.0.key: Must be lowercase with hyphens");
  });

  it("requires at least one team member", () => {
    expect(() => parseOrThrow(TeamFileSchema, { members: [] }, "team")).toThrow("a team needs at least one member");
  });
});
