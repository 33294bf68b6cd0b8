import { describe, expect, it } from "vitest";
import { CollaboratorError, CollaboratorParseError, ValidationError } from "../../src/errors.js";
import { FunctionOracle } from "../../src/oracle/function-oracle.js";

describe("FunctionOracle", () => {
  it("defaults its name and naming function", async () => {
    const oracle = new FunctionOracle({
      actor: async (input) => input,
      allocator: async () => "**Satisfaction Decision**: True\n**Reasoning**: ok",
    });
    expect(oracle.name).toBe("function");
    await expect(oracle.nameTask("  summarize the report  ", { task: "source" })).resolves.toBe(
      "summarize the report",
    );
  });

  it("passes input and context to the actor", async () => {
    const seen: string[] = [];
    const oracle = new FunctionOracle({
      name: "echo",
      actor: async (input, ctx) => {
        seen.push(ctx.task);
        return `echo: ${input}`;
      },
      allocator: async () => "**Satisfaction Decision**: True\n**Reasoning**: ok",
    });

    await expect(oracle.askActor("hello", { task: "t1" })).resolves.toBe("echo: hello");
    expect(seen).toEqual(["t1"]);
  });

  it("parses allocator text", async () => {
    const oracle = new FunctionOracle({
      actor: async () => "",
      allocator: async () =>
        [
          "**Satisfaction Decision**: False",
          "**Reasoning**: split it",
          "**Decomposition Mode**: parallel",
          "- **Sub-task 1**:",
          "  - **Description**: first half",
          "  - **Name**: half_1",
        ].join("\n"),
    });

    await expect(oracle.askAllocator("x", { task: "t1" })).resolves.toEqual({
      satisfied: false,
      reasoning: "split it",
      decompositionMode: "parallel",
      subtasks: [{ order: 1, description: "first half", name: "half_1" }],
    });
  });

  it("surfaces allocator text that does not parse", async () => {
    const oracle = new FunctionOracle({ actor: async () => "", allocator: async () => "whatever" });
    await expect(oracle.askAllocator("x", { task: "t1" })).rejects.toThrow(CollaboratorParseError);
  });

  it("validates structured allocator results", async () => {
    const oracle = new FunctionOracle({
      actor: async () => "",
      allocator: async () => ({
        satisfied: false,
        reasoning: "split",
        decompositionMode: "sequential",
        subtasks: [{ order: 1, description: "", name: "empty" }],
      }),
    });

    await expect(oracle.askAllocator("x", { task: "t1" })).rejects.toThrow(ValidationError);
    await expect(oracle.askAllocator("x", { task: "t1" })).rejects.toThrow(
      "Invalid allocation result: subtasks.0.description: subtask description must not be empty",
    );
  });

  it("times out slow functions", async () => {
    const oracle = new FunctionOracle({
      actor: () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 200)),
      allocator: async () => "",
      timeout: 20,
    });

    await expect(oracle.askActor("x", { task: "t1" })).rejects.toThrow(CollaboratorError);
    await expect(oracle.askActor("x", { task: "t1" })).rejects.toThrow("actor function timed out after 20ms");
  });
});
