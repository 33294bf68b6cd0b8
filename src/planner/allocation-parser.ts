import { CollaboratorParseError } from "../errors.js";
import { AllocationResultSchema, parseOrThrow, type AllocationResult, type SubtaskDescriptor } from "../schemas.js";

/*
 * Grammar of an allocator reply (surrounding prose is ignored):
 *
 *   **Satisfaction Decision**: True|False
 *   **Reasoning**: <text>
 *   -- only when False --
 *   **Decomposition Mode**: sequential|parallel
 *   - **Sub-task <n>**:
 *     - **Description**: <text>
 *     - **Name**: <text>
 *   ... repeated
 */
const SATISFACTION = /\*\*Satisfaction Decision\*\*:[ \t]*(True|False)\b/;
const REASONING = /\*\*Reasoning\*\*:[ \t]*(.+)/;
const MODE = /\*\*Decomposition Mode\*\*:[ \t]*(\w+)/;
const SUBTASK =
  /-[ \t]*\*\*Sub-task[ \t]+(\d+)\*\*:[ \t]*\r?\n[ \t]*-[ \t]*\*\*Description\*\*:[ \t]*(.+?)[ \t]*\r?\n[ \t]*-[ \t]*\*\*Name\*\*:[ \t]*(.+?)[ \t]*(?=\r?\n|$)/g;

function unquote(text: string): string {
  return text.trim().replace(/^[`"']+|[`"']+$/g, "").trim();
}

/** Turn an allocator's free-form reply into a structured AllocationResult. */
export function parseAllocation(content: string): AllocationResult {
  const decision = SATISFACTION.exec(content);
  if (!decision) {
    throw new CollaboratorParseError("Allocator reply has no **Satisfaction Decision** line", content);
  }
  const reasoning = REASONING.exec(content);
  if (!reasoning) {
    throw new CollaboratorParseError("Allocator reply has no **Reasoning** line", content);
  }

  if (decision[1] === "True") {
    return parseOrThrow(
      AllocationResultSchema,
      { satisfied: true, reasoning: reasoning[1].trim(), decompositionMode: null, subtasks: null },
      "allocation result",
    );
  }

  const mode = MODE.exec(content);
  if (!mode) {
    throw new CollaboratorParseError("Unsatisfied allocator reply has no **Decomposition Mode** line", content);
  }
  const decompositionMode = mode[1].toLowerCase();
  if (decompositionMode !== "sequential" && decompositionMode !== "parallel") {
    throw new CollaboratorParseError(`Unknown decomposition mode "${mode[1]}"`, content);
  }

  const subtasks: SubtaskDescriptor[] = [];
  for (const match of content.matchAll(SUBTASK)) {
    const description = match[2].trim();
    const name = unquote(match[3]);
    if (!description) throw new CollaboratorParseError(`Sub-task ${match[1]} has an empty description`, content);
    if (!name) throw new CollaboratorParseError(`Sub-task ${match[1]} has an empty name`, content);
    subtasks.push({ order: Number.parseInt(match[1], 10), description, name });
  }
  if (subtasks.length === 0) {
    throw new CollaboratorParseError("Unsatisfied allocator reply lists no sub-tasks", content);
  }

  return parseOrThrow(
    AllocationResultSchema,
    { satisfied: false, reasoning: reasoning[1].trim(), decompositionMode, subtasks },
    "allocation result",
  );
}
