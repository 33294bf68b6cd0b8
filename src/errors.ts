export type ErrorCode =
  | "DUPLICATE_NODE"
  | "UNKNOWN_NODE"
  | "DUPLICATE_EDGE"
  | "UNKNOWN_EDGE"
  | "CYCLE"
  | "ACYCLIC_VIOLATION"
  | "SENTINEL"
  | "MISSING_INPUT"
  | "INPUT_CONFLICT"
  | "COLLABORATOR_PARSE"
  | "COLLABORATOR_FAILED"
  | "VALIDATION_FAILED"
  | "CONFIG_INVALID";

/** Base class for every error raised by the task graph and its collaborators. */
export class TaskGraphError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Graph structure
// ---------------------------------------------------------------------------

export class DuplicateNodeError extends TaskGraphError {
  constructor(name: string) {
    super(
      "DUPLICATE_NODE",
      name ? `Node "${name}" already exists` : "Task has no name",
      { name },
    );
  }
}

export class UnknownNodeError extends TaskGraphError {
  readonly nodeName: string;

  constructor(name: string) {
    super("UNKNOWN_NODE", `Node "${name}" does not exist`, { name });
    this.nodeName = name;
  }
}

export class DuplicateEdgeError extends TaskGraphError {
  constructor(from: string, to: string) {
    super("DUPLICATE_EDGE", `Edge "${from}" -> "${to}" already exists`, { from, to });
  }
}

export class UnknownEdgeError extends TaskGraphError {
  constructor(from: string, to: string) {
    super("UNKNOWN_EDGE", `Edge "${from}" -> "${to}" does not exist`, { from, to });
  }
}

/** An edge was rejected because it would close a cycle. The graph is unchanged. */
export class CycleError extends TaskGraphError {
  constructor(from: string, to: string) {
    super("CYCLE", `Adding edge "${from}" -> "${to}" would create a cycle`, { from, to });
  }
}

/** Raised by the topological sort when the graph it was handed is not acyclic. */
export class AcyclicViolationError extends TaskGraphError {
  constructor(sorted: number, total: number) {
    super(
      "ACYCLIC_VIOLATION",
      `Graph is not acyclic: sorted ${sorted} of ${total} nodes`,
      { sorted, total },
    );
  }
}

/** Source/sink placement rule broken (second sentinel, edge into source, edge out of sink). */
export class SentinelError extends TaskGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("SENTINEL", message, details);
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export class MissingInputError extends TaskGraphError {
  readonly taskName: string;

  constructor(taskName: string, missingFrom: string[]) {
    const from = missingFrom.length > 0
      ? ` (no output yet from ${missingFrom.map((n) => `"${n}"`).join(", ")})`
      : " (it has no predecessors)";
    super("MISSING_INPUT", `Task "${taskName}" has no resolved input${from}`, {
      taskName,
      missingFrom,
    });
    this.taskName = taskName;
  }
}

export class InputConflictError extends TaskGraphError {
  constructor(taskName: string, from: string) {
    super(
      "INPUT_CONFLICT",
      `Input slot of "${taskName}" from "${from}" was already written`,
      { taskName, from },
    );
  }
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export class CollaboratorParseError extends TaskGraphError {
  constructor(message: string, raw: string) {
    super("COLLABORATOR_PARSE", message, { excerpt: raw.slice(0, 300) });
  }
}

export class CollaboratorError extends TaskGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("COLLABORATOR_FAILED", message, details);
  }
}

export class ValidationError extends TaskGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_FAILED", message, details);
  }
}

export class ConfigError extends TaskGraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_INVALID", message, details);
  }
}
