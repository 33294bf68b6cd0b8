// Config
export { getConfig, configure, resetConfig, mergeOverrides, loadEnvConfig, defaults } from "./config.js";
export type { TaskGraphConfig, BackendKind, DeepPartial } from "./config.js";

// Errors
export {
  TaskGraphError,
  DuplicateNodeError,
  UnknownNodeError,
  DuplicateEdgeError,
  UnknownEdgeError,
  CycleError,
  AcyclicViolationError,
  SentinelError,
  MissingInputError,
  InputConflictError,
  CollaboratorParseError,
  CollaboratorError,
  ValidationError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  AllocationResultSchema,
  SubtaskDescriptorSchema,
  DecompositionModeSchema,
} from "./schemas.js";
export type { AllocationResult, DecompositionMode, SubtaskDescriptor } from "./schemas.js";

// Graph
export { TaskGraph, createSeedGraph } from "./graph/task-graph.js";
export { topologicalSort, validate, allDownstreams } from "./graph/scheduler.js";
export { assertEdgeKeepsAcyclic } from "./graph/cycle-guard.js";
export {
  SOURCE_NAME,
  SINK_NAME,
  createSourceTask,
  createSinkTask,
  createTask,
  displayName,
} from "./graph/task.js";
export type {
  Task,
  TaskKind,
  SourceTask,
  SinkTask,
  RegularTask,
  TaskOutput,
  SourceOutput,
  TaskGraphNode,
  TaskRef,
  Edge,
  Adjacency,
} from "./graph/types.js";

// Engine
export { ExpansionEngine, uniqueName } from "./executor/expansion-engine.js";
export type { EngineOptions, RunCallbacks, RunOptions, RunResult, RunStatus } from "./executor/types.js";

// Collaborators
export { staticInput } from "./oracle/types.js";
export type { Oracle, OracleCallContext, InputProvider, ChatClient, ChatRequest } from "./oracle/types.js";
export { LlmOracle, cleanTaskName } from "./oracle/llm-oracle.js";
export type { LlmOracleOptions } from "./oracle/llm-oracle.js";
export { FunctionOracle } from "./oracle/function-oracle.js";
export type { FunctionOracleOptions, OracleFunction } from "./oracle/function-oracle.js";
export { HttpChatClient } from "./oracle/http-client.js";
export type { HttpChatClientOptions } from "./oracle/http-client.js";
export { GatewayChatClient } from "./gateway/client.js";
export type { GatewayChatClientOptions } from "./gateway/client.js";
export type { GatewayConfig } from "./gateway/types.js";
export { createChatClient } from "./oracle/create-client.js";
export { parseAllocation } from "./planner/allocation-parser.js";
export { formatActorInput, formatAllocatorInput, truncate } from "./planner/prompts.js";

// Rendering
export { DotRenderer, graphLabels, roundFileName, toDot } from "./render/dot-renderer.js";
export type { GraphRenderer, GraphLabel } from "./render/dot-renderer.js";

// Utils
export { log, createLogger, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { RateLimiter } from "./utils/rate-limiter.js";
export type { RateLimiterOptions } from "./utils/rate-limiter.js";
