import { z } from "zod";
import { ValidationError } from "./errors.js";

/** Parse `value` with `schema`, throwing a ValidationError that lists every issue. */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what = "value"): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError(`Invalid ${what}: ${msg}`, { issues: result.error.issues });
  }
  return result.data;
}

// --- Allocation ---

export const DecompositionModeSchema = z.enum(["sequential", "parallel"]);

export const SubtaskDescriptorSchema = z.object({
  order: z.number().int(),
  description: z.string().min(1, "subtask description must not be empty"),
  name: z.string().min(1, "subtask name must not be empty"),
});

export const AllocationResultSchema = z.discriminatedUnion("satisfied", [
  z.object({
    satisfied: z.literal(true),
    reasoning: z.string(),
    decompositionMode: z.null(),
    subtasks: z.null(),
  }),
  z.object({
    satisfied: z.literal(false),
    reasoning: z.string(),
    decompositionMode: DecompositionModeSchema,
    subtasks: z.array(SubtaskDescriptorSchema).min(1, "an unsatisfied task needs at least one subtask"),
  }),
]);

export type DecompositionMode = z.infer<typeof DecompositionModeSchema>;
export type SubtaskDescriptor = z.infer<typeof SubtaskDescriptorSchema>;
export type AllocationResult = z.infer<typeof AllocationResultSchema>;

// --- Environment ---

const intFromEnv = z.coerce.number().int().positive();

export const EnvConfigSchema = z.object({
  TASKGRAPH_BACKEND: z.enum(["http", "gateway"]).optional(),
  TASKGRAPH_URL: z.string().url().optional(),
  TASKGRAPH_MODEL: z.string().min(1).optional(),
  TASKGRAPH_API_KEY: z.string().min(1).optional(),
  TASKGRAPH_MAX_ROUNDS: intFromEnv.optional(),
  TASKGRAPH_RENDER_DIR: z.string().min(1).optional(),
  TASKGRAPH_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

// --- Chat backends ---

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1, "response has no choices"),
});

export const GatewayFrameSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("req"),
    id: z.string(),
    method: z.string(),
    params: z.unknown().optional(),
  }),
  z.object({
    type: z.literal("res"),
    id: z.string(),
    ok: z.boolean(),
    payload: z.unknown().optional(),
    error: z
      .object({
        code: z.string(),
        message: z.string(),
      })
      .optional(),
  }),
  z.object({
    type: z.literal("event"),
    event: z.string(),
    payload: z.unknown().optional(),
    seq: z.number().optional(),
  }),
]);

export const ChatEventPayloadSchema = z.object({
  runId: z.string(),
  state: z.enum(["delta", "final", "error"]),
  message: z
    .object({
      content: z.array(z.object({ text: z.string().optional() })).optional(),
    })
    .optional(),
  error: z.string().optional(),
});

export const ChatAckSchema = z.object({ runId: z.string().min(1) });

export const HelloPayloadSchema = z
  .object({
    server: z.object({ version: z.string().optional(), connId: z.string().optional() }).optional(),
    features: z.object({ methods: z.array(z.string()).optional() }).optional(),
  })
  .passthrough();

// --- CLI ---

export const RunCommandOptionsSchema = z.object({
  backend: z.enum(["http", "gateway"]).optional(),
  url: z.string().url().optional(),
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  maxRounds: intFromEnv.optional(),
  renderDir: z.string().min(1).optional(),
  render: z.boolean().default(true),
});

export type RunCommandOptions = z.infer<typeof RunCommandOptionsSchema>;
