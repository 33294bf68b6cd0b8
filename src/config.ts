import { ConfigError } from "./errors.js";
import { EnvConfigSchema } from "./schemas.js";
import type { LogLevel } from "./utils/logger.js";

export type BackendKind = "http" | "gateway";

export type TaskGraphConfig = {
  timeouts: {
    /** Per collaborator call. */
    chat: number;
    /** Gateway handshake. */
    connect: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    maxRounds: number;
    maxSubtasks: number;
    maxNodes: number;
    outputTruncation: number;
  };
  rateLimit: {
    enabled: boolean;
    maxRequests: number;
    windowMs: number;
    maxQueueSize: number;
  };
  render: {
    enabled: boolean;
    dir: string;
    /** Number of rotating file slots; 0 writes one file per round. */
    keep: number;
  };
  backend: {
    kind: BackendKind;
    url: string;
    model: string;
    apiKey?: string;
  };
  log: {
    level: LogLevel;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: TaskGraphConfig = {
  timeouts: {
    chat: 120_000,
    connect: 10_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    maxRounds: 10,
    maxSubtasks: 8,
    maxNodes: 64,
    outputTruncation: 3_000,
  },
  rateLimit: {
    enabled: true,
    maxRequests: 10,
    windowMs: 1_000,
    maxQueueSize: 50,
  },
  render: {
    enabled: true,
    dir: "renders",
    keep: 0,
  },
  backend: {
    kind: "http",
    url: "http://127.0.0.1:11434/v1",
    model: "llama3.1",
  },
  log: {
    level: "info",
  },
};

let current: TaskGraphConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge<T extends object>(base: T, overrides: DeepPartial<T>): T {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(structuredClone(base)));
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMerge(existing, val) : val;
  }
  return result as T;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<TaskGraphConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<TaskGraphConfig> {
  return current;
}

/** Merge two override layers; values in `top` win. */
export function mergeOverrides(
  bottom: DeepPartial<TaskGraphConfig>,
  top: DeepPartial<TaskGraphConfig>,
): DeepPartial<TaskGraphConfig> {
  return deepMerge(bottom, top);
}

/** Read `TASKGRAPH_*` variables into config overrides. */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): DeepPartial<TaskGraphConfig> {
  const relevant = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("TASKGRAPH_") && value !== ""),
  );
  const parsed = EnvConfigSchema.safeParse(relevant);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${msg}`);
  }

  const e = parsed.data;
  const overrides: DeepPartial<TaskGraphConfig> = {};
  if (e.TASKGRAPH_BACKEND || e.TASKGRAPH_URL || e.TASKGRAPH_MODEL || e.TASKGRAPH_API_KEY) {
    overrides.backend = {
      kind: e.TASKGRAPH_BACKEND,
      url: e.TASKGRAPH_URL,
      model: e.TASKGRAPH_MODEL,
      apiKey: e.TASKGRAPH_API_KEY,
    };
  }
  if (e.TASKGRAPH_MAX_ROUNDS !== undefined) {
    overrides.limits = { maxRounds: e.TASKGRAPH_MAX_ROUNDS };
  }
  if (e.TASKGRAPH_RENDER_DIR) {
    overrides.render = { dir: e.TASKGRAPH_RENDER_DIR };
  }
  if (e.TASKGRAPH_LOG_LEVEL) {
    overrides.log = { level: e.TASKGRAPH_LOG_LEVEL };
  }
  return overrides;
}

/** The default config values (frozen). */
export const defaults: Readonly<TaskGraphConfig> = Object.freeze(structuredClone(DEFAULTS));
