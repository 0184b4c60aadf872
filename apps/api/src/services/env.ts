import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.string().default("8787"),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  RUNS_DIR: z.string().default("runs"),

  GITHUB_TOKEN: z.string().optional(),
  GITHUB_API_URL: z.string().url().default("https://api.github.com"),
  GITHUB_REPO: z.string().regex(/^[^/\s]+\/[^/\s]+$/).optional(),
  GITHUB_MILESTONE: z.string().optional(),

  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30),

  SUPERVISOR_COVERAGE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.2),
  SUPERVISOR_TOP_K: z.coerce.number().int().positive().default(3),
  SUPERVISOR_ESCALATE_UNCOVERED_HIGH: z.coerce.number().int().positive().default(3),
  SUPERVISOR_TOOL_CALL_LIMIT: z.coerce.number().int().nonnegative().default(50),
  SUPERVISOR_MIN_EVIDENCE: z.coerce.number().int().nonnegative().default(5),
  SUPERVISOR_WINDOW_SIZE: z.coerce.number().int().positive().default(20),

  UPSTASH_REDIS_REST_URL: z.string().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional()
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

export const env = parseEnv(process.env);
