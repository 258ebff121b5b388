/**
 * Environment Configuration
 *
 * Parses process.env once with zod. Data file locations default to the
 * files under data/ at the repository root.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { MODEL_ASSIGNMENTS, providerForModel } from "./models";

const DATA_DIR = new URL("../../data/", import.meta.url);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(v => v === "true" || v === "1");

const chatModel = z
  .string()
  .refine(model => providerForModel(model) !== undefined, {
    message: "must be an OpenAI (gpt-, o1, o3), Gemini (gemini-) or Claude (claude-) model",
  });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),

  OPENAI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),

  PROPOSALS_PATH: z.string().default(new URL("proposals.json", DATA_DIR).pathname),
  PREDEFINED_QA_PATH: z.string().default(new URL("predefined_qa.json", DATA_DIR).pathname),
  VECTOR_INDEX_PATH: z.string().default(new URL("vector_index.json", DATA_DIR).pathname),
  EVALUATION_SET_PATH: z.string().default(new URL("evaluation_set.json", DATA_DIR).pathname),

  INTENT_MODEL: chatModel.default(MODEL_ASSIGNMENTS.INTENT_PARSING),
  ANSWER_MODEL: chatModel.default(MODEL_ASSIGNMENTS.GROUNDED_ANSWER),
  EMBEDDING_MODEL: z.string().default(MODEL_ASSIGNMENTS.EMBEDDING),

  /** When set, POST /api/admin/reload requires a matching x-admin-token header. */
  ADMIN_TOKEN: z.string().min(1).optional(),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  QUERY_LOG_ENABLED: booleanFlag.default("true"),
});

export type AppEnv = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): AppEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(`[Config] Invalid environment: ${fromZodError(result.error).message}`);
  }
  return result.data;
}

let _env: AppEnv | null = null;
export function getEnv(): AppEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
