import { z } from "zod";
import { DEPARTMENT_NAMES } from "./departments/types.js";
import type { DepartmentName } from "./departments/types.js";
import { logger } from "./logger.js";

const PINECONE_FREE_PLAN_MAX_DIM = 1536;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const departmentOrder = optionalString.transform((value, ctx): DepartmentName[] | undefined => {
  if (!value) {
    return undefined;
  }
  const names = value.split(",").map((name) => name.trim()).filter(Boolean);
  const order: DepartmentName[] = [];
  for (const name of names) {
    const match = DEPARTMENT_NAMES.find((candidate) => candidate.toLowerCase() === name.toLowerCase());
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown department "${name}"` });
      return z.NEVER;
    }
    if (order.includes(match)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `department "${match}" listed twice` });
      return z.NEVER;
    }
    order.push(match);
  }
  return order;
});

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  OPENROUTER_API_KEY: z.string().default(""),
  OPENROUTER_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENROUTER_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-large"),
  OPENROUTER_EMBEDDING_DIM: z.coerce.number().int().positive().default(1024),
  OPENROUTER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  OPENROUTER_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  PINECONE_API_KEY: z.string().default(""),
  PINECONE_INDEX: z.string().default(""),
  PINECONE_CONTROLLER_HOST: optionalString,
  PINECONE_NAMESPACE: z.string().min(1).default("departments"),
  RETRIEVAL_K: z.coerce.number().int().positive().default(4),
  DEPARTMENT_ORDER: departmentOrder,
  MERGE_FAILURE_POLICY: z.enum(["fail", "concatenate"]).default("fail"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  LANGFUSE_PUBLIC_KEY: optionalString,
  LANGFUSE_SECRET_KEY: optionalString
});

export type MergeFailurePolicy = "fail" | "concatenate";

export interface AppConfig {
  environment: string;
  llm: {
    baseUrl: string;
    apiKey: string;
    model: string;
    embeddingModel: string;
    embeddingDimensions: number;
    timeoutMs: number;
    maxRetries: number;
  };
  pinecone: {
    apiKey: string;
    index: string;
    controllerHost?: string;
    namespace: string;
  };
  retrievalK: number;
  departmentOrder?: DepartmentName[];
  mergeFailurePolicy: MergeFailurePolicy;
  port: number;
  langfuse?: { publicKey: string; secretKey: string };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const vars = parsed.data;

  let embeddingDimensions = vars.OPENROUTER_EMBEDDING_DIM;
  if (embeddingDimensions > PINECONE_FREE_PLAN_MAX_DIM) {
    logger.warn(`OPENROUTER_EMBEDDING_DIM exceeds Pinecone free plan max (${PINECONE_FREE_PLAN_MAX_DIM}). Using 1024.`);
    embeddingDimensions = 1024;
  }

  return Object.freeze({
    environment: vars.NODE_ENV,
    llm: {
      baseUrl: vars.OPENROUTER_BASE_URL,
      apiKey: vars.OPENROUTER_API_KEY,
      model: vars.OPENROUTER_MODEL,
      embeddingModel: vars.OPENROUTER_EMBEDDING_MODEL,
      embeddingDimensions,
      timeoutMs: vars.OPENROUTER_TIMEOUT_MS,
      maxRetries: vars.OPENROUTER_MAX_RETRIES
    },
    pinecone: {
      apiKey: vars.PINECONE_API_KEY,
      index: vars.PINECONE_INDEX,
      ...(vars.PINECONE_CONTROLLER_HOST ? { controllerHost: vars.PINECONE_CONTROLLER_HOST } : {}),
      namespace: vars.PINECONE_NAMESPACE
    },
    retrievalK: vars.RETRIEVAL_K,
    ...(vars.DEPARTMENT_ORDER ? { departmentOrder: vars.DEPARTMENT_ORDER } : {}),
    mergeFailurePolicy: vars.MERGE_FAILURE_POLICY,
    port: vars.PORT,
    ...(vars.LANGFUSE_PUBLIC_KEY && vars.LANGFUSE_SECRET_KEY
      ? { langfuse: { publicKey: vars.LANGFUSE_PUBLIC_KEY, secretKey: vars.LANGFUSE_SECRET_KEY } }
      : {})
  });
}
