import { CallbackHandler as LangfuseCallbackHandler } from "@langfuse/langchain";
import { LangfuseSpanProcessor } from "@langfuse/otel";
import type { RunnableConfig } from "@langchain/core/runnables";
import { NodeSDK } from "@opentelemetry/sdk-node";
import type { AppConfig } from "./config.js";
import { logger } from "./logger.js";

export interface Tracing {
  handler?: LangfuseCallbackHandler;
  shutdown(): Promise<void>;
}

/**
 * Langfuse receives LangChain runs through OpenTelemetry; the callback handler only
 * turns them into spans, so the SDK has to be started before any request runs.
 */
export function configureLangfuse(config: AppConfig): Tracing {
  if (!config.langfuse) {
    logger.warn("Langfuse keys missing. Tracing disabled.");
    return { shutdown: async () => undefined };
  }
  const sdk = new NodeSDK({
    spanProcessors: [
      new LangfuseSpanProcessor({
        publicKey: config.langfuse.publicKey,
        secretKey: config.langfuse.secretKey
      })
    ]
  });
  sdk.start();
  const handler = new LangfuseCallbackHandler({
    tags: ["department-router"],
    traceMetadata: {
      service: "department-router",
      environment: config.environment
    }
  });
  return { handler, shutdown: () => sdk.shutdown() };
}

export function tracingConfig(tracing: Tracing, surface: string): RunnableConfig {
  return {
    ...(tracing.handler ? { callbacks: [tracing.handler] } : {}),
    metadata: { surface }
  };
}
