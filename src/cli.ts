import "dotenv/config";
import { createInterface } from "readline/promises";
import { fileURLToPath } from "url";
import { buildLivePipeline } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { logger } from "./logger.js";
import { QueryService } from "./service.js";
import { configureLangfuse, tracingConfig } from "./tracing.js";

const EXIT_COMMAND = "exit";

export type Ask = (prompt: string) => Promise<string>;

export async function runLoop(
  service: Pick<QueryService, "answer">,
  ask: Ask,
  print: (line: string) => void = console.log
) {
  for (;;) {
    const input = (await ask(`\nEnter query (type '${EXIT_COMMAND}' to stop): `)).trim();
    if (input.toLowerCase() === EXIT_COMMAND) {
      return;
    }
    if (!input) {
      continue;
    }
    try {
      const response = await service.answer(input);
      print(`\nRouted to: ${response.departments_routed.join(", ") || "none"}`);
      print(`\nFinal Response:\n\n${response.answer}`);
    } catch (error) {
      print(`\nCould not answer: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

async function bootstrap() {
  const config = loadConfig();
  const tracing = configureLangfuse(config);
  const pipeline = await buildLivePipeline(config);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await runLoop(new QueryService(pipeline, tracingConfig(tracing, "cli")), (prompt) => rl.question(prompt));
  } finally {
    rl.close();
    await tracing.shutdown();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error) => {
    logger.fatal("Failed to run the query loop", error);
    process.exitCode = 1;
  });
}
