import express from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { EmptyQueryError, GenerationFailed, isAbortError } from "../errors.js";
import { logger } from "../logger.js";
import type { QueryService } from "../service.js";

const log = logger.getSubLogger({ name: "http" });

const queryRequestSchema = z.object({
  query: z.string()
});

type AsyncHandler = (req: Request, res: Response, signal: AbortSignal) => Promise<void>;

/** Aborts the pipeline when the client goes away before the response is written. */
function withAbort(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });
    handler(req, res, controller.signal).catch(next);
  };
}

function readQuery(body: unknown): string {
  const validation = queryRequestSchema.safeParse(body);
  if (!validation.success || !validation.data.query.trim()) {
    throw new EmptyQueryError();
  }
  return validation.data.query;
}

export function createApp(service: QueryService) {
  const app = express();
  app.use(express.json({ limit: "100kb" }));

  app.get("/", (_req, res) => {
    res.json({
      message: "Department query router",
      health: "/health",
      endpoints: ["POST /query", "POST /route"]
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post(
    "/query",
    withAbort(async (req, res, signal) => {
      res.json(await service.answer(readQuery(req.body), signal));
    })
  );

  app.post(
    "/route",
    withAbort(async (req, res, signal) => {
      res.json(await service.route(readQuery(req.body), signal));
    })
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "not_found" });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (res.headersSent) {
      return;
    }
    if (isAbortError(error)) {
      log.debug("Client disconnected before the answer was ready");
      res.status(499).end();
      return;
    }
    if (error instanceof EmptyQueryError || isBodyParseError(error)) {
      res.status(400).json({ error: "invalid_query", detail: "Query cannot be empty." });
      return;
    }
    if (error instanceof GenerationFailed) {
      log.error("Generation failed", { stage: error.stage, department: error.department, reason: error.message });
      res.status(error.transient ? 503 : 502).json({ error: "generation_failed", detail: error.message });
      return;
    }
    log.error("Unhandled request failure", error);
    res.status(500).json({ error: "internal_error", detail: "Unexpected server error." });
  });

  return app;
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && "status" in error && error.status === 400;
}
