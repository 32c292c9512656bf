import type { DepartmentName } from "./departments/types.js";

const TRANSIENT_STATUS = new Set([408, 409, 429]);
const TRANSIENT_NAMES = new Set([
  "TimeoutError",
  "APIConnectionError",
  "APIConnectionTimeoutError",
  "FetchError"
]);

/**
 * Best-effort read of whether an upstream failure is worth retrying. Looks at the
 * HTTP status the OpenAI client attaches and at well-known network error names.
 */
export function isTransientFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (TRANSIENT_NAMES.has(error.name)) {
    return true;
  }
  const status = "status" in error ? error.status : undefined;
  if (typeof status === "number") {
    return TRANSIENT_STATUS.has(status) || status >= 500;
  }
  return false;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.message === "Aborted");
}

export class ClassificationUnavailable extends Error {
  readonly transient: boolean;

  constructor(cause: unknown) {
    super(`Department classification unavailable: ${describe(cause)}`, { cause });
    this.name = "ClassificationUnavailable";
    this.transient = isTransientFailure(cause);
  }
}

export type GenerationStage = "respond" | "merge";

export class GenerationFailed extends Error {
  readonly transient: boolean;

  constructor(
    readonly stage: GenerationStage,
    cause: unknown,
    readonly department?: DepartmentName
  ) {
    const where = department ? `${stage} (${department})` : stage;
    super(`Generation failed during ${where}: ${describe(cause)}`, { cause });
    this.name = "GenerationFailed";
    this.transient = isTransientFailure(cause);
  }
}

export class EmptyQueryError extends Error {
  constructor() {
    super("Query cannot be empty.");
    this.name = "EmptyQueryError";
  }
}

function describe(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
