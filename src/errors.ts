export type ErrorContext = Record<string, unknown>;

/**
 * Base class of every failure the pipeline reports. `code` is stable and
 * machine-readable; `context` carries the structured fields that get logged.
 */
export class PipelineError extends Error {
  readonly code: string;
  readonly context: ErrorContext;

  constructor(code: string, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

export type FetchFailureKind = "status" | "timeout" | "network" | "invalid-body";

export class FetchError extends PipelineError {
  readonly url: string;
  readonly kind: FetchFailureKind;
  readonly status?: number;
  readonly attempts: number;

  constructor(
    input: { url: string; kind: FetchFailureKind; status?: number; attempts: number; detail?: string },
    options?: { cause?: unknown }
  ) {
    const what = input.status !== undefined ? `HTTP ${input.status}` : input.kind;
    const detail = input.detail ? `: ${input.detail}` : "";
    super(
      "FETCH_FAILED",
      `GET ${input.url} failed (${what}) after ${input.attempts} attempt(s)${detail}`,
      { url: input.url, kind: input.kind, status: input.status, attempts: input.attempts },
      options
    );
    this.url = input.url;
    this.kind = input.kind;
    this.status = input.status;
    this.attempts = input.attempts;
  }
}

export class TransformError extends PipelineError {
  readonly pokemonId: number;
  readonly field: string;

  constructor(input: { pokemonId: number; field: string; detail?: string }) {
    const detail = input.detail ? ` (${input.detail})` : "";
    super("TRANSFORM_FAILED", `Pokemon ${input.pokemonId}: unexpected shape at "${input.field}"${detail}`, {
      pokemonId: input.pokemonId,
      field: input.field
    });
    this.pokemonId = input.pokemonId;
    this.field = input.field;
  }
}

export class EvolutionResolutionError extends PipelineError {
  readonly speciesId: number | null;

  constructor(input: { speciesId: number | null; reason: string }, options?: { cause?: unknown }) {
    super(
      "EVOLUTION_RESOLUTION_FAILED",
      `Species ${input.speciesId ?? "?"}: evolution chain not resolved: ${input.reason}`,
      { speciesId: input.speciesId },
      options
    );
    this.speciesId = input.speciesId;
  }
}

export class StorageError extends PipelineError {
  readonly operation: string;
  readonly sqliteCode?: string;
  readonly fatal: boolean;

  constructor(
    input: { operation: string; sqliteCode?: string; fatal: boolean; detail: string },
    options?: { cause?: unknown }
  ) {
    super("STORAGE_FAILED", `${input.operation} failed: ${input.detail}`, {
      operation: input.operation,
      sqliteCode: input.sqliteCode,
      fatal: input.fatal
    }, options);
    this.operation = input.operation;
    this.sqliteCode = input.sqliteCode;
    this.fatal = input.fatal;
  }
}

export function toError(cause: unknown): Error {
  if (cause instanceof Error) return cause;
  return new Error(String(cause));
}

export function describeError(cause: unknown): { name: string; message: string } {
  const err = toError(cause);
  return { name: err.name, message: err.message };
}
