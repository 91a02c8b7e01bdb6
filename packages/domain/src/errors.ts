export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type FetchErrorKind = "network" | "not_found";

export interface FetchErrorOptions {
  status?: number | null;
  cause?: unknown;
}

/**
 * Raised by the NEMWEB fetcher. `network` failures are transient and retried
 * before they surface; `not_found` means there is nothing new to read this cycle.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status: number | null;

  constructor(kind: FetchErrorKind, message: string, options: FetchErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : {cause: options.cause});
    this.name = "FetchError";
    this.kind = kind;
    this.status = options.status ?? null;
  }
}

export type ParseErrorKind = "malformed_row" | "schema_mismatch" | "no_data";

export class ParseError extends Error {
  readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : {cause: options.cause});
    this.name = "ParseError";
    this.kind = kind;
  }
}

export interface ParseWarning {
  kind: "malformed_row";
  file: string;
  line: number;
  reason: string;
}

export class RegionConfigError extends Error {
  readonly code: string;

  constructor(code: string, message?: string) {
    super(message ?? `Unsupported NEM region '${code}'`);
    this.name = "RegionConfigError";
    this.code = code;
  }
}

/** A valid NEM region that has no running pipeline. */
export class RegionNotConfiguredError extends RegionConfigError {
  constructor(code: string) {
    super(code, `Region ${code} is not configured`);
    this.name = "RegionNotConfiguredError";
  }
}
