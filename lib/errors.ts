// lib/errors.ts
import { CsvError } from "csv-parse/sync";

export type LoadErrorKind = "not-found" | "permission" | "parse" | "unexpected";

/**
 * A failure to read or parse the whole input file. Aborts the run before any
 * row is validated, unlike row-level validation errors which are plain values.
 */
export class LoadError extends Error {
  constructor(
    message: string,
    public readonly kind: LoadErrorKind,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LoadError";
  }
}

function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e) {
    const { code } = e;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// Classify whatever fs or the parsers threw while loading `path`
export function toLoadError(e: unknown, path: string): LoadError {
  if (e instanceof LoadError) return e;
  const code = errnoCode(e);
  if (code === "ENOENT" || code === "EISDIR") {
    return new LoadError(`File '${path}' not found.`, "not-found", path, { cause: e });
  }
  if (code === "EACCES" || code === "EPERM") {
    return new LoadError(`Permission denied: Cannot read '${path}'`, "permission", path, { cause: e });
  }
  if (e instanceof CsvError || code === "ERR_ENCODING_INVALID_ENCODED_DATA") {
    return new LoadError(`CSV parsing error: ${describeError(e)}`, "parse", path, { cause: e });
  }
  return new LoadError(`Unexpected error: ${describeError(e)}`, "unexpected", path, { cause: e });
}
