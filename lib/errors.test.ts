import { parse } from "csv-parse/sync";
import { describe, it, expect } from "vitest";
import { LoadError, describeError, toLoadError } from "./errors";

function errno(code: string): Error {
  return Object.assign(new Error(`${code}: failed`), { code });
}

describe("toLoadError", () => {
  it.each([
    ["ENOENT", "not-found", "File 'in.csv' not found."],
    ["EACCES", "permission", "Permission denied: Cannot read 'in.csv'"],
    ["EPERM", "permission", "Permission denied: Cannot read 'in.csv'"],
    ["ERR_ENCODING_INVALID_ENCODED_DATA", "parse", "CSV parsing error: ERR_ENCODING_INVALID_ENCODED_DATA: failed"],
    ["EIO", "unexpected", "Unexpected error: EIO: failed"],
  ])("classifies %s as %s", (code, kind, message) => {
    const err = toLoadError(errno(code), "in.csv");
    expect(err).toBeInstanceOf(LoadError);
    expect(err.kind).toBe(kind);
    expect(err.message).toBe(message);
    expect(err.path).toBe("in.csv");
  });

  it("classifies any csv-parse error as parse, whatever its code", () => {
    let thrown: unknown;
    try {
      parse('a,b\n1,"unterminated\n');
    } catch (e) {
      thrown = e;
    }
    expect(toLoadError(thrown, "in.csv").kind).toBe("parse");
  });

  it("does not mistake another error carrying a CSV_ code for a parse error", () => {
    expect(toLoadError(errno("CSV_LOOKALIKE"), "in.csv").kind).toBe("unexpected");
  });

  it("passes an existing LoadError through", () => {
    const original = new LoadError("boom", "parse", "a.csv");
    expect(toLoadError(original, "b.csv")).toBe(original);
  });

  it("handles thrown non-errors", () => {
    expect(toLoadError("weird", "in.csv").message).toBe("Unexpected error: weird");
  });
});

describe("describeError", () => {
  it("prefers the message of an Error", () => {
    expect(describeError(new Error("bad"))).toBe("bad");
    expect(describeError(42)).toBe("42");
  });
});
