import { describe, expect, it } from "vitest";

import { ValidationError } from "../src/errors.js";
import { assertIdentifier, isIdentifier } from "../src/layout.js";
import { formatReference, parseReference } from "../src/refs.js";

describe("parseReference", () => {
  it("implies latest for a bare model", () => {
    expect(parseReference("pbmc")).toEqual({ model: "pbmc", qualifier: "latest", implicit: true });
  });

  it("splits model and qualifier", () => {
    expect(parseReference("pbmc@production")).toEqual({ model: "pbmc", qualifier: "production", implicit: false });
    expect(parseReference("pbmc@2024-05-01.1")).toEqual({ model: "pbmc", qualifier: "2024-05-01.1", implicit: false });
  });

  it.each(["", "@v1", "pbmc@", "pbmc@a@b", "../pbmc", "pbmc@../v1"])("rejects %j", (ref) => {
    expect(() => parseReference(ref)).toThrow(ValidationError);
  });

  it("formats back", () => {
    expect(formatReference("pbmc", "v1")).toBe("pbmc@v1");
  });
});

describe("identifiers", () => {
  it("accepts path-safe names", () => {
    expect(isIdentifier("celltype_v2.1-rc")).toBe(true);
    expect(isIdentifier("a".repeat(128))).toBe(true);
  });

  it("rejects unsafe names", () => {
    for (const value of ["", ".hidden", "-flag", "a/b", "a b", "a".repeat(129), ".."]) {
      expect(isIdentifier(value)).toBe(false);
    }
  });

  it("names the offending field", () => {
    try {
      assertIdentifier("task", "bad/task");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ kind: "ValidationError", context: { field: "task" }, httpStatus: 422 });
    }
  });
});
