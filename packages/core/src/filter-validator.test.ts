import { describe, it, expect } from "vitest";
import { ValidationError } from "@chunkwise/errors";
import type { SearchFilter } from "@chunkwise/types";
import { validateSearchFilter } from "./filter-validator.js";

describe("validateSearchFilter", () => {
  it("accepts valid filter with documentIds", () => {
    expect(() => validateSearchFilter({ documentIds: ["doc-1", "doc-2"] })).not.toThrow();
  });

  it("accepts an empty filter", () => {
    expect(() => validateSearchFilter({})).not.toThrow();
  });

  it("rejects unknown fields", () => {
    const filter: SearchFilter = JSON.parse('{"sourcePath":"a.md"}');

    expect(() => validateSearchFilter(filter)).toThrow(
      'Invalid filter field: "sourcePath". Allowed fields: documentIds',
    );
  });

  it("rejects non-array documentIds", () => {
    const filter: SearchFilter = JSON.parse('{"documentIds":"doc-1"}');

    expect(() => validateSearchFilter(filter)).toThrow(ValidationError);
  });

  it("rejects blank or non-string documentIds", () => {
    const filter: SearchFilter = JSON.parse('{"documentIds":["doc-1", 7]}');

    expect(() => validateSearchFilter(filter)).toThrow("Each documentId must be a non-empty string");
    expect(() => validateSearchFilter({ documentIds: [""] })).toThrow(ValidationError);
  });
});
