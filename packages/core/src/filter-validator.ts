import { ValidationError } from "@chunkwise/errors";
import type { SearchFilter } from "@chunkwise/types";
import { SEARCH_FILTER_ALLOWLIST } from "@chunkwise/types";

/**
 * Allowlist-only filter validation.
 * Rejects unknown filter fields so only indexed payload fields reach the store.
 */
export function validateSearchFilter(filter: SearchFilter): void {
  const allowedFields = new Set<string>(SEARCH_FILTER_ALLOWLIST);

  for (const key of Object.keys(filter)) {
    if (!allowedFields.has(key)) {
      throw new ValidationError(
        `Invalid filter field: "${key}". Allowed fields: ${[...allowedFields].join(", ")}`,
        { [key]: "not an allowed filter field" },
      );
    }
  }

  // documentIds arrives from callers as untyped JSON
  const documentIds: unknown = filter.documentIds;
  if (documentIds !== undefined) {
    if (!Array.isArray(documentIds)) {
      throw new ValidationError("filter.documentIds must be an array of strings", {
        documentIds: "must be an array",
      });
    }
    for (const id of documentIds) {
      if (typeof id !== "string" || id.length === 0) {
        throw new ValidationError("Each documentId must be a non-empty string", {
          documentIds: "must contain non-empty strings",
        });
      }
    }
  }
}
