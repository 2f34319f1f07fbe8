import { ValidationError } from "@chunkwise/errors";

/** Every search must be scoped to the caller's access tags. */
export function assertPermissions(permissions: readonly string[]): void {
  if (permissions.filter((tag) => tag.length > 0).length === 0) {
    throw new ValidationError("permissions are required for vector search", {
      permissions: "must contain at least one access tag",
    });
  }
}
