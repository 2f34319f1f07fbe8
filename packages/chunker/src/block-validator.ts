import { z } from "zod";
import { MalformedBlockError } from "@chunkwise/errors";
import type { ContentBlock } from "@chunkwise/types";

const nonBlank = z.string().refine((value) => value.trim().length > 0, {
  message: "text must not be empty",
});

const baseShape = {
  id: z.string().min(1).optional(),
  documentId: z.string().min(1),
  page: z.number().int().nonnegative().nullable(),
  sectionPath: z.array(z.string()),
  permissions: z.array(z.string().min(1)),
  text: z.string(),
};

const blockSchema = z.discriminatedUnion("kind", [
  z.object({ ...baseShape, kind: z.literal("paragraph"), text: nonBlank }),
  z.object({ ...baseShape, kind: z.literal("heading"), text: nonBlank }),
  z.object({
    ...baseShape,
    kind: z.literal("table"),
    table: z.object({
      header: z.array(z.string()).optional(),
      rows: z.array(z.array(z.string()).min(1)).min(1, "table has no rows"),
    }),
  }),
  z.object({
    ...baseShape,
    kind: z.literal("image"),
    image: z.object({
      boundingBox: z
        .object({
          x: z.number().nonnegative(),
          y: z.number().nonnegative(),
          width: z.number().nonnegative(),
          height: z.number().nonnegative(),
        })
        .optional(),
      embeddingHandle: z.string().min(1).optional(),
    }),
  }),
  z.object({
    ...baseShape,
    kind: z.literal("slide-section"),
    slide: z
      .object({
        title: z.string().optional(),
        imageText: z.array(z.string()).optional(),
      })
      .optional(),
  }),
]);

function contentIssues(block: ContentBlock): string[] {
  switch (block.kind) {
    case "image":
      return block.text.trim().length === 0 && block.image.embeddingHandle === undefined
        ? ["image has neither OCR text nor an embedding handle"]
        : [];
    case "slide-section": {
      const hasTitle = (block.slide?.title?.trim() ?? "").length > 0;
      const hasImageText = (block.slide?.imageText ?? []).some((t) => t.trim().length > 0);
      return hasTitle || hasImageText || block.text.trim().length > 0
        ? []
        : ["slide has no title, body or image text"];
    }
    default:
      return [];
  }
}

/**
 * Check one block of a document.
 * Returns the error to record, or `null` when the block can be chunked.
 */
export function validateBlock(
  block: ContentBlock,
  blockIndex: number,
  documentId: string,
): MalformedBlockError | null {
  const reference = {
    blockIndex,
    ...(typeof block.id === "string" ? { blockId: block.id } : {}),
    ...(typeof block.kind === "string" ? { kind: block.kind } : {}),
  };

  const parsed = blockSchema.safeParse(block);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return new MalformedBlockError(reference, issues, { documentId });
  }

  const issues = contentIssues(block);
  if (block.documentId !== documentId) {
    issues.push(`documentId ${block.documentId} does not match document ${documentId}`);
  }

  return issues.length > 0 ? new MalformedBlockError(reference, issues, { documentId }) : null;
}
