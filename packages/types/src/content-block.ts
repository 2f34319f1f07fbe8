export type ContentBlockKind = "paragraph" | "heading" | "table" | "image" | "slide-section";

interface ContentBlockBase {
  /** Parser-assigned identifier. Falls back to `block-<index>` in chunk provenance. */
  id?: string;
  documentId: string;
  page: number | null;
  sectionPath: readonly string[];
  /** Empty means "inherit the document default permissions". */
  permissions: readonly string[];
  text: string;
}

export interface ParagraphBlock extends ContentBlockBase {
  kind: "paragraph";
}

export interface HeadingBlock extends ContentBlockBase {
  kind: "heading";
}

export interface TableData {
  header?: readonly string[];
  rows: readonly (readonly string[])[];
}

export interface TableBlock extends ContentBlockBase {
  kind: "table";
  table: TableData;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ImageData {
  boundingBox?: BoundingBox;
  /** Reference an image-capable embedder can resolve (URL, data URI, storage key). */
  embeddingHandle?: string;
}

export interface ImageBlock extends ContentBlockBase {
  kind: "image";
  image: ImageData;
}

export interface SlideData {
  title?: string;
  /** OCR text of images embedded in the slide. */
  imageText?: readonly string[];
}

export interface SlideSectionBlock extends ContentBlockBase {
  kind: "slide-section";
  slide?: SlideData;
}

export type ContentBlock =
  | ParagraphBlock
  | HeadingBlock
  | TableBlock
  | ImageBlock
  | SlideSectionBlock;

export interface DocumentInput {
  documentId: string;
  /** Default access tags for blocks that carry none. */
  permissions: readonly string[];
  blocks: readonly ContentBlock[];
}
