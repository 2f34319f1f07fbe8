export type ChunkType = "paragraph" | "table" | "image" | "mixed";

export interface RowRange {
  /** 0-based index of the first source row, inclusive. */
  start: number;
  /** 0-based index of the last source row, inclusive. */
  end: number;
}

export interface Chunk {
  readonly id: string;
  readonly documentId: string;
  readonly type: ChunkType;
  readonly text: string;
  readonly tokenEstimate: number;
  readonly page: number | null;
  readonly pages: readonly number[];
  /** Section path joined with " > ". */
  readonly section: string;
  readonly sectionPath: readonly string[];
  readonly permissions: readonly string[];
  readonly orderIndex: number;
  readonly oversized: boolean;
  /** Size of the overlap prefix carried over from the previous piece. */
  readonly overlap: number;
  readonly sourceBlockIds: readonly string[];
  readonly rowRange?: RowRange;
  readonly imageHandle?: string;
}

export type ChunkingWarningCode = "OVERSIZED_CHUNK" | "UNSPLITTABLE_TEXT";

export interface ChunkingWarning {
  code: ChunkingWarningCode;
  message: string;
  blockIndex: number;
  orderIndex?: number;
}
