export type JobType = "ingest" | "embed" | "cancel";

export interface JobData {
  type: JobType;
  documentId: string;
}

export interface IngestJobData extends JobData {
  type: "ingest";
  /** Path of the source file, read by the ingest processor. */
  sourcePath: string;
  mimeType: string;
  permissions: string[];
}

export interface EmbedJobData extends JobData {
  type: "embed";
}

export interface CancelJobData extends JobData {
  type: "cancel";
  reason?: string;
}

export type AnyJobData = IngestJobData | EmbedJobData | CancelJobData;

export type DocumentStatus = "pending" | "chunked" | "indexed" | "failed" | "cancelled";
