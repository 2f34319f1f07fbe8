import { AppError } from "./app-error.js";

interface ErrorContext {
  documentId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Invalid chunking or environment configuration. Raised once at startup,
 * never per document.
 */
export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message = "Invalid configuration", issues: string[] = [], options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      ...options,
    });
    this.issues = issues;
  }
}

export interface BlockReference {
  blockIndex: number;
  blockId?: string;
  kind?: string;
}

/**
 * A content block the chunker could not use. Recoverable: the block is skipped
 * and the rest of the document is still chunked.
 */
export class MalformedBlockError extends AppError {
  public readonly block: BlockReference;
  public readonly issues: string[];

  constructor(block: BlockReference, issues: string[], options?: ErrorContext) {
    const label = block.blockId ?? `#${String(block.blockIndex)}`;
    super({
      message: `Malformed ${block.kind ?? "content"} block ${label}: ${issues.join("; ")}`,
      statusCode: 422,
      code: "MALFORMED_BLOCK",
      ...options,
    });
    this.block = block;
    this.issues = issues;
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Validation error",
    fields: Record<string, string> = {},
    options?: ErrorContext,
  ) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      ...options,
    });
    this.fields = fields;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      ...options,
    });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      ...options,
    });
    this.service = service;
  }
}
