/**
 * Error types surfaced by the converter and the Confluence client.
 *
 * Why: Callers need to tell a page that cannot be converted at all apart from
 * an attachment that is merely missing, which only degrades one macro.
 */

export class PageValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PageValidationError";
  }
}

export class AttachmentResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AttachmentResolutionError";
  }
}

export class AttachmentNotFoundError extends AttachmentResolutionError {
  readonly filename: string;

  constructor(filename: string) {
    super(`attachment ${filename} not found`);
    this.name = "AttachmentNotFoundError";
    this.filename = filename;
  }
}

export class ConfluenceApiError extends Error {
  readonly operation: string;
  readonly status?: number;

  constructor(operation: string, message: string, status?: number) {
    super(message);
    this.name = "ConfluenceApiError";
    this.operation = operation;
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
