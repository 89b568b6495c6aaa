export type ErrorCode =
  | "VALIDATION"
  | "CONFLICT"
  | "NOT_FOUND"
  | "EXTERNAL_TOOL";

export class NginxSitesError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "NginxSitesError";
  }
}

/**
 * Bad user input. Raised before anything touches the disk.
 */
export class ValidationError extends NginxSitesError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

export class ConflictError extends NginxSitesError {
  constructor(
    message: string,
    public readonly domain: string
  ) {
    super(message, "CONFLICT");
    this.name = "ConflictError";
  }
}

export class NotFoundError extends NginxSitesError {
  constructor(
    message: string,
    public readonly domain: string
  ) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/**
 * nginx or certbot exited non-zero. `output` holds what the tool printed.
 */
export class ExternalToolError extends NginxSitesError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly output: string
  ) {
    super(message, "EXTERNAL_TOOL");
    this.name = "ExternalToolError";
  }
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
