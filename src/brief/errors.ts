/**
 * Error types shared across the brief agent
 */

/**
 * Standard error codes
 */
export enum BriefErrorCode {
  MISSING_CREDENTIAL = "MISSING_CREDENTIAL",
  STEP_FAILED = "STEP_FAILED",
  CONTEXT_NOT_READY = "CONTEXT_NOT_READY",
  CONTEXT_ALREADY_SET = "CONTEXT_ALREADY_SET",
  INVALID_FILENAME = "INVALID_FILENAME",
  BRIEF_NOT_FOUND = "BRIEF_NOT_FOUND",
  CONFIG_INVALID = "CONFIG_INVALID",
}

/**
 * Base error carrying a machine-readable code
 */
export class BriefError extends Error {
  readonly code: BriefErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: BriefErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "BriefError";
    this.code = code;
    this.details = options?.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Raised by remote generation backends when their API key is not set
 */
export class MissingCredentialError extends BriefError {
  readonly envVar: string;

  constructor(envVar: string) {
    super(BriefErrorCode.MISSING_CREDENTIAL, `${envVar} not found in environment`, {
      details: { envVar },
    });
    this.name = "MissingCredentialError";
    this.envVar = envVar;
  }
}

/**
 * Check if a value is a BriefError with the given code
 */
export function isBriefError(error: unknown, code?: BriefErrorCode): error is BriefError {
  return error instanceof BriefError && (code === undefined || error.code === code);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check if a filesystem error means the path does not exist
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
