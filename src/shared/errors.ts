export type PdfToolErrorCode =
  | 'NotFound'
  | 'InvalidFormat'
  | 'NoInvoicesDetected'
  | 'EmptyDocument'
  | 'MissingCapability'
  | 'UnsupportedFormat'
  | 'InvalidBoundaryRule'
  | 'InvalidReplacement';

export interface PdfToolErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Every failure the splitting and editing pipelines surface to callers.
 * Inspect `code` rather than the message.
 */
export class PdfToolError extends Error {
  readonly code: PdfToolErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: PdfToolErrorCode, message: string, options: PdfToolErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PdfToolError';
    this.code = code;
    this.context = options.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

export function isPdfToolError(error: unknown, code?: PdfToolErrorCode): error is PdfToolError {
  if (!(error instanceof PdfToolError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
