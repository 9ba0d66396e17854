/**
 * @file Error types and helpers for type-safe error handling throughout the application.
 *       Fatal conditions are thrown as the error classes below; non-fatal conditions are
 *       collected as warning values and reported alongside results.
 */

/**
 * Safely extracts error message from unknown error type
 * @param error - The error object (unknown type)
 * @returns A string representation of the error message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }

  return String(error);
}

/**
 * Safely extracts error stack trace from unknown error type
 * @returns Stack trace string or undefined if not available
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }

  if (error && typeof error === 'object' && 'stack' in error) {
    return String(error.stack);
  }

  return undefined;
}

export function formatError(error: unknown): { message: string; stack?: string } {
  return {
    message: getErrorMessage(error),
    stack: getErrorStack(error),
  };
}

/**
 * Logs an error with consistent formatting
 * @param logger - Logger instance with error method
 * @param message - Log message
 * @param error - The error object (unknown type)
 * @param additionalContext - Additional context to include
 */
export function logError(
  logger: { error: (message: string, context?: Record<string, unknown>) => void },
  message: string,
  error: unknown,
  additionalContext?: Record<string, unknown>
): void {
  const errorInfo = formatError(error);
  logger.error(message, {
    error: errorInfo.message,
    stack: errorInfo.stack,
    ...additionalContext,
  });
}

/**
 * Required columns are absent from an input table. Raised before anything is written.
 */
export class SchemaError extends Error {
  constructor(
    public readonly table: string,
    public readonly missingColumns: string[]
  ) {
    super(`${table} is missing required column(s): ${missingColumns.join(', ')}`);
    this.name = 'SchemaError';
  }
}

export class TableIOError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly operation: 'read' | 'write',
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Failed to ${operation} '${filePath}': ${message}`);
    this.name = 'TableIOError';
  }
}

/**
 * The external traffic assignment engine failed to start or exited unsuccessfully.
 */
export class EngineError extends Error {
  constructor(
    public readonly workingDir: string,
    message: string,
    public readonly exitCode: number | null = null,
    public readonly stderrTail: string[] = [],
    public readonly originalError?: unknown
  ) {
    super(`Simulation engine failed in '${workingDir}': ${message}`);
    this.name = 'EngineError';
  }
}

export class PatchFileError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    public readonly validationErrors: string[] = []
  ) {
    super(`Invalid patch file '${filePath}': ${message}`);
    this.name = 'PatchFileError';
  }
}

export type PatchMismatchReason = 'missing-key' | 'no-match';

export interface PatchMismatchWarning {
  kind: 'patch-mismatch';
  reason: PatchMismatchReason;
  /** Position of the patch in the submitted list. */
  patchIndex: number;
  message: string;
}

export interface MissingMetricWarning {
  kind: 'missing-metric';
  metric: string;
  missingFrom: Array<'baseline' | 'modified'>;
  message: string;
}

export type AnalysisWarning = PatchMismatchWarning | MissingMetricWarning;
