/**
 * doxygen-md - Errors
 *
 * Error classes raised by the converter and the CLI configuration layer.
 */

export class DoxygenMdError extends Error {
  constructor(
    public code: string,
    message: string,
    public hint?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DoxygenMdError';
  }
}

/**
 * Error codes with their standard hints
 */
export const ERROR_HINTS = {
  DOXYGEN_MD_MALFORMED_INPUT: 'Input is not well-formed XML - check that the file is Doxygen XML output',
  DOXYGEN_MD_INVALID_CONFIG: 'Invalid options - check values and try again',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

/**
 * Raised when the input text cannot be parsed as XML at all
 */
export class MalformedInputError extends DoxygenMdError {
  constructor(diagnostic: string, cause?: unknown) {
    super(
      'DOXYGEN_MD_MALFORMED_INPUT',
      `Input is not valid XML Doxygen output: ${diagnostic}`,
      ERROR_HINTS.DOXYGEN_MD_MALFORMED_INPUT,
      { cause }
    );
    this.name = 'MalformedInputError';
  }
}

/**
 * Create a DoxygenMdError with standardized code and hint
 */
export function createDoxygenMdError(code: ErrorCode, message: string, cause?: unknown): DoxygenMdError {
  return new DoxygenMdError(code, message, ERROR_HINTS[code], { cause });
}

/**
 * Check if an error is a DoxygenMdError
 */
export function isDoxygenMdError(error: unknown): error is DoxygenMdError {
  return error instanceof DoxygenMdError;
}

/**
 * Maps errors to CLI exit codes
 */
export function getExitCode(error: unknown): number {
  if (isDoxygenMdError(error) && error.code === 'DOXYGEN_MD_INVALID_CONFIG') {
    return 2;
  }
  return 1;
}
