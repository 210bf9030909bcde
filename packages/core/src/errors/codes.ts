/**
 * Error Code Infrastructure
 * Stable error codes and process exit codes.
 */

// Stable error codes grouped by domain
export enum ErrorCode {
  // Input Errors (E100–E199)
  INVALID_INPUT = 'E100',

  // Verification Errors (E200–E299)
  RESULT_VERIFICATION_FAILED = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Export Errors (E400–E499)
  EXPORT_FAILED = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_INPUT]: 10,
  [ErrorCode.RESULT_VERIFICATION_FAILED]: 20,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.EXPORT_FAILED]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
