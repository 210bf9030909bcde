/**
 * Error hierarchy for subarray-lab
 * Provides structured error handling with context and suggestions
 */

import { ErrorCode, getExitCode as _getExitCode } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  index?: number; // Element index inside a sequence
  setting?: string; // Configuration key (e.g., 'sizes')
  path?: string; // File system path involved in an export
  value?: unknown; // Problematic value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface SubarrayErrorParams {
  message: string;
  errorCode?: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
  suggestions?: string[];
}

/**
 * Base error class for all subarray-lab errors
 */
export abstract class SubarrayError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly context?: ErrorContext;
  public suggestions?: string[];

  protected constructor(params: SubarrayErrorParams, fallback: ErrorCode) {
    super(params.message, params.cause ? { cause: params.cause } : undefined);
    this.name = this.constructor.name;
    this.errorCode = params.errorCode ?? fallback;
    this.context = params.context;
    this.suggestions = params.suggestions;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const cause = this.cause instanceof Error ? this.cause : undefined;
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      context: this.context,
      cause: cause ? { name: cause.name, message: cause.message } : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Engine input errors (absent or empty sequence, malformed element)
 */
export class InvalidInputError extends SubarrayError {
  constructor(params: SubarrayErrorParams) {
    super(params, ErrorCode.INVALID_INPUT);
  }

  get index(): number | undefined {
    return this.context?.index;
  }
}

/**
 * A computed result that does not satisfy the subarray invariants
 */
export class VerificationError extends SubarrayError {
  public readonly issues: readonly string[];

  constructor(params: SubarrayErrorParams & { issues: readonly string[] }) {
    super(
      {
        ...params,
        context: { issues: [...params.issues], ...(params.context ?? {}) },
      },
      ErrorCode.RESULT_VERIFICATION_FAILED
    );
    this.issues = params.issues;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends SubarrayError {
  constructor(params: SubarrayErrorParams) {
    super(params, ErrorCode.CONFIGURATION_ERROR);
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Artifact writing errors
 */
export class ExportError extends SubarrayError {
  constructor(params: SubarrayErrorParams) {
    super(params, ErrorCode.EXPORT_FAILED);
  }

  get path(): string | undefined {
    return this.context?.path;
  }
}

/**
 * Unexpected failures that do not belong to a known category
 */
export class InternalError extends SubarrayError {
  constructor(params: SubarrayErrorParams) {
    super(params, ErrorCode.INTERNAL_ERROR);
  }
}

export function isSubarrayError(error: unknown): error is SubarrayError {
  return error instanceof SubarrayError;
}
