/**
 * ErrorPresenter - pure presentation layer for SubarrayError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  SerializedError,
  SubarrayError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  details?: string[];
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

const MAX_EXCERPT_LENGTH = 80;

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: SubarrayError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: this.#formatExcerpt(error.context),
      details: this.#formatDetails(error),
      workaround: error.suggestions?.[0],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  formatForLog(error: SubarrayError): SerializedError {
    return error.toJSON(this._env);
  }

  #formatTitle(error: SubarrayError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (typeof ctx.path === 'string') return `Location: ${ctx.path}`;
    if (typeof ctx.setting === 'string') return `Setting: ${ctx.setting}`;
    if (typeof ctx.index === 'number') return `Index: ${ctx.index}`;
    return undefined;
  }

  #formatExcerpt(ctx?: ErrorContext): string | undefined {
    if (!ctx || !('value' in ctx)) return undefined;
    const serialized = JSON.stringify(ctx.value) ?? String(ctx.value);
    return serialized.length > MAX_EXCERPT_LENGTH
      ? `${serialized.slice(0, MAX_EXCERPT_LENGTH - 1)}…`
      : serialized;
  }

  #formatDetails(error: SubarrayError): string[] | undefined {
    const issues = error.context?.issues;
    if (!Array.isArray(issues)) return undefined;
    return issues.filter((issue): issue is string => typeof issue === 'string');
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}
