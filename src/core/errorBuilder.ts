import type { IToken } from 'chevrotain';
import type { ValidationError } from './types.js';
import { coercePos } from './diagnostics.js';

type Common = {
  code?: string;
  hint?: string;
  length?: number;
};

export function errorAt(line: number | null | undefined, column: number | null | undefined, message: string, extra: Common = {}): ValidationError {
  const pos = coercePos(line, column);
  return { line: pos.line, column: pos.column, message, severity: 'error', ...extra };
}

export function errorAtToken(tok: IToken | undefined, message: string, extra: Common = {}): ValidationError {
  return errorAt(tok?.startLine, tok?.startColumn, message, { length: tok?.image.length, ...extra });
}

export function warningAtToken(tok: IToken | undefined, message: string, extra: Common = {}): ValidationError {
  const pos = coercePos(tok?.startLine, tok?.startColumn);
  return { line: pos.line, column: pos.column, message, severity: 'warning', length: tok?.image.length, ...extra };
}

export type LayoutErrorCode = 'EMPTY_DIAGRAM' | 'TOO_WIDE' | 'SUBGRAPH_TOO_WIDE';

/** Raised by layout engines; carries the smallest width that would fit when known. */
export class LayoutError extends Error {
  constructor(
    readonly code: LayoutErrorCode,
    message: string,
    readonly minWidth?: number
  ) {
    super(message);
    this.name = 'LayoutError';
  }
}

export function fromLayoutError(err: LayoutError): ValidationError {
  const hint =
    err.code === 'EMPTY_DIAGRAM'
      ? 'Declare at least one element below the diagram header.'
      : err.minWidth !== undefined
        ? `Use a width of at least ${err.minWidth} columns.`
        : 'Use a larger width or split the diagram.';
  return { line: 1, column: 1, message: err.message, severity: 'error', code: err.code, hint };
}
