import type { DiagramType, ValidationError } from './types.js';
import { codeFrame } from './diagnostics.js';

export type OutputFormat = 'text' | 'json';

export function groupErrors(errors: ValidationError[]) {
  const errs = errors.filter((e) => e.severity === 'error');
  const warns = errors.filter((e) => e.severity === 'warning');
  return { errs, warns };
}

/**
 * Human-readable diagnostics with a caret-underlined snippet. Errors raised
 * by layout carry no source position and print without a snippet.
 */
export function textReport(filename: string, content: string, errors: ValidationError[], color = true): string {
  const { errs, warns } = groupErrors(errors);
  const paint = (code: string, s: string) => (color ? `\x1b[${code}m${s}\x1b[0m` : s);
  const lines: string[] = [];

  const block = (e: ValidationError) => {
    const kind = e.severity === 'error' ? paint('31', 'ERROR') : paint('33', 'WARNING');
    const code = e.code ? ` (${e.code})` : '';
    lines.push(`${kind}: ${e.message}`);
    if (e.code && /^[A-Z_]+$/.test(e.code)) {
      lines.push(`in ${filename}${code}`);
    } else {
      lines.push(`at ${filename}:${e.line}:${e.column}${code}`);
      lines.push(codeFrame(content, e.line, e.column, e.length ?? 1));
    }
    if (e.hint) lines.push(`hint: ${e.hint}`);
    lines.push('');
  };

  errs.forEach(block);
  warns.forEach(block);
  return lines.join('\n').trimEnd();
}

export interface DiagramJson {
  type: DiagramType;
  /** 1-based line where the diagram starts in its file */
  line: number;
  ok: boolean;
  output?: string;
  errors: ValidationError[];
  warnings: ValidationError[];
}

export function toDiagramJson(
  type: DiagramType,
  line: number,
  output: string,
  errors: ValidationError[]
): DiagramJson {
  const { errs, warns } = groupErrors(errors);
  const ok = errs.length === 0;
  return ok
    ? { type, line, ok, output, errors: errs, warnings: warns }
    : { type, line, ok, errors: errs, warnings: warns };
}

export function toJsonResult(filename: string, diagrams: DiagramJson[]) {
  const errorCount = diagrams.reduce((n, d) => n + d.errors.length, 0);
  return {
    file: filename,
    ok: errorCount === 0,
    diagramCount: diagrams.length,
    errorCount,
    warningCount: diagrams.reduce((n, d) => n + d.warnings.length, 0),
    diagrams,
  };
}
