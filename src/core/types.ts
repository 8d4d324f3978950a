export interface ValidationError {
  line: number;
  column: number;
  message: string;
  severity: 'error' | 'warning';
  code?: string;
  hint?: string;
  length?: number;
}

export type DiagramType = 'flowchart' | 'sequence' | 'er' | 'unknown';

export interface RenderOptions {
  /** Maximum output width in terminal columns. Unset means unconstrained. */
  maxWidth?: number;
}

export interface RenderResult {
  /** Rendered grid; empty when `errors` holds an error. */
  output: string;
  type: DiagramType;
  errors: ValidationError[];
}

export type RenderOutcome =
  | { ok: true; text: string }
  | { ok: false; error: string };
