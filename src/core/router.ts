import type { DiagramType, ValidationError } from './types.js';
import type { ParseResult } from './pipeline.js';
import type { SequenceModel } from '../renderer/sequence-types.js';
import type { Graph } from '../renderer/types.js';
import type { ErDiagram } from '../renderer/er-types.js';
import { buildSequenceModel } from '../renderer/sequence-builder.js';
import { buildGraphModel } from '../renderer/graph-builder.js';
import { buildErModel } from '../renderer/er-builder.js';

function firstNonCommentLine(text: string): string | undefined {
  for (const line of text.split(/\r?\n/)) {
    const t = line.trim();
    if (!t || t.startsWith('%%')) continue;
    return t;
  }
  return undefined;
}

export function detectDiagramType(text: string): DiagramType {
  const header = firstNonCommentLine(text);
  if (!header) return 'unknown';

  if (/^(flowchart|graph)\b/i.test(header)) return 'flowchart';
  if (/^erDiagram\b/.test(header)) return 'er';
  if (/^sequenceDiagram\b/.test(header)) return 'sequence';
  return 'unknown';
}

export type ParsedDiagram =
  | { type: 'sequence'; model: SequenceModel }
  | { type: 'flowchart'; model: Graph }
  | { type: 'er'; model: ErDiagram };

function settle<T>(result: ParseResult<T>, wrap: (model: T) => ParsedDiagram): { diagram?: ParsedDiagram; errors: ValidationError[] } {
  return result.model === undefined ? { errors: result.errors } : { diagram: wrap(result.model), errors: result.errors };
}

/**
 * Parse `text` with the grammar its header names. Text without a known
 * header goes to the sequence grammar, whose header is optional.
 */
export function parseDiagram(text: string): { type: DiagramType; diagram?: ParsedDiagram; errors: ValidationError[] } {
  const type = detectDiagramType(text);
  switch (type) {
    case 'flowchart':
      return { type, ...settle(buildGraphModel(text), (model) => ({ type, model })) };
    case 'er':
      return { type, ...settle(buildErModel(text), (model) => ({ type, model })) };
    default:
      return { type, ...settle(buildSequenceModel(text), (model) => ({ type: 'sequence', model })) };
  }
}
