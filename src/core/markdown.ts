import type { ValidationError } from './types.js';

export interface DiagramBlock {
  content: string;
  /** 1-based line of the first content line, just below the opening fence */
  startLine: number;
  /** 1-based line of the closing fence, or one past the end when unclosed */
  endLine: number;
  /** Info string after the opening fence */
  info: string;
}

const FENCE_RE = /^\s{0,3}(`{3,}|~{3,})\s*([^`\n]*)$/;
const DIAGRAM_LANGS = new Set(['mermaid', 'mmd']);

function isDiagramInfo(info: string): boolean {
  return DIAGRAM_LANGS.has((info.split(/\s+/)[0] ?? '').toLowerCase());
}

/** Fenced ```mermaid blocks of a Markdown document, in order. */
export function extractDiagramBlocks(text: string): DiagramBlock[] {
  const lines = text.split(/\r?\n/);
  const blocks: DiagramBlock[] = [];
  let i = 0;
  while (i < lines.length) {
    const open = FENCE_RE.exec(lines[i]);
    const info = (open?.[2] ?? '').trim();
    if (!open || !isDiagramInfo(info)) {
      i++;
      continue;
    }
    // Closed by a fence of the same character at least as long as the opener
    const fence = open[1];
    const close = new RegExp(`^\\s{0,3}${fence[0]}{${fence.length},}\\s*$`);
    const startLine = i + 2;
    const body: string[] = [];
    i++;
    while (i < lines.length && !close.test(lines[i])) body.push(lines[i++]);
    blocks.push({ content: body.join('\n'), startLine, endLine: i + 1, info });
    i++;
  }
  return blocks;
}

export function offsetErrors(errors: ValidationError[], lineOffset: number): ValidationError[] {
  if (!lineOffset) return errors;
  return errors.map((e) => ({ ...e, line: e.line + lineOffset }));
}

/**
 * Every diagram in a file: its fenced blocks, or the whole text when it has
 * none and is not Markdown.
 */
export function diagramSources(text: string, markdown = false): Array<{ content: string; lineOffset: number }> {
  const blocks = extractDiagramBlocks(text);
  if (blocks.length === 0) return markdown ? [] : [{ content: text, lineOffset: 0 }];
  return blocks.map((b) => ({ content: b.content, lineOffset: b.startLine - 1 }));
}
