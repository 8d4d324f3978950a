import { displayWidth, segmentGraphemes } from './utils.js';

/**
 * One grid cell. A glyph wider than one column is followed by
 * `width - 1` continuation cells that are never printed.
 */
export type Cell =
  | { kind: 'blank' }
  | { kind: 'glyph'; ch: string; width: number }
  | { kind: 'continuation' };

const BLANK: Cell = { kind: 'blank' };
const CONTINUATION: Cell = { kind: 'continuation' };

const L = 1;
const R = 2;
const U = 4;
const D = 8;

/** Connection bits: left, right, up, down. */
export const Dir = { L, R, U, D } as const;

const GLYPH_MASKS: Readonly<Record<string, number>> = {
  '─': L | R, '═': L | R, '╌': L | R,
  '│': U | D, '║': U | D, '┊': U | D,
  '┌': R | D, '┐': L | D, '└': R | U, '┘': L | U,
  '┬': L | R | D, '┴': L | R | U, '├': U | D | R, '┤': U | D | L,
  '┼': L | R | U | D,
};

const MASK_GLYPHS: ReadonlyMap<number, string> = new Map([
  [L | R, '─'], [U | D, '│'],
  [R | D, '┌'], [L | D, '┐'], [R | U, '└'], [L | U, '┘'],
  [L | R | D, '┬'], [L | R | U, '┴'], [U | D | R, '├'], [U | D | L, '┤'],
  [L | R | U | D, '┼'],
]);

/** Direction mask of a box-drawing glyph; 0 for anything else. */
export function connectionsOf(ch: string): number {
  return GLYPH_MASKS[ch] ?? 0;
}

/** Light glyph for a connection mask, if one exists. */
export function glyphForMask(mask: number): string | undefined {
  return MASK_GLYPHS.get(mask);
}

/** Glyph that joins `existing` and `incoming` into one connector. */
export function mergeGlyphs(existing: string, incoming: string): string {
  if (existing === incoming) return incoming;
  const have = connectionsOf(existing);
  if (have === 0) return incoming;
  return MASK_GLYPHS.get(have | connectionsOf(incoming)) ?? incoming;
}

/** Fixed-size character grid addressed by (row, col). */
export class Canvas {
  private readonly rows: Cell[][];

  constructor(readonly width: number, readonly height: number) {
    this.rows = [];
    for (let r = 0; r < height; r++) {
      this.rows.push(Array.from({ length: width }, () => BLANK));
    }
  }

  /** Printed character at a cell: a space for blanks, '' for continuations. */
  get(row: number, col: number): string {
    if (!this.inBounds(row, col)) return '';
    const cell = this.rows[row][col];
    if (cell.kind === 'glyph') return cell.ch;
    return cell.kind === 'blank' ? ' ' : '';
  }

  set(row: number, col: number, ch: string): void {
    if (!this.inBounds(row, col)) return;
    const width = Math.max(1, displayWidth(ch));
    this.place(row, col, { kind: 'glyph', ch, width });
    for (let j = 1; j < width; j++) {
      if (this.inBounds(row, col + j)) this.place(row, col + j, CONTINUATION);
    }
  }

  /** Write `text` left to right; wide graphemes advance by their width. */
  write(row: number, col: number, text: string): void {
    let offset = 0;
    for (const g of segmentGraphemes(text)) {
      if (g.width === 0) continue;
      this.set(row, col + offset, g.text);
      offset += g.width;
    }
  }

  /** Set a connector glyph, joining it with a connector already in the cell. */
  merge(row: number, col: number, ch: string): void {
    if (!this.inBounds(row, col)) return;
    const cell = this.rows[row][col];
    this.set(row, col, cell.kind === 'glyph' ? mergeGlyphs(cell.ch, ch) : ch);
  }

  /** Horizontal run, both ends inclusive. */
  hline(row: number, from: number, to: number, ch: string): void {
    for (let c = from; c <= to; c++) this.set(row, c, ch);
  }

  /** Vertical run, both ends inclusive. */
  vline(col: number, from: number, to: number, ch: string): void {
    for (let r = from; r <= to; r++) this.set(r, col, ch);
  }

  clear(row: number, from: number, to: number): void {
    for (let c = from; c <= to; c++) {
      if (this.inBounds(row, c)) this.place(row, c, BLANK);
    }
  }

  render(): string {
    return this.rows
      .map((cells) =>
        cells
          .map((cell) => (cell.kind === 'glyph' ? cell.ch : cell.kind === 'blank' ? ' ' : ''))
          .join('')
          .trimEnd()
      )
      .join('\n');
  }

  private inBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.height && col >= 0 && col < this.width;
  }

  // Overwrites a cell without leaving half of a wide glyph behind.
  private place(row: number, col: number, cell: Cell): void {
    const cells = this.rows[row];
    const existing = cells[col];
    if (existing.kind === 'continuation') {
      let owner = col - 1;
      while (owner >= 0 && cells[owner].kind === 'continuation') owner--;
      for (let c = Math.max(0, owner); c < col; c++) cells[c] = BLANK;
      for (let c = col + 1; c < cells.length && cells[c].kind === 'continuation'; c++) cells[c] = BLANK;
    } else if (existing.kind === 'glyph' && existing.width > 1) {
      for (let c = col + 1; c < col + existing.width && c < cells.length; c++) {
        if (cells[c].kind === 'continuation') cells[c] = BLANK;
      }
    }
    cells[col] = cell;
  }
}
