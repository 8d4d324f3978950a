// Text measurement shared by every layout engine and renderer.

import stringWidth from 'string-width';

const LINE_BREAK = /<br\s*\/?>/i;
const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Terminal columns occupied by `text` (wide CJK = 2, combining marks = 0). */
export function displayWidth(text: string): number {
  return stringWidth(text, { ambiguousIsNarrow: true });
}

/** Split a label on `<br>`, `<br/>` or `<br />` (any case). */
export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

export function multilineWidth(text: string): number {
  return Math.max(0, ...splitLines(text).map(displayWidth));
}

export function lineCount(text: string): number {
  return splitLines(text).length;
}

/** Grapheme clusters of `text`, each paired with its display width. */
export function segmentGraphemes(text: string): Array<{ text: string; width: number }> {
  const out: Array<{ text: string; width: number }> = [];
  for (const { segment } of graphemes.segment(text)) {
    out.push({ text: segment, width: displayWidth(segment) });
  }
  return out;
}

/**
 * Shorten a single line so it fits `width` columns, marking the cut with `…`.
 * Lines that already fit are returned untouched.
 */
export function truncateToWidth(line: string, width: number): string {
  if (displayWidth(line) <= width) return line;
  let used = 0;
  let kept = '';
  for (const g of segmentGraphemes(line)) {
    if (used + g.width > width - 1) break;
    kept += g.text;
    used += g.width;
  }
  return kept + '…';
}

/** Apply {@link truncateToWidth} to every line of a multi-line label. */
export function truncateLabel(text: string, width: number): string {
  return splitLines(text).map((l) => truncateToWidth(l, width)).join('<br/>');
}
