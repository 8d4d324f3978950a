import type { GraphLayout, LayoutNode, LayoutSubgraph, Edge, EdgeLine } from './types.js';
import type { IRenderer } from './interfaces.js';
import { Canvas, Dir, glyphForMask } from './canvas.js';
import { displayWidth, splitLines } from './utils.js';

const VERTICAL: Record<EdgeLine, string> = { solid: '│', dotted: '┊', thick: '║' };
const HORIZONTAL: Record<EdgeLine, string> = { solid: '─', dotted: '╌', thick: '═' };

const CORNERS = {
  box: ['┌', '┐', '└', '┘'],
  round: ['╭', '╮', '╰', '╯'],
  circle: ['╭', '╮', '╰', '╯'],
  diamond: ['╱', '╲', '╲', '╱'],
} as const;

export class GraphAsciiRenderer implements IRenderer<GraphLayout> {
  render(layout: GraphLayout): string {
    return renderGraph(layout);
  }
}

export function renderGraph(layout: GraphLayout): string {
  const canvas = new Canvas(layout.width, layout.height);
  const byId = new Map(layout.nodes.map((n) => [n.id, n]));

  for (const sg of layout.subgraphs) drawSubgraph(canvas, sg);
  for (const node of layout.nodes) drawNode(canvas, node);

  const resolved = layout.edges.flatMap((edge) => {
    const from = byId.get(edge.from);
    const to = byId.get(edge.to);
    return from && to ? [{ edge, from, to }] : [];
  });
  if (layout.direction === 'TD') drawTDEdges(canvas, resolved, titleCells(layout.subgraphs));
  else resolved.forEach((r) => drawLREdge(canvas, r));

  return canvas.render();
}

function drawNode(canvas: Canvas, node: LayoutNode): void {
  const [tl, tr, bl, br] = CORNERS[node.shape];
  const right = node.x + node.width - 1;
  const bottom = node.y + node.height - 1;
  const centered = node.shape === 'round' || node.shape === 'circle';

  canvas.set(node.y, node.x, tl);
  canvas.hline(node.y, node.x + 1, right - 1, '─');
  canvas.set(node.y, right, tr);

  splitLines(node.label).forEach((line, i) => {
    const row = node.y + 1 + i;
    canvas.set(row, node.x, '│');
    const pad = centered ? Math.floor((node.width - 2 - displayWidth(line)) / 2) + 1 : 2;
    canvas.write(row, node.x + pad, line);
    canvas.set(row, right, '│');
  });

  canvas.set(bottom, node.x, bl);
  canvas.hline(bottom, node.x + 1, right - 1, '─');
  canvas.set(bottom, right, br);
}

function drawSubgraph(canvas: Canvas, sg: LayoutSubgraph): void {
  const right = sg.x + sg.width - 1;
  const bottom = sg.y + sg.height - 1;
  const titleEnd = sg.x + 3 + displayWidth(sg.label);

  canvas.set(sg.y, sg.x, '┌');
  canvas.set(sg.y, sg.x + 1, '─');
  canvas.write(sg.y, sg.x + 3, sg.label);
  canvas.hline(sg.y, titleEnd + 1, right - 1, '─');
  canvas.set(sg.y, right, '┐');

  for (let row = sg.y + 1; row < bottom; row++) {
    canvas.set(row, sg.x, '│');
    canvas.set(row, right, '│');
  }

  canvas.set(bottom, sg.x, '└');
  canvas.hline(bottom, sg.x + 1, right - 1, '─');
  canvas.set(bottom, right, '┘');
}

/** Cells of each subgraph title, including the blank on either side of it. */
function titleCells(subgraphs: LayoutSubgraph[]): Set<string> {
  const cells = new Set<string>();
  for (const sg of subgraphs) {
    const titleEnd = sg.x + 3 + displayWidth(sg.label);
    for (let col = sg.x + 2; col <= titleEnd; col++) cells.add(`${sg.y}:${col}`);
  }
  return cells;
}

interface Resolved {
  edge: Edge;
  from: LayoutNode;
  to: LayoutNode;
}

function head(edge: Edge, arrowGlyph: string, vertical: boolean): string {
  if (edge.arrow) return arrowGlyph;
  return vertical ? VERTICAL[edge.line] : HORIZONTAL[edge.line];
}

function mergeVertical(canvas: Canvas, col: number, from: number, to: number, glyph: string, skip?: Set<string>): void {
  for (let row = from; row <= to; row++) {
    if (!skip?.has(`${row}:${col}`)) canvas.merge(row, col, glyph);
  }
}

function mergeHorizontal(canvas: Canvas, row: number, from: number, to: number, glyph: string): void {
  for (let col = from; col <= to; col++) canvas.merge(row, col, glyph);
}

/**
 * A horizontal bar joining `up` columns (lines arriving from above) with
 * `down` columns (lines leaving below).
 */
function drawBar(canvas: Canvas, row: number, up: number[], down: number[]): void {
  const cols = [...up, ...down];
  const lo = Math.min(...cols);
  const hi = Math.max(...cols);
  for (let col = lo; col <= hi; col++) {
    let mask = 0;
    if (col > lo) mask |= Dir.L;
    if (col < hi) mask |= Dir.R;
    if (up.includes(col)) mask |= Dir.U;
    if (down.includes(col)) mask |= Dir.D;
    const glyph = glyphForMask(mask);
    if (glyph) canvas.merge(row, col, glyph);
  }
}

function drawTDEdges(canvas: Canvas, edges: Resolved[], titles: Set<string>): void {
  // Only edges into a lower rank are drawn
  const forward = edges.filter(({ from, to }) => to.y >= from.y + from.height);
  const outgoing = (id: string) => forward.filter((r) => r.from.id === id);
  const incoming = (id: string) => forward.filter((r) => r.to.id === id);
  const fannedOut = new Set<string>();
  const fannedIn = new Set<string>();

  for (const { edge, from, to } of forward) {
    const fromBelow = from.y + from.height;
    const toAbove = to.y - 1;
    const vert = VERTICAL[edge.line];

    canvas.set(fromBelow - 1, from.centerX, '┬');

    const siblings = outgoing(from.id);
    const parents = incoming(to.id);
    if (siblings.length > 1) {
      if (!fannedOut.has(from.id)) {
        drawBar(canvas, fromBelow, [from.centerX], siblings.map((r) => r.to.centerX));
        fannedOut.add(from.id);
      }
      mergeVertical(canvas, to.centerX, fromBelow + 1, toAbove - 1, vert, titles);
      if (edge.label) canvas.write(toAbove, to.centerX + 2, edge.label);
    } else if (parents.length > 1) {
      const barRow = toAbove - 1;
      if (!fannedIn.has(to.id)) {
        drawBar(canvas, barRow, parents.map((r) => r.from.centerX), [to.centerX]);
        fannedIn.add(to.id);
      }
      mergeVertical(canvas, from.centerX, fromBelow, barRow - 1, vert, titles);
      if (edge.label) canvas.write(toAbove, to.centerX + 2, edge.label);
    } else if (from.centerX === to.centerX) {
      if (edge.label) {
        canvas.write(fromBelow, from.centerX - Math.floor(displayWidth(edge.label) / 2), edge.label);
        mergeVertical(canvas, from.centerX, fromBelow + 1, toAbove - 1, vert, titles);
      } else {
        mergeVertical(canvas, from.centerX, fromBelow, toAbove - 1, vert, titles);
      }
    } else {
      // Step sideways on the row below the source, then down into the target
      const rightward = to.centerX > from.centerX;
      canvas.merge(fromBelow, from.centerX, rightward ? '└' : '┘');
      const lo = Math.min(from.centerX, to.centerX);
      const hi = Math.max(from.centerX, to.centerX);
      mergeHorizontal(canvas, fromBelow, lo + 1, hi - 1, '─');
      canvas.merge(fromBelow, to.centerX, rightward ? '┐' : '┌');
      mergeVertical(canvas, to.centerX, fromBelow + 1, toAbove - 1, vert, titles);
      if (edge.label) canvas.write(toAbove, to.centerX + 2, edge.label);
    }
    if (!titles.has(`${toAbove}:${to.centerX}`)) canvas.set(toAbove, to.centerX, head(edge, '▼', true));
  }
}

function drawLREdge(canvas: Canvas, { edge, from, to }: Resolved): void {
  const fromRight = from.x + from.width;
  const toLeft = to.x;
  if (toLeft <= fromRight) return;
  const horiz = HORIZONTAL[edge.line];

  if (from.centerY === to.centerY) {
    const row = from.centerY;
    mergeHorizontal(canvas, row, fromRight, toLeft - 1, horiz);
    if (edge.arrow) canvas.set(row, toLeft - 1, '>');
    if (edge.label) {
      const gap = toLeft - fromRight;
      canvas.write(row - 1, fromRight + Math.floor(Math.max(0, gap - displayWidth(edge.label)) / 2), edge.label);
    }
    return;
  }

  // L-shaped route through the column halfway between the two boxes
  const mid = fromRight + Math.floor((toLeft - fromRight) / 2);
  const vert = VERTICAL[edge.line];
  mergeHorizontal(canvas, from.centerY, fromRight, mid - 1, horiz);
  if (from.centerY < to.centerY) {
    canvas.merge(from.centerY, mid, '┐');
    mergeVertical(canvas, mid, from.centerY + 1, to.centerY - 1, vert);
    canvas.merge(to.centerY, mid, '└');
  } else {
    canvas.merge(from.centerY, mid, '┘');
    mergeVertical(canvas, mid, to.centerY + 1, from.centerY - 1, vert);
    canvas.merge(to.centerY, mid, '┌');
  }
  mergeHorizontal(canvas, to.centerY, mid + 1, toLeft - 1, horiz);
  if (edge.arrow) canvas.set(to.centerY, toLeft - 1, '>');

  if (edge.label) {
    const gap = mid - fromRight;
    if (gap > 0) {
      canvas.write(from.centerY - 1, fromRight + Math.floor(Math.max(0, gap - displayWidth(edge.label)) / 2), edge.label);
    }
  }
}
