import type { SequenceLayout, SequenceRow, MessageRow, NoteRow, FrameRow, ParticipantBox, ArrowMarker } from './sequence-types.js';
import type { IRenderer } from './interfaces.js';
import { Canvas } from './canvas.js';
import { splitLines, lineCount, displayWidth } from './utils.js';

const LIGHT_V = '│';
const HEAVY_V = '┃';
const H = '─';
const CROSS = '┼';
const SELF_LOOP_ARM = 4;
const DESTROY_MARK = '●';

export function rowHeight(row: SequenceRow): number {
  switch (row.kind) {
    case 'message':
    case 'note':
      return 2 + lineCount(row.text);
    default:
      return 1;
  }
}

export class SequenceAsciiRenderer implements IRenderer<SequenceLayout> {
  render(layout: SequenceLayout): string {
    return renderSequence(layout);
  }
}

export function renderSequence(layout: SequenceLayout): string {
  const boxH = Math.max(3, ...layout.participants.map((p) => p.height));
  const body = layout.rows.reduce((n, r) => n + rowHeight(r), 0);
  const canvas = new Canvas(layout.width, boxH + body + boxH);

  drawBoxes(canvas, layout.participants, 0, boxH, true, []);

  const alive = layout.participants.map(() => true);
  const openFrames = new Map<number, FrameRow>();
  let y = boxH;
  layout.rows.forEach((row, i) => {
    const active = layout.activations[i] ?? [];
    const h = rowHeight(row);
    switch (row.kind) {
      case 'message':
        drawLifelines(canvas, layout.participants, y, h, active, alive);
        drawMessage(canvas, row, y, active);
        drawFrameSides(canvas, openFrames, y, h);
        break;
      case 'note':
        drawLifelines(canvas, layout.participants, y, h, active, alive);
        drawNote(canvas, row, y);
        drawFrameSides(canvas, openFrames, y, h);
        break;
      case 'destroy':
        drawLifelines(canvas, layout.participants, y, h, active, alive);
        drawFrameSides(canvas, openFrames, y, h);
        canvas.set(y, row.col, DESTROY_MARK);
        alive[row.participant] = false;
        break;
      case 'blockStart':
        drawFrameSides(canvas, openFrames, y, h);
        drawFrameRow(canvas, layout.participants, alive, row, y, '┌', '┐');
        openFrames.set(row.frame, row);
        break;
      case 'blockDivider':
        drawFrameSides(canvas, openFrames, y, h, row.frame);
        drawFrameRow(canvas, layout.participants, alive, row, y, '├', '┤');
        break;
      case 'blockEnd':
        openFrames.delete(row.frame);
        drawFrameSides(canvas, openFrames, y, h);
        drawFrameRow(canvas, layout.participants, alive, row, y, '└', '┘');
        break;
    }
    y += h;
  });

  drawBoxes(canvas, layout.participants, boxH + body, boxH, false, layout.destroyed);
  return canvas.render();
}

function drawBoxes(canvas: Canvas, boxes: ParticipantBox[], y: number, boxH: number, top: boolean, skip: boolean[]): void {
  boxes.forEach((p, i) => {
    if (skip[i]) return;
    const bottom = y + boxH - 1;
    canvas.set(y, p.left, '┌');
    canvas.hline(y, p.left + 1, p.right - 1, H);
    canvas.set(y, p.right, '┐');
    const lines = splitLines(p.name);
    for (let li = 0; li < boxH - 2; li++) {
      canvas.set(y + 1 + li, p.left, LIGHT_V);
      if (li < lines.length) canvas.write(y + 1 + li, p.left + 2, lines[li]);
      canvas.set(y + 1 + li, p.right, LIGHT_V);
    }
    canvas.set(bottom, p.left, '└');
    canvas.hline(bottom, p.left + 1, p.right - 1, H);
    canvas.set(bottom, p.right, '┘');
    if (top) canvas.set(bottom, p.center, '┬');
    else canvas.set(y, p.center, '┴');
  });
}

function lifeline(active: boolean[], i: number): string {
  return active[i] ? HEAVY_V : LIGHT_V;
}

function drawLifelines(canvas: Canvas, boxes: ParticipantBox[], y: number, h: number, active: boolean[], alive: boolean[]): void {
  boxes.forEach((p, i) => {
    if (!alive[i]) return;
    canvas.vline(p.center, y, y + h - 1, lifeline(active, i));
  });
}

function headGlyph(marker: ArrowMarker, dir: 'ltr' | 'rtl'): string | undefined {
  switch (marker) {
    case 'arrow': return dir === 'ltr' ? '>' : '<';
    case 'open': return dir === 'ltr' ? ')' : '(';
    case 'cross': return 'x';
    case 'none': return undefined;
  }
}

function drawMessage(canvas: Canvas, msg: MessageRow, y: number, active: boolean[]): void {
  if (msg.fromIdx === msg.toIdx) {
    drawSelfMessage(canvas, msg, y, active);
    return;
  }
  const left = Math.min(msg.fromCol, msg.toCol);
  const right = Math.max(msg.fromCol, msg.toCol);
  const lines = splitLines(msg.text);
  lines.forEach((line, i) => canvas.write(y + i, left + 2, line));

  const arrowY = y + lines.length;
  for (let col = left + 1; col < right; col++) {
    const dashed = msg.line === 'dotted' && (col - left - 1) % 2 === 1;
    canvas.set(arrowY, col, dashed ? ' ' : H);
  }
  const head = headGlyph(msg.marker, msg.direction);
  if (msg.direction === 'ltr') {
    if (head) canvas.set(arrowY, right - 1, head);
  } else {
    if (head) canvas.set(arrowY, left + 1, head);
    canvas.set(arrowY, right - 1, H);
  }
  const leftIdx = msg.fromCol < msg.toCol ? msg.fromIdx : msg.toIdx;
  const rightIdx = msg.fromCol < msg.toCol ? msg.toIdx : msg.fromIdx;
  canvas.set(arrowY, left, lifeline(active, leftIdx));
  canvas.set(arrowY, right, lifeline(active, rightIdx));
}

function drawSelfMessage(canvas: Canvas, msg: MessageRow, y: number, active: boolean[]): void {
  const center = msg.fromCol;
  const armEnd = center + SELF_LOOP_ARM;
  const lines = splitLines(msg.text);
  lines.forEach((line, i) => canvas.write(y + i, center + 2, line));

  const armY = y + lines.length;
  canvas.hline(armY, center + 1, armEnd - 1, H);
  canvas.set(armY, armEnd, '┐');

  const returnY = armY + 1;
  canvas.set(returnY, center + 1, headGlyph(msg.marker, 'rtl') ?? H);
  canvas.hline(returnY, center + 2, armEnd - 1, H);
  canvas.set(returnY, armEnd, '┘');

  canvas.vline(center, y, y + lines.length + 1, lifeline(active, msg.fromIdx));
}

function drawNote(canvas: Canvas, note: NoteRow, y: number): void {
  const lines = splitLines(note.text);
  canvas.set(y, note.left, '┌');
  canvas.hline(y, note.left + 1, note.right - 1, H);
  canvas.set(y, note.right, '┐');
  lines.forEach((line, i) => {
    const row = y + 1 + i;
    canvas.set(row, note.left, LIGHT_V);
    canvas.clear(row, note.left + 1, note.right - 1);
    canvas.write(row, note.left + 2, line);
    canvas.set(row, note.right, LIGHT_V);
  });
  const bottom = y + 1 + lines.length;
  canvas.set(bottom, note.left, '└');
  canvas.hline(bottom, note.left + 1, note.right - 1, H);
  canvas.set(bottom, note.right, '┘');
}

function drawFrameRow(
  canvas: Canvas,
  boxes: ParticipantBox[],
  alive: boolean[],
  row: FrameRow,
  y: number,
  leftCorner: string,
  rightCorner: string
): void {
  canvas.set(y, row.left, leftCorner);
  canvas.hline(y, row.left + 1, row.right - 1, H);
  canvas.set(y, row.right, rightCorner);
  const labelEnd = row.label ? row.left + 2 + displayWidth(row.label) : row.left;
  if (row.label) canvas.write(y, row.left + 2, row.label);
  boxes.forEach((p, i) => {
    if (!alive[i]) return;
    if (p.center > row.left && p.center < row.right && p.center >= labelEnd) {
      canvas.set(y, p.center, CROSS);
    }
  });
}

function drawFrameSides(canvas: Canvas, frames: Map<number, FrameRow>, y: number, h: number, except?: number): void {
  for (const frame of frames.values()) {
    if (frame.frame === except) continue;
    canvas.vline(frame.left, y, y + h - 1, LIGHT_V);
    canvas.vline(frame.right, y, y + h - 1, LIGHT_V);
  }
}
