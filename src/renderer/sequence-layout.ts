import type {
  SequenceModel,
  Statement,
  Message,
  Note,
  ParticipantBox,
  SequenceRow,
  SequenceLayout,
  FrameRow,
} from './sequence-types.js';
import { multilineWidth, lineCount, truncateLabel } from './utils.js';
import { LayoutError } from '../core/errorBuilder.js';
import type { ILayoutEngine } from './interfaces.js';

const MIN_GAP = 10;
const BOX_PAD = 4;           // "│ " + " │"
const MESSAGE_PAD = 4;       // arrow decoration + margin around message text
const NOTE_PAD = 4;
const NOTE_OFFSET = 2;       // distance between a lifeline and a left/right note
const SELF_LOOP_ARM = 4;
const MIN_NAME_WIDTH = 2;

/** Ordered participant ids and their (possibly truncated) display names. */
export interface ParticipantContext {
  readonly ids: readonly string[];
  readonly names: ReadonlyMap<string, string>;
  readonly index: ReadonlyMap<string, number>;
}

type FlatItem =
  | { kind: 'message'; msg: Message; text: string }
  | { kind: 'note'; note: Note }
  | { kind: 'activate'; actor: string }
  | { kind: 'deactivate'; actor: string }
  | { kind: 'destroy'; actor: string }
  | { kind: 'frame'; row: 'blockStart' | 'blockDivider' | 'blockEnd'; frame: number; depth: number; label: string };

interface FlattenState {
  numbered: boolean;
  counter: number;
  frames: number;
  out: FlatItem[];
}

export function participantContext(model: SequenceModel, names?: ReadonlyMap<string, string>): ParticipantContext {
  const ids: string[] = [];
  const index = new Map<string, number>();
  const display = new Map<string, string>();
  const touch = (id: string, name?: string) => {
    if (index.has(id)) return;
    index.set(id, ids.length);
    ids.push(id);
    display.set(id, names?.get(id) ?? name ?? id);
  };
  for (const p of model.participants) touch(p.id, p.display);
  walk(model.statements, (s) => {
    if (s.kind === 'message') { touch(s.msg.from); touch(s.msg.to); }
    else if (s.kind === 'note') s.note.actors.forEach((a) => touch(a));
    else if (s.kind === 'participant') touch(s.id, s.display);
    else if (s.kind === 'activate' || s.kind === 'deactivate' || s.kind === 'destroy') touch(s.actor);
  });
  return { ids, names: display, index };
}

function walk(statements: Statement[], visit: (s: Statement) => void): void {
  for (const s of statements) {
    visit(s);
    if (s.kind === 'block') walk(s.body, visit);
    if (s.kind === 'branching') {
      walk(s.body, visit);
      for (const b of s.branches) walk(b.body, visit);
    }
  }
}

function hasAutonumber(statements: Statement[]): boolean {
  let found = false;
  walk(statements, (s) => { if (s.kind === 'autonumber') found = true; });
  return found;
}

function flattenInto(statements: Statement[], depth: number, st: FlattenState): void {
  for (const s of statements) {
    switch (s.kind) {
      case 'message': {
        const text = st.numbered ? `${++st.counter}. ${s.msg.text}` : s.msg.text;
        st.out.push({ kind: 'message', msg: s.msg, text });
        break;
      }
      case 'note':
        st.out.push({ kind: 'note', note: s.note });
        break;
      case 'activate':
      case 'deactivate':
      case 'destroy':
        st.out.push({ kind: s.kind, actor: s.actor });
        break;
      case 'block':
      case 'branching': {
        const frame = st.frames++;
        st.out.push({ kind: 'frame', row: 'blockStart', frame, depth, label: frameLabel(s.block, s.title) });
        flattenInto(s.body, depth + 1, st);
        if (s.kind === 'branching') {
          for (const b of s.branches) {
            st.out.push({ kind: 'frame', row: 'blockDivider', frame, depth, label: frameLabel(b.kind, b.title) });
            flattenInto(b.body, depth + 1, st);
          }
        }
        st.out.push({ kind: 'frame', row: 'blockEnd', frame, depth, label: '' });
        break;
      }
      case 'participant':
      case 'autonumber':
        break;
    }
  }
}

function frameLabel(keyword: string, title: string): string {
  return title ? `${keyword} ${title}` : keyword;
}

function flatten(model: SequenceModel): FlatItem[] {
  const st: FlattenState = { numbered: hasAutonumber(model.statements), counter: 0, frames: 0, out: [] };
  flattenInto(model.statements, 0, st);
  return st.out;
}

function nameWidth(ctx: ParticipantContext, i: number): number {
  return multilineWidth(ctx.names.get(ctx.ids[i]) ?? '');
}

/** Gap floor that keeps two neighbouring boxes apart, ignoring content. */
export function structuralGaps(ctx: ParticipantContext): number[] {
  const gaps: number[] = [];
  for (let i = 0; i + 1 < ctx.ids.length; i++) {
    const left = Math.floor(nameWidth(ctx, i) / 2) + 2;
    const right = Math.floor(nameWidth(ctx, i + 1) / 2) + 2;
    gaps.push(left + right + 2);
  }
  return gaps;
}

function spread(gaps: number[], from: number, to: number, required: number): void {
  const span = to - from;
  if (span <= 0) return;
  const perGap = Math.ceil(required / span);
  for (let g = from; g < to; g++) gaps[g] = Math.max(gaps[g], perGap);
}

function raise(gaps: number[], g: number, required: number): void {
  if (g >= 0 && g < gaps.length) gaps[g] = Math.max(gaps[g], required);
}

/** Centre-to-centre gaps that fit every message, note and self-loop. */
function demandGaps(items: FlatItem[], ctx: ParticipantContext): number[] {
  const gaps = new Array<number>(Math.max(0, ctx.ids.length - 1)).fill(MIN_GAP);
  for (const item of items) {
    if (item.kind === 'message') {
      const a = ctx.index.get(item.msg.from);
      const b = ctx.index.get(item.msg.to);
      if (a === undefined || b === undefined) continue;
      const tw = multilineWidth(item.text);
      if (a === b) raise(gaps, a, tw + MESSAGE_PAD);
      else spread(gaps, Math.min(a, b), Math.max(a, b), tw + MESSAGE_PAD);
    } else if (item.kind === 'note') {
      const idx = item.note.actors.map((id) => ctx.index.get(id)).filter((i): i is number => i !== undefined);
      if (idx.length === 0) continue;
      const w = multilineWidth(item.note.text) + NOTE_PAD;
      const lo = Math.min(...idx);
      const hi = Math.max(...idx);
      if (item.note.pos === 'rightOf') raise(gaps, lo, w + NOTE_PAD);
      else if (item.note.pos === 'leftOf') raise(gaps, lo - 1, w + NOTE_PAD);
      else if (lo === hi) {
        raise(gaps, lo - 1, Math.ceil(w / 2) + 2);
        raise(gaps, lo, Math.ceil(w / 2) + 2);
      } else spread(gaps, lo, hi, w);
    }
  }
  const floor = structuralGaps(ctx);
  return gaps.map((g, i) => Math.max(g, floor[i]));
}

function placeBoxes(ctx: ParticipantContext, gaps: number[], origin: number): ParticipantBox[] {
  const boxes: ParticipantBox[] = [];
  let center = 0;
  ctx.ids.forEach((id, i) => {
    const name = ctx.names.get(id) ?? id;
    const w = multilineWidth(name) + BOX_PAD;
    center = i === 0 ? origin + Math.floor(w / 2) : center + gaps[i - 1];
    boxes.push({
      id,
      name,
      center,
      left: center - Math.floor(w / 2),
      right: center + Math.floor((w - 1) / 2),
      height: 2 + lineCount(name),
    });
  });
  return boxes;
}

function noteBounds(note: Note, ctx: ParticipantContext, boxes: ParticipantBox[]): { left: number; right: number } | undefined {
  const centers = note.actors
    .map((id) => ctx.index.get(id))
    .filter((i): i is number => i !== undefined)
    .map((i) => boxes[i].center);
  if (centers.length === 0) return undefined;
  const w = multilineWidth(note.text) + NOTE_PAD;
  const lo = Math.min(...centers);
  const hi = Math.max(...centers);
  if (note.pos === 'rightOf') return { left: lo + NOTE_OFFSET, right: lo + NOTE_OFFSET + w - 1 };
  if (note.pos === 'leftOf') return { left: lo - NOTE_OFFSET - w + 1, right: lo - NOTE_OFFSET };
  if (lo === hi) {
    const left = lo - Math.floor(w / 2);
    return { left, right: left + w - 1 };
  }
  let left = lo - 1;
  let right = hi + 1;
  const extra = w - (right - left + 1);
  if (extra > 0) {
    left -= Math.floor(extra / 2);
    right += extra - Math.floor(extra / 2);
  }
  return { left, right };
}

/** Frames start just outside the outer lifelines, inset by nesting depth. */
function frameBounds(items: FlatItem[], boxes: ParticipantBox[]): Map<number, { left: number; right: number }> {
  const first = boxes[0];
  const last = boxes[boxes.length - 1];
  const bounds = new Map<number, { left: number; right: number }>();
  for (const item of items) {
    if (item.kind !== 'frame' || bounds.has(item.frame)) continue;
    bounds.set(item.frame, {
      left: Math.min(first.left + item.depth, first.center - 1),
      right: Math.max(last.right - item.depth, last.center + 1),
    });
  }
  return bounds;
}

interface RowPass {
  rows: SequenceRow[];
  activations: boolean[][];
  destroyed: boolean[];
}

function buildRows(items: FlatItem[], ctx: ParticipantContext, boxes: ParticipantBox[]): RowPass {
  const depth = new Array<number>(ctx.ids.length).fill(0);
  const destroyed = new Array<boolean>(ctx.ids.length).fill(false);
  const frames = frameBounds(items, boxes);
  const rows: SequenceRow[] = [];
  const activations: boolean[][] = [];
  const snapshot = () => activations.push(depth.map((d) => d > 0));
  const dec = (i: number | undefined) => { if (i !== undefined) depth[i] = Math.max(0, depth[i] - 1); };

  for (const item of items) {
    switch (item.kind) {
      case 'activate': {
        const i = ctx.index.get(item.actor);
        if (i !== undefined) depth[i]++;
        break;
      }
      case 'deactivate':
        dec(ctx.index.get(item.actor));
        break;
      case 'message': {
        const from = ctx.index.get(item.msg.from);
        const to = ctx.index.get(item.msg.to);
        if (from === undefined || to === undefined) break;
        if (item.msg.activateTarget) depth[to]++;
        rows.push({
          kind: 'message',
          fromIdx: from,
          toIdx: to,
          fromCol: boxes[from].center,
          toCol: boxes[to].center,
          text: item.text,
          line: item.msg.line,
          marker: item.msg.marker,
          direction: from <= to ? 'ltr' : 'rtl',
        });
        snapshot();
        if (item.msg.deactivateSource) dec(from);
        break;
      }
      case 'note': {
        const b = noteBounds(item.note, ctx, boxes);
        if (!b) break;
        rows.push({ kind: 'note', left: b.left, right: b.right, text: item.note.text });
        snapshot();
        break;
      }
      case 'destroy': {
        const i = ctx.index.get(item.actor);
        if (i === undefined) break;
        rows.push({ kind: 'destroy', participant: i, col: boxes[i].center });
        snapshot();
        destroyed[i] = true;
        break;
      }
      case 'frame': {
        const b = frames.get(item.frame);
        if (!b) break;
        const row: FrameRow = { kind: item.row, frame: item.frame, left: b.left, right: b.right, label: item.label };
        rows.push(row);
        snapshot();
        break;
      }
    }
  }
  containFrames(rows);
  return { rows, activations, destroyed };
}

/**
 * Columns a frame around `row` must stay outside of: one column clear of a
 * lifeline, two clear of a drawn note or self-loop.
 */
function clearance(row: SequenceRow): { left: number; right: number } {
  switch (row.kind) {
    case 'message': {
      const extent = rowExtent(row);
      return { left: extent.left - 1, right: extent.right + (row.fromIdx === row.toIdx ? 2 : 1) };
    }
    case 'note':
      return { left: row.left - 2, right: row.right + 2 };
    case 'destroy':
      return { left: row.col - 1, right: row.col + 1 };
    default:
      return { left: row.left - 1, right: row.right + 1 };
  }
}

/** Widen every frame to enclose its rows and labels, nested frames included. */
function containFrames(rows: SequenceRow[]): void {
  const open: Array<{ frame: number; left: number; right: number; rows: FrameRow[] }> = [];
  const widen = (span: { left: number; right: number }) => {
    for (const f of open) {
      f.left = Math.min(f.left, span.left);
      f.right = Math.max(f.right, span.right);
    }
  };

  for (const row of rows) {
    switch (row.kind) {
      case 'blockStart':
        open.push({ frame: row.frame, left: row.left, right: row.right, rows: [row] });
        break;
      case 'blockDivider':
        open.find((f) => f.frame === row.frame)?.rows.push(row);
        break;
      case 'blockEnd': {
        const closed = open.pop();
        if (!closed) break;
        closed.rows.push(row);
        const label = Math.max(...closed.rows.map((r) => multilineWidth(r.label)));
        closed.right = Math.max(closed.right, closed.left + label + 3);
        for (const r of closed.rows) {
          r.left = closed.left;
          r.right = closed.right;
        }
        widen(clearance(row));
        break;
      }
      default:
        widen(clearance(row));
    }
  }
}

function rowExtent(row: SequenceRow): { left: number; right: number } {
  switch (row.kind) {
    case 'message':
      if (row.fromIdx === row.toIdx) {
        return { left: row.fromCol, right: Math.max(row.fromCol + SELF_LOOP_ARM, row.fromCol + 1 + multilineWidth(row.text)) };
      }
      return { left: Math.min(row.fromCol, row.toCol), right: Math.max(row.fromCol, row.toCol) };
    case 'note':
    case 'blockStart':
    case 'blockDivider':
    case 'blockEnd':
      return { left: row.left, right: row.right };
    case 'destroy':
      return { left: row.col, right: row.col };
  }
}

function assemble(items: FlatItem[], ctx: ParticipantContext, gaps: number[]): SequenceLayout {
  let boxes = placeBoxes(ctx, gaps, 0);
  let pass = buildRows(items, ctx, boxes);
  const minLeft = Math.min(0, ...pass.rows.map((r) => rowExtent(r).left));
  if (minLeft < 0) {
    boxes = placeBoxes(ctx, gaps, -minLeft);
    pass = buildRows(items, ctx, boxes);
  }
  const width = Math.max(
    ...boxes.map((b) => b.right + 1),
    ...pass.rows.map((r) => rowExtent(r).right + 1)
  );
  return { participants: boxes, ...pass, width };
}

/** Lay out a sequence diagram with no width limit. */
export function layoutSequence(model: SequenceModel): SequenceLayout {
  const ctx = participantContext(model);
  if (ctx.ids.length === 0) throw new LayoutError('EMPTY_DIAGRAM', 'no participants found');
  const items = flatten(model);
  return assemble(items, ctx, demandGaps(items, ctx));
}

/** Width spanned by the participant boxes alone. */
function boxSpan(ctx: ParticipantContext, gaps: number[]): number {
  const boxes = placeBoxes(ctx, gaps, 0);
  return boxes[boxes.length - 1].right - boxes[0].left + 1;
}

/**
 * Pull gaps toward their floors in proportion to each gap's slack, removing
 * at most `excess` columns in total.
 */
export function shrinkGaps(gaps: number[], floors: number[], excess: number): number[] {
  const slack = gaps.map((g, i) => Math.max(0, g - floors[i]));
  const total = slack.reduce((a, b) => a + b, 0);
  const cut = Math.min(excess, total);
  if (cut <= 0) return gaps.slice();
  const take = slack.map((s) => Math.floor((cut * s) / total));
  let left = cut - take.reduce((a, b) => a + b, 0);
  const byRemaining = slack
    .map((s, i) => ({ i, rest: s - take[i] }))
    .sort((a, b) => b.rest - a.rest || a.i - b.i);
  for (const { i, rest } of byRemaining) {
    if (left === 0) break;
    if (rest > 0) { take[i]++; left--; }
  }
  return gaps.map((g, i) => g - take[i]);
}

/**
 * Lay out within `maxWidth` columns: shrink gaps first, then shorten the
 * longest participant name one column at a time.
 */
export function layoutSequenceWithMaxWidth(model: SequenceModel, maxWidth: number): SequenceLayout {
  const base = participantContext(model);
  if (base.ids.length === 0) throw new LayoutError('EMPTY_DIAGRAM', 'no participants found');
  const items = flatten(model);
  const names = new Map(base.names);

  for (;;) {
    const ctx = participantContext(model, names);
    let gaps = demandGaps(items, ctx);
    let span = boxSpan(ctx, gaps);
    if (span > maxWidth) {
      gaps = shrinkGaps(gaps, structuralGaps(ctx), span - maxWidth);
      span = boxSpan(ctx, gaps);
    }
    if (span <= maxWidth) {
      const layout = assemble(items, ctx, gaps);
      return { ...layout, width: Math.min(layout.width, maxWidth) };
    }

    let longest: string | undefined;
    let longestWidth = MIN_NAME_WIDTH;
    for (const id of ctx.ids) {
      const w = multilineWidth(names.get(id) ?? id);
      if (w > longestWidth) { longest = id; longestWidth = w; }
    }
    if (longest === undefined) {
      throw new LayoutError(
        'TOO_WIDE',
        `diagram needs at least ${span} columns but only ${maxWidth} are available`,
        span
      );
    }
    names.set(longest, truncateLabel(names.get(longest) ?? longest, longestWidth - 1));
  }
}

export class SequenceLayoutEngine implements ILayoutEngine<SequenceModel, SequenceLayout> {
  layout(model: SequenceModel, maxWidth?: number): SequenceLayout {
    return maxWidth === undefined ? layoutSequence(model) : layoutSequenceWithMaxWidth(model, maxWidth);
  }
}
