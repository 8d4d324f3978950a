import type { Cardinality, ErLayout, LayoutEntity, Relationship } from './er-types.js';
import type { IRenderer } from './interfaces.js';
import { Canvas } from './canvas.js';
import { attributeText } from './er-layout.js';
import { displayWidth } from './utils.js';

const LEFT_END: Record<Cardinality, string> = {
  'exactly-one': '||',
  'zero-or-one': 'o|',
  'one-or-many': '}|',
  'zero-or-many': '}o',
};

const RIGHT_END: Record<Cardinality, string> = {
  'exactly-one': '||',
  'zero-or-one': '|o',
  'one-or-many': '|{',
  'zero-or-many': 'o{',
};

export class ErAsciiRenderer implements IRenderer<ErLayout> {
  render(layout: ErLayout): string {
    return renderEr(layout);
  }
}

export function renderEr(layout: ErLayout): string {
  const canvas = new Canvas(layout.width, layout.height);
  const byName = new Map(layout.entities.map((e) => [e.name, e]));

  for (const entity of layout.entities) drawEntity(canvas, entity);
  for (const rel of layout.relationships) {
    const from = byName.get(rel.from);
    const to = byName.get(rel.to);
    if (from && to) drawRelationship(canvas, rel, from, to);
  }
  return canvas.render();
}

function border(canvas: Canvas, row: number, x: number, right: number, left: string, end: string): void {
  canvas.set(row, x, left);
  canvas.hline(row, x + 1, right - 1, '─');
  canvas.set(row, right, end);
}

function drawEntity(canvas: Canvas, entity: LayoutEntity): void {
  const { x, y } = entity;
  const right = x + entity.width - 1;
  const row = (r: number, text: string) => {
    canvas.set(r, x, '│');
    canvas.write(r, x + 2, text);
    canvas.set(r, right, '│');
  };

  border(canvas, y, x, right, '┌', '┐');
  row(y + 1, entity.name);
  if (entity.attributes.length > 0) {
    border(canvas, y + 2, x, right, '├', '┤');
    entity.attributes.forEach((attr, i) => row(y + 3 + i, attributeText(attr)));
  }
  border(canvas, y + entity.height - 1, x, right, '└', '┘');
}

function drawRelationship(canvas: Canvas, rel: Relationship, from: LayoutEntity, to: LayoutEntity): void {
  const fromRight = from.x + from.width;
  const toLeft = to.x;
  // Relationships within one rank or pointing back are not drawn
  if (toLeft - fromRight < 4) return;

  const horiz = rel.identifying ? '─' : '╌';
  const gap = toLeft - fromRight;
  const labelWidth = displayWidth(rel.label);

  if (from.centerY === to.centerY) {
    const row = from.centerY;
    canvas.hline(row, fromRight, toLeft - 1, horiz);
    canvas.write(row, fromRight, LEFT_END[rel.leftCard]);
    canvas.write(row, toLeft - 2, RIGHT_END[rel.rightCard]);
    if (gap > labelWidth) canvas.write(row, fromRight + Math.floor((gap - labelWidth) / 2), rel.label);
    return;
  }

  const vert = rel.identifying ? '│' : '┊';
  const mid = fromRight + Math.floor(gap / 2);
  const down = from.centerY < to.centerY;
  for (let col = fromRight; col < mid; col++) canvas.merge(from.centerY, col, horiz);
  canvas.merge(from.centerY, mid, down ? '┐' : '┘');
  const [top, bottom] = down ? [from.centerY, to.centerY] : [to.centerY, from.centerY];
  for (let r = top + 1; r < bottom; r++) canvas.merge(r, mid, vert);
  canvas.merge(to.centerY, mid, down ? '└' : '┌');
  for (let col = mid + 1; col < toLeft; col++) canvas.merge(to.centerY, col, horiz);

  canvas.write(from.centerY, fromRight, LEFT_END[rel.leftCard]);
  canvas.write(to.centerY, toLeft - 2, RIGHT_END[rel.rightCard]);
  // Above the upper of the two runs, clear of the bend
  if (gap > labelWidth) canvas.write(top - 1, fromRight + Math.floor((gap - labelWidth) / 2), rel.label);
}
