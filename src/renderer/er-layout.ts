import type { Entity, ErDiagram, ErLayout, LayoutEntity } from './er-types.js';
import type { ILayoutEngine } from './interfaces.js';
import { assignRanks, groupByRank } from './ranks.js';
import { displayWidth } from './utils.js';
import { LayoutError } from '../core/errorBuilder.js';

const ENTITY_VERTICAL_GAP = 1;

interface ErSpacing {
  /** Smallest gap between adjacent ranks */
  minGap: number;
  /** Added to a crossing label's width; leaves room for both cardinality ends */
  labelPad: number;
}

const DEFAULT_SPACING: ErSpacing = { minGap: 10, labelPad: 8 };
const COMPACT_SPACING: ErSpacing = { minGap: 6, labelPad: 4 };

export function attributeText(attr: Entity['attributes'][number]): string {
  return [attr.type, attr.name, attr.keys.join(',')].filter((s) => s.length > 0).join(' ');
}

export function entitySize(entity: Entity): { width: number; height: number } {
  const widest = Math.max(displayWidth(entity.name), ...entity.attributes.map((a) => displayWidth(attributeText(a))));
  return {
    width: widest + 4,
    // top, name, bottom; attributes add a separator plus one row each
    height: entity.attributes.length === 0 ? 3 : 4 + entity.attributes.length,
  };
}

export function layoutEr(diagram: ErDiagram, spacing: ErSpacing = DEFAULT_SPACING): ErLayout {
  if (diagram.entities.length === 0) {
    throw new LayoutError('EMPTY_DIAGRAM', 'no entities found');
  }

  const names = diagram.entities.map((e) => e.name);
  const rankOf = assignRanks(names, diagram.relationships);
  const byName = new Map(diagram.entities.map((e) => [e.name, e]));
  const ranks = groupByRank(names, rankOf);

  const entities: LayoutEntity[] = [];
  let x = 0;
  ranks.forEach((rank, i) => {
    let y = 0;
    let widest = 0;
    for (const name of rank) {
      const entity = byName.get(name);
      if (!entity) continue;
      const { width, height } = entitySize(entity);
      entities.push({ ...entity, x, y, width, height, centerY: y + 1 });
      y += height + ENTITY_VERTICAL_GAP;
      widest = Math.max(widest, width);
    }

    const next = ranks[i + 1];
    if (!next) return;
    const here = rankOf.get(rank[0]);
    const there = rankOf.get(next[0]);
    const gap = diagram.relationships
      .filter((r) => rankOf.get(r.from) === here && rankOf.get(r.to) === there)
      .reduce((g, r) => Math.max(g, displayWidth(r.label) + spacing.labelPad), spacing.minGap);
    x += widest + gap;
  });

  const width = entities.reduce((w, e) => Math.max(w, e.x + e.width), 0);
  const height = entities.reduce((h, e) => Math.max(h, e.y + e.height), 0);
  return { entities, relationships: diagram.relationships, width, height };
}

export function layoutErWithMaxWidth(diagram: ErDiagram, maxWidth: number): ErLayout {
  const full = layoutEr(diagram);
  if (full.width <= maxWidth) return full;
  const compact = layoutEr(diagram, COMPACT_SPACING);
  if (compact.width <= maxWidth) return compact;
  throw new LayoutError(
    'TOO_WIDE',
    `diagram needs at least ${compact.width} columns but only ${maxWidth} are available`,
    compact.width
  );
}

export class ErLayoutEngine implements ILayoutEngine<ErDiagram, ErLayout> {
  layout(diagram: ErDiagram, maxWidth?: number): ErLayout {
    return maxWidth === undefined ? layoutEr(diagram) : layoutErWithMaxWidth(diagram, maxWidth);
  }
}
