import { describe, it, expect } from 'vitest';
import { buildErModel } from './er-builder.js';
import { layoutEr, layoutErWithMaxWidth, entitySize } from './er-layout.js';
import { renderEr } from './er-renderer.js';
import { LayoutError } from '../core/errorBuilder.js';
import type { ErDiagram } from './er-types.js';

function diagram(text: string): ErDiagram {
  const { model, errors } = buildErModel(text);
  if (!model) throw new Error(`parse failed: ${errors.map((e) => e.message).join('; ')}`);
  return model;
}

function draw(text: string): string[] {
  return renderEr(layoutEr(diagram(text))).split('\n');
}

describe('buildErModel', () => {
  it('registers entities once, in first-seen order', () => {
    const d = diagram('erDiagram\nCUSTOMER ||--o{ ORDER : places\nORDER ||--|{ LINE-ITEM : contains');
    expect(d.entities.map((e) => e.name)).toEqual(['CUSTOMER', 'ORDER', 'LINE-ITEM']);
    expect(d.relationships[1]).toEqual({
      from: 'ORDER',
      to: 'LINE-ITEM',
      leftCard: 'exactly-one',
      rightCard: 'one-or-many',
      label: 'contains',
      identifying: true,
    });
  });

  it('reads non-identifying links and quoted labels', () => {
    const rel = diagram('erDiagram\nA }o..|o B : "may have"').relationships[0];
    expect([rel.leftCard, rel.rightCard, rel.identifying, rel.label]).toEqual([
      'zero-or-many',
      'zero-or-one',
      false,
      'may have',
    ]);
  });

  it('keeps multi-word labels as written', () => {
    expect(diagram('erDiagram\nA ||--|| B : belongs to').relationships[0].label).toBe('belongs to');
  });

  it('rejects a cardinality written for the other side', () => {
    const { model, errors } = buildErModel('erDiagram\nA |{--|| B : x');
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ code: 'ER-CARDINALITY-SIDE', severity: 'error', line: 2, column: 3 });
    expect(model?.relationships[0].leftCard).toBe('exactly-one');
  });

  it('accumulates attributes across repeated blocks', () => {
    const d = diagram('erDiagram\nCUSTOMER {\n  string name PK\n  int id PK, FK "the key"\n}\nCUSTOMER {\n  string email\n}');
    expect(d.entities).toEqual([
      {
        name: 'CUSTOMER',
        attributes: [
          { type: 'string', name: 'name', keys: ['PK'] },
          { type: 'int', name: 'id', keys: ['PK', 'FK'] },
          { type: 'string', name: 'email', keys: [] },
        ],
      },
    ]);
  });

  it('requires the header', () => {
    const { model, errors } = buildErModel('CUSTOMER ||--o{ ORDER : places');
    expect(model).toBeUndefined();
    expect(errors[0].severity).toBe('error');
  });
});

describe('layoutEr', () => {
  it('sizes entities by their widest row', () => {
    expect(entitySize({ name: 'A', attributes: [] })).toEqual({ width: 5, height: 3 });
    expect(entitySize({ name: 'A', attributes: [{ type: 'int', name: 'id', keys: ['PK'] }] })).toEqual({
      width: 13,
      height: 5,
    });
  });

  it('widens the gap to fit a label and both cardinality ends', () => {
    const layout = layoutEr(diagram('erDiagram\nCUSTOMER ||--o{ ORDER : places'));
    expect(layout.entities.map((e) => e.x)).toEqual([0, 26]);
    expect(layout.width).toBe(35);
  });

  it('falls back to compact spacing under a width limit', () => {
    const d = diagram('erDiagram\nCUSTOMER ||--o{ ORDER : places');
    expect(layoutErWithMaxWidth(d, 32).width).toBe(31);
  });

  it('reports the compact width when even that does not fit', () => {
    const d = diagram('erDiagram\nCUSTOMER ||--o{ ORDER : places');
    expect(() => layoutErWithMaxWidth(d, 20)).toThrow(LayoutError);
    try {
      layoutErWithMaxWidth(d, 20);
    } catch (e) {
      if (e instanceof LayoutError) expect([e.code, e.minWidth]).toEqual(['TOO_WIDE', 31]);
    }
  });

  it('fails on a diagram without entities', () => {
    expect(() => layoutEr({ entities: [], relationships: [] })).toThrow('no entities found');
  });
});

describe('renderEr', () => {
  it('draws a relationship with cardinality ends and a centred label', () => {
    const lines = draw('erDiagram\nCUSTOMER ||--o{ ORDER : places');
    expect(lines[0]).toBe('┌──────────┐              ┌───────┐');
    expect(lines[1]).toBe('│ CUSTOMER │||──places──o{│ ORDER │');
  });

  it('dashes a non-identifying relationship', () => {
    expect(draw('erDiagram\nA ||..|{ B : has')[1]).toBe('│ A │||╌╌has╌╌|{│ B │');
  });

  it('lists attributes under a separator', () => {
    expect(draw('erDiagram\nCUSTOMER {\n  string name PK\n}')).toEqual([
      '┌────────────────┐',
      '│ CUSTOMER       │',
      '├────────────────┤',
      '│ string name PK │',
      '└────────────────┘',
    ]);
  });

  it('routes between rows with a bend that joins the other line', () => {
    const lines = draw('erDiagram\nA ||--o{ B : x\nC ||--o{ B : y');
    expect(lines[1]).toBe('│ A │||──x─┬──o{│ B │');
    expect(lines[3]).toBe('          │');
    expect(lines[5]).toBe('│ C │||───┘');
  });
});
