import { describe, it, expect } from 'vitest';
import { buildGraphModel } from './graph-builder.js';
import { layoutGraph } from './graph-layout.js';
import { renderGraph } from './graph-renderer.js';

function draw(text: string): string[] {
  const { model, errors } = buildGraphModel(text);
  if (!model) throw new Error(`parse failed: ${errors.map((e) => e.message).join('; ')}`);
  return renderGraph(layoutGraph(model)).split('\n');
}

describe('renderGraph top-down', () => {
  it('draws a chain with an arrow into the lower node', () => {
    expect(draw('graph TD\nA[Start] --> B[End]')).toEqual([
      '┌───────┐',
      '│ Start │',
      '└───┬───┘',
      '    │',
      '    ▼',
      ' ┌─────┐',
      ' │ End │',
      ' └─────┘',
    ]);
  });

  it('branches one source to several targets over a shared bar', () => {
    expect(draw('graph TD\nA --> B\nA --> C')).toEqual([
      '    ┌───┐',
      '    │ A │',
      '    └─┬─┘',
      '  ┌───┴───┐',
      '  ▼       ▼',
      '┌───┐   ┌───┐',
      '│ B │   │ C │',
      '└───┘   └───┘',
    ]);
  });

  it('joins several sources into one arrow', () => {
    const lines = draw('graph TD\nA --> C\nB --> C');
    expect(lines.slice(2, 5)).toEqual(['└─┬─┘   └─┬─┘', '  └───┬───┘', '      ▼']);
  });

  it('writes a label directly below the source', () => {
    const lines = draw('graph TD\nA -->|yes| B');
    expect(lines.slice(3, 5)).toEqual([' yes', '  ▼']);
  });

  it('draws each shape with its own corners', () => {
    expect(draw('graph TD\nA(Round)').slice(0, 3)).toEqual(['╭───────╮', '│ Round │', '╰───────╯']);
    expect(draw('graph TD\nA{Yes}').slice(0, 3)).toEqual(['╱─────╲', '│ Yes │', '╲─────╱']);
    expect(draw('graph TD\nA((Hi))').slice(0, 2)).toEqual(['╭────────╮', '│   Hi   │']);
  });

  it('frames subgraph members under a titled border', () => {
    expect(draw('graph TD\nsubgraph S [Group]\nA --> B\nend')).toEqual([
      '┌─ Group ─┐',
      '│         │',
      '│ ┌───┐   │',
      '│ │ A │   │',
      '│ └─┬─┘   │',
      '│   │     │',
      '│   ▼     │',
      '│ ┌───┐   │',
      '│ │ B │   │',
      '│ └───┘   │',
      '│         │',
      '└─────────┘',
    ]);
  });
});

describe('renderGraph left-right', () => {
  it('draws a straight arrow between boxes on one row', () => {
    expect(draw('graph LR\nA --> B')).toEqual(['┌───┐     ┌───┐', '│ A │────>│ B │', '└───┘     └───┘']);
  });

  it('writes a label above a straight edge', () => {
    expect(draw('graph LR\nA -->|yes| B')[0]).toBe('┌───┐ yes ┌───┐');
  });

  it('uses the dotted glyph for dotted links', () => {
    expect(draw('graph LR\nA -.- B')[1]).toBe('│ A │╌╌╌╌╌│ B │');
  });
});

describe('renderGraph routing', () => {
  it('routes a left-right edge to a lower node through an L-bend', () => {
    expect(draw('graph LR\nA --> B\nA --> C')).toEqual([
      '┌───┐     ┌───┐',
      '│ A │──┬─>│ B │',
      '└───┘  │  └───┘',
      '       │',
      '       │',
      '       │  ┌───┐',
      '       └─>│ C │',
      '          └───┘',
    ]);
  });

  it('passes a top-down edge under a subgraph title without overwriting it', () => {
    const lines = draw('graph TD\nsubgraph one\nA-->B\nend\nsubgraph two\nC\nend\nB-->C');
    expect(lines.slice(10, 17)).toEqual([
      '│   │   │',
      '└───┼───┘',
      '    │',
      '    │',
      '┌─ two ─┐',
      '│   ▼   │',
      '│ ┌───┐ │',
    ]);
  });
});

