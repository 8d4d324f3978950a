import { describe, it, expect } from 'vitest';
import { AsciiRenderer, describeError, render, renderDiagram, renderWithOptions } from './index.js';
import type { IRenderer } from './interfaces.js';
import type { GraphLayout } from './types.js';

describe('render', () => {
  it('returns the drawing of a valid diagram', () => {
    expect(render('graph LR\nA --> B')).toEqual({
      ok: true,
      text: '┌───┐     ┌───┐\n│ A │────>│ B │\n└───┘     └───┘',
    });
  });

  it('reports a layout failure by its message alone', () => {
    expect(render('sequenceDiagram')).toEqual({ ok: false, error: 'no participants found' });
  });

  it('reports a parse failure with its position', () => {
    const outcome = render('graph TD\nA[unclosed');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toMatch(/^line 2:\d+: /);
  });
});

describe('renderWithOptions', () => {
  it('tightens a graph to the requested width', () => {
    expect(renderWithOptions('graph LR\nA --> B', 12)).toEqual({
      ok: true,
      text: '┌───┐  ┌───┐\n│ A │─>│ B │\n└───┘  └───┘',
    });
  });

  it('fails when the diagram cannot fit', () => {
    expect(renderWithOptions('graph LR\nA --> B', 5)).toEqual({
      ok: false,
      error: 'diagram needs at least 11 columns but only 5 are available',
    });
  });

  it('rejects a width that is not a positive integer', () => {
    expect(renderWithOptions('graph LR\nA --> B', 0)).toEqual({
      ok: false,
      error: 'maximum width must be a positive integer, got 0',
    });
  });

  it('behaves like render without a width', () => {
    expect(renderWithOptions('graph LR\nA --> B')).toEqual(render('graph LR\nA --> B'));
  });
});

describe('renderDiagram', () => {
  it('keeps warnings next to the output', () => {
    const result = renderDiagram('graph TD\nA --> A');
    expect(result.type).toBe('flowchart');
    expect(result.output).toBe('┌───┐\n│ A │\n└───┘');
    expect(result.errors.map((e) => e.code)).toEqual(['FL-SELF-LOOP-SKIPPED']);
  });

  it('reports the sequence type for a headerless script', () => {
    expect(renderDiagram('A->>B: hi').type).toBe('sequence');
  });
});

describe('AsciiRenderer', () => {
  it('uses a replacement stage for one diagram kind', () => {
    const counter: IRenderer<GraphLayout> = { render: (layout) => `${layout.nodes.length} nodes` };
    const renderer = new AsciiRenderer({
      flowchart: {
        layoutEngine: {
          layout: (graph) => ({ direction: graph.direction, nodes: [], edges: [], subgraphs: [], width: 0, height: 0 }),
        },
        renderer: counter,
      },
    });
    expect(renderer.render('graph TD\nA --> B').output).toBe('0 nodes');
  });
});

describe('describeError', () => {
  it('falls back when there is no error', () => {
    expect(describeError([{ line: 1, column: 1, message: 'w', severity: 'warning' }])).toBe('unknown error');
  });
});
