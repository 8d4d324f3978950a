import { describe, it, expect } from 'vitest';
import { buildGraphModel } from './graph-builder.js';
import { layoutGraph, layoutGraphWithMaxWidth, nodeSize } from './graph-layout.js';
import { LayoutError } from '../core/errorBuilder.js';
import type { Graph } from './types.js';

function graph(text: string): Graph {
  const { model } = buildGraphModel(text);
  if (!model) throw new Error('parse failed');
  return model;
}

function layoutErrorOf(fn: () => unknown): LayoutError {
  try {
    fn();
  } catch (e) {
    if (e instanceof LayoutError) return e;
    throw e;
  }
  throw new Error('expected a layout error');
}

describe('nodeSize', () => {
  it('pads the label and widens circles', () => {
    expect(nodeSize({ label: 'abc', shape: 'box' })).toEqual({ width: 7, height: 3 });
    expect(nodeSize({ label: 'abc', shape: 'circle' })).toEqual({ width: 11, height: 3 });
    expect(nodeSize({ label: 'a<br/>bcd', shape: 'box' })).toEqual({ width: 7, height: 4 });
  });
});

describe('layoutGraph', () => {
  it('stacks ranks top-down and centres narrower ranks', () => {
    const layout = layoutGraph(graph('graph TD\nA[Start] --> B[End]'));
    expect(layout.nodes.map((n) => [n.id, n.x, n.y, n.centerX])).toEqual([
      ['A', 0, 0, 4],
      ['B', 1, 5, 4],
    ]);
    expect([layout.width, layout.height]).toEqual([9, 8]);
  });

  it('places ranks left to right', () => {
    const layout = layoutGraph(graph('graph LR\nA --> B'));
    expect(layout.nodes.map((n) => [n.x, n.centerY])).toEqual([[0, 1], [10, 1]]);
    expect(layout.width).toBe(15);
  });

  it('widens an LR gap to fit an edge label', () => {
    const layout = layoutGraph(graph('graph LR\nA -->|a long label| B'));
    // 12 columns of label plus a margin of 2
    expect(layout.nodes[1].x).toBe(19);
  });

  it('wraps a subgraph in a padded border', () => {
    const layout = layoutGraph(graph('graph TD\nsubgraph S [Group]\nA --> B\nend'));
    expect(layout.subgraphs).toEqual([{ id: 'S', label: 'Group', x: 0, y: 0, width: 11, height: 12 }]);
    expect(layout.nodes.map((n) => [n.x, n.y])).toEqual([[2, 2], [2, 7]]);
  });

  it('fails on a graph without nodes', () => {
    const err = layoutErrorOf(() => layoutGraph({ direction: 'TD', nodes: [], edges: [], subgraphs: [] }));
    expect(err.code).toBe('EMPTY_DIAGRAM');
  });
});

describe('layoutGraphWithMaxWidth', () => {
  it('tightens gaps until the graph fits', () => {
    const layout = layoutGraphWithMaxWidth(graph('graph LR\nA --> B'), 12);
    expect(layout.width).toBe(12);
    expect(layout.nodes[1].x).toBe(7);
  });

  it('reports the narrowest width it could reach', () => {
    const err = layoutErrorOf(() => layoutGraphWithMaxWidth(graph('graph LR\nA --> B'), 5));
    expect([err.code, err.minWidth]).toEqual(['TOO_WIDE', 11]);
  });

  it('does not tighten graphs with subgraphs', () => {
    const err = layoutErrorOf(() =>
      layoutGraphWithMaxWidth(graph('graph TD\nsubgraph S [Group]\nA --> B\nend'), 8)
    );
    expect([err.code, err.minWidth]).toEqual(['SUBGRAPH_TOO_WIDE', 11]);
  });
});
