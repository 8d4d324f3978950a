import { describe, it, expect } from 'vitest';
import { buildGraphModel } from './graph-builder.js';
import type { Graph } from './types.js';

function graph(text: string): Graph {
  const { model, errors } = buildGraphModel(text);
  if (!model) throw new Error(`parse failed: ${errors.map((e) => e.message).join('; ')}`);
  return model;
}

describe('buildGraphModel', () => {
  it('reads the direction from the header', () => {
    expect(graph('graph LR\nA --> B').direction).toBe('LR');
    expect(graph('flowchart TB\nA --> B').direction).toBe('TD');
    expect(graph('graph RL\nA --> B').direction).toBe('LR');
    expect(graph('graph BT\nA --> B').direction).toBe('TD');
  });

  it('maps bracket pairs to shapes', () => {
    const g = graph('graph TD\nA[Box] --> B(Round)\nC((Circle)) --> D{Choice}');
    expect(g.nodes.map((n) => [n.id, n.shape, n.label])).toEqual([
      ['A', 'box', 'Box'],
      ['B', 'round', 'Round'],
      ['C', 'circle', 'Circle'],
      ['D', 'diamond', 'Choice'],
    ]);
  });

  it('labels a bare node with its id', () => {
    expect(graph('graph TD\nA --> B').nodes[1]).toEqual({ id: 'B', label: 'B', shape: 'box' });
  });

  it('gives an earlier bare reference the first explicit shape', () => {
    const g = graph('graph TD\nA --> B\nB(Later)\nB[Ignored]');
    expect(g.nodes[1]).toEqual({ id: 'B', label: 'Later', shape: 'round' });
  });

  it('reads link styles and labels', () => {
    const g = graph('graph TD\nA -.-> B\nB === C\nC -->|yes| D\nD -- no --> E');
    expect(g.edges).toEqual([
      { from: 'A', to: 'B', line: 'dotted', arrow: true },
      { from: 'B', to: 'C', line: 'thick', arrow: false },
      { from: 'C', to: 'D', line: 'solid', arrow: true, label: 'yes' },
      { from: 'D', to: 'E', line: 'solid', arrow: true, label: 'no' },
    ]);
  });

  it('expands ampersand groups into one edge per pair', () => {
    const g = graph('graph TD\nA & B --> C & D');
    expect(g.edges.map((e) => `${e.from}${e.to}`)).toEqual(['AC', 'AD', 'BC', 'BD']);
  });

  it('keeps self-loops in the model with a warning', () => {
    const { model, errors } = buildGraphModel('graph TD\nA --> A');
    expect(model?.edges).toHaveLength(1);
    expect(errors.map((e) => [e.severity, e.code])).toEqual([['warning', 'FL-SELF-LOOP-SKIPPED']]);
  });

  it('collects direct subgraph members, inner blocks first', () => {
    const g = graph('graph TD\nsubgraph outer\nsubgraph inner\nA\nend\nB\nend');
    expect(g.subgraphs).toEqual([
      { id: 'inner', label: 'inner', nodes: ['A'] },
      { id: 'outer', label: 'outer', nodes: ['B'] },
    ]);
  });

  it('reads subgraph titles in brackets and quotes', () => {
    expect(graph('graph TD\nsubgraph S [Group]\nA\nend').subgraphs[0]).toMatchObject({ id: 'S', label: 'Group' });
    expect(graph('graph TD\nsubgraph "My Group"\nA\nend').subgraphs[0]).toMatchObject({ id: 'my_group', label: 'My Group' });
  });

  it('warns about a direction statement outside a subgraph', () => {
    const { errors } = buildGraphModel('graph TD\ndirection LR\nA --> B');
    expect(errors.map((e) => e.code)).toEqual(['FL-DIRECTION-OUTSIDE-SUBGRAPH']);
  });

  it('reports a missing header as an error and no model', () => {
    const { model, errors } = buildGraphModel('graph\nA --> B');
    expect(model).toBeUndefined();
    expect(errors[0].severity).toBe('error');
  });
});
