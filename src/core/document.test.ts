import { describe, it, expect } from 'vitest';
import { renderDocument } from './document.js';

describe('renderDocument', () => {
  const doc = [
    'intro',
    '```mermaid',
    'graph LR',
    'A --> B',
    '```',
    '```mermaid',
    'erDiagram',
    'A |{--|| B : x',
    '```',
  ].join('\n');

  it('renders every fenced block and reports errors on document lines', () => {
    const [graph, er] = renderDocument(doc, { markdown: true });
    expect(graph).toMatchObject({ type: 'flowchart', line: 3, ok: true, errors: [], warnings: [] });
    expect(graph.output?.split('\n')[1]).toBe('│ A │────>│ B │');
    expect(er).toMatchObject({ type: 'er', line: 7, ok: false, warnings: [] });
    expect(er.output).toBeUndefined();
    expect(er.errors.map((e) => [e.code, e.line, e.column])).toEqual([['ER-CARDINALITY-SIDE', 8, 3]]);
  });

  it('passes the width limit to each diagram', () => {
    const [graph] = renderDocument(doc, { markdown: true, maxWidth: 12 });
    expect(graph.output?.split('\n')[1]).toBe('│ A │─>│ B │');
  });

  it('renders plain text as a single diagram', () => {
    expect(renderDocument('graph LR\nA --> B')).toHaveLength(1);
    expect(renderDocument('just prose', { markdown: true })).toEqual([]);
  });
});
