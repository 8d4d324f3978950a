import { describe, it, expect } from 'vitest';
import { detectDiagramType, parseDiagram } from './router.js';

describe('detectDiagramType', () => {
  it('recognises each header', () => {
    expect(detectDiagramType('graph TD\nA --> B')).toBe('flowchart');
    expect(detectDiagramType('Flowchart LR')).toBe('flowchart');
    expect(detectDiagramType('sequenceDiagram\nA->>B: hi')).toBe('sequence');
    expect(detectDiagramType('erDiagram')).toBe('er');
  });

  it('skips blank lines and comments before the header', () => {
    expect(detectDiagramType('%% a comment\n\n  erDiagram')).toBe('er');
  });

  it('returns unknown for anything else', () => {
    expect(detectDiagramType('pie title Pets')).toBe('unknown');
    expect(detectDiagramType('')).toBe('unknown');
    expect(detectDiagramType('graphs TD')).toBe('unknown');
  });
});

describe('parseDiagram', () => {
  it('parses a headerless script as a sequence diagram', () => {
    const parsed = parseDiagram('A->>B: hi');
    expect(parsed.type).toBe('unknown');
    expect(parsed.diagram?.type).toBe('sequence');
  });

  it('returns the model of the detected kind', () => {
    const parsed = parseDiagram('erDiagram\nA ||--|| B : x');
    expect(parsed.diagram?.type).toBe('er');
    expect(parsed.errors).toEqual([]);
  });

  it('returns errors without a model when parsing fails', () => {
    const parsed = parseDiagram('graph TD\nA[unclosed');
    expect(parsed.type).toBe('flowchart');
    expect(parsed.diagram).toBeUndefined();
    expect(parsed.errors.length).toBeGreaterThan(0);
  });
});
