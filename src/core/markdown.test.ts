import { describe, it, expect } from 'vitest';
import { extractDiagramBlocks, diagramSources, offsetErrors } from './markdown.js';
import type { ValidationError } from './types.js';

describe('extractDiagramBlocks', () => {
  it('finds mermaid and mmd fences and skips other languages', () => {
    const doc = [
      '# Title',
      '',
      '```mermaid',
      'graph TD',
      'A --> B',
      '```',
      '',
      '```js',
      'x',
      '```',
      '~~~mmd',
      'sequenceDiagram',
      '~~~',
    ].join('\n');
    expect(extractDiagramBlocks(doc)).toEqual([
      { content: 'graph TD\nA --> B', startLine: 4, endLine: 6, info: 'mermaid' },
      { content: 'sequenceDiagram', startLine: 12, endLine: 13, info: 'mmd' },
    ]);
  });

  it('runs an unclosed fence to the end of the document', () => {
    expect(extractDiagramBlocks('```mermaid\ngraph TD')).toEqual([
      { content: 'graph TD', startLine: 2, endLine: 3, info: 'mermaid' },
    ]);
  });

  it('needs a closing fence at least as long as the opening one', () => {
    expect(extractDiagramBlocks('````mermaid\n```\n````')[0].content).toBe('```');
  });
});

describe('diagramSources', () => {
  it('treats a file without fences as one diagram', () => {
    expect(diagramSources('graph TD\nA --> B')).toEqual([{ content: 'graph TD\nA --> B', lineOffset: 0 }]);
  });

  it('finds nothing in Markdown without fences', () => {
    expect(diagramSources('# Notes\n\nNo diagrams here.', true)).toEqual([]);
  });

  it('offsets each block by the lines above it', () => {
    expect(diagramSources('text\n```mermaid\nerDiagram\n```', true)).toEqual([{ content: 'erDiagram', lineOffset: 2 }]);
  });
});

describe('offsetErrors', () => {
  it('shifts lines and leaves columns alone', () => {
    const errors: ValidationError[] = [{ line: 2, column: 3, message: 'x', severity: 'error' }];
    expect(offsetErrors(errors, 5)).toEqual([{ line: 7, column: 3, message: 'x', severity: 'error' }]);
    expect(offsetErrors(errors, 0)).toBe(errors);
  });
});
