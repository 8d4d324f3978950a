import { diagramSources, offsetErrors } from './markdown.js';
import { toDiagramJson, type DiagramJson } from './format.js';
import { renderDiagram } from '../renderer/index.js';
import type { RenderOptions } from './types.js';

/**
 * Render every diagram of a file. Diagnostics are shifted to file lines so a
 * fenced block reports where it sits in the document.
 */
export function renderDocument(text: string, options: RenderOptions & { markdown?: boolean } = {}): DiagramJson[] {
  const { markdown = false, ...renderOptions } = options;
  return diagramSources(text, markdown).map(({ content, lineOffset }) => {
    const result = renderDiagram(content, renderOptions);
    return toDiagramJson(result.type, lineOffset + 1, result.output, offsetErrors(result.errors, lineOffset));
  });
}
