// Public SDK surface for programmatic use
export type {
  ValidationError,
  DiagramType,
  RenderOptions,
  RenderResult,
  RenderOutcome,
} from './core/types.js';

// Rendering
export { AsciiRenderer, render, renderWithOptions, renderDiagram, hasErrors, describeError } from './renderer/index.js';
export type { Stage, Stages, ILayoutEngine, IRenderer } from './renderer/index.js';
export { renderDocument } from './core/document.js';

// Parsing
export { detectDiagramType, parseDiagram } from './core/router.js';
export type { ParsedDiagram } from './core/router.js';
export { buildSequenceModel } from './renderer/sequence-builder.js';
export { buildGraphModel } from './renderer/graph-builder.js';
export { buildErModel } from './renderer/er-builder.js';

// Layout engines and renderers, for custom pipelines
export { SequenceLayoutEngine, layoutSequence, layoutSequenceWithMaxWidth } from './renderer/sequence-layout.js';
export { SequenceAsciiRenderer, renderSequence } from './renderer/sequence-renderer.js';
export { GridLayoutEngine, layoutGraph, layoutGraphWithMaxWidth } from './renderer/graph-layout.js';
export { GraphAsciiRenderer, renderGraph } from './renderer/graph-renderer.js';
export { ErLayoutEngine, layoutEr, layoutErWithMaxWidth } from './renderer/er-layout.js';
export { ErAsciiRenderer, renderEr } from './renderer/er-renderer.js';
export { Canvas } from './renderer/canvas.js';
export { assignRanks } from './renderer/ranks.js';
export { displayWidth, splitLines, multilineWidth, lineCount, truncateToWidth } from './renderer/utils.js';
export { LayoutError } from './core/errorBuilder.js';
export type { LayoutErrorCode } from './core/errorBuilder.js';

// Model and layout types
export type * from './renderer/sequence-types.js';
export type * from './renderer/types.js';
export type * from './renderer/er-types.js';

// Markdown and reporting
export type { DiagramBlock } from './core/markdown.js';
export { extractDiagramBlocks, offsetErrors } from './core/markdown.js';
export { textReport, toJsonResult } from './core/format.js';
