import type { DiagramType, RenderOptions, RenderOutcome, RenderResult, ValidationError } from '../core/types.js';
import type { ILayoutEngine, IRenderer } from './interfaces.js';
import type { SequenceModel, SequenceLayout } from './sequence-types.js';
import type { Graph, GraphLayout } from './types.js';
import type { ErDiagram, ErLayout } from './er-types.js';
import { parseDiagram, type ParsedDiagram } from '../core/router.js';
import { LayoutError, fromLayoutError } from '../core/errorBuilder.js';
import { SequenceLayoutEngine } from './sequence-layout.js';
import { SequenceAsciiRenderer } from './sequence-renderer.js';
import { GridLayoutEngine } from './graph-layout.js';
import { GraphAsciiRenderer } from './graph-renderer.js';
import { ErLayoutEngine } from './er-layout.js';
import { ErAsciiRenderer } from './er-renderer.js';

/** A layout engine and a renderer for one diagram kind. */
export interface Stage<TModel, TLayout> {
  layoutEngine: ILayoutEngine<TModel, TLayout>;
  renderer: IRenderer<TLayout>;
}

export interface Stages {
  sequence: Stage<SequenceModel, SequenceLayout>;
  flowchart: Stage<Graph, GraphLayout>;
  er: Stage<ErDiagram, ErLayout>;
}

function defaultStages(): Stages {
  return {
    sequence: { layoutEngine: new SequenceLayoutEngine(), renderer: new SequenceAsciiRenderer() },
    flowchart: { layoutEngine: new GridLayoutEngine(), renderer: new GraphAsciiRenderer() },
    er: { layoutEngine: new ErLayoutEngine(), renderer: new ErAsciiRenderer() },
  };
}

function run<TModel, TLayout>(stage: Stage<TModel, TLayout>, model: TModel, maxWidth: number | undefined): string {
  return stage.renderer.render(stage.layoutEngine.layout(model, maxWidth));
}

/**
 * Orchestrates parse, layout and draw for every supported diagram kind
 */
export class AsciiRenderer {
  private readonly stages: Stages;

  constructor(stages: Partial<Stages> = {}) {
    this.stages = { ...defaultStages(), ...stages };
  }

  render(text: string, options: RenderOptions = {}): RenderResult {
    const parsed = parseDiagram(text);
    const type: DiagramType = parsed.diagram?.type ?? parsed.type;
    if (!parsed.diagram || hasErrors(parsed.errors)) {
      return { output: '', type, errors: parsed.errors };
    }

    if (options.maxWidth !== undefined && (!Number.isInteger(options.maxWidth) || options.maxWidth < 1)) {
      const invalid: ValidationError = {
        line: 1, column: 1, severity: 'error', code: 'INVALID_WIDTH',
        message: `maximum width must be a positive integer, got ${options.maxWidth}`,
      };
      return { output: '', type, errors: [...parsed.errors, invalid] };
    }

    try {
      return { output: this.draw(parsed.diagram, options.maxWidth), type, errors: parsed.errors };
    } catch (e) {
      if (e instanceof LayoutError) {
        return { output: '', type, errors: [...parsed.errors, fromLayoutError(e)] };
      }
      throw e;
    }
  }

  private draw(diagram: ParsedDiagram, maxWidth: number | undefined): string {
    switch (diagram.type) {
      case 'sequence': return run(this.stages.sequence, diagram.model, maxWidth);
      case 'flowchart': return run(this.stages.flowchart, diagram.model, maxWidth);
      case 'er': return run(this.stages.er, diagram.model, maxWidth);
    }
  }
}

export function hasErrors(errors: ValidationError[]): boolean {
  return errors.some((e) => e.severity === 'error');
}

/** First error as a one-line message, with its position when it came from the source. */
export function describeError(errors: ValidationError[]): string {
  const first = errors.find((e) => e.severity === 'error');
  if (!first) return 'unknown error';
  return first.code && /^[A-Z_]+$/.test(first.code) ? first.message : `line ${first.line}:${first.column}: ${first.message}`;
}

function outcome(result: RenderResult): RenderOutcome {
  return hasErrors(result.errors) ? { ok: false, error: describeError(result.errors) } : { ok: true, text: result.output };
}

export function renderDiagram(text: string, options: RenderOptions = {}): RenderResult {
  return new AsciiRenderer().render(text, options);
}

export function render(text: string): RenderOutcome {
  return outcome(renderDiagram(text));
}

export function renderWithOptions(text: string, maxWidth?: number): RenderOutcome {
  return outcome(renderDiagram(text, { maxWidth }));
}

export type { ILayoutEngine, IRenderer } from './interfaces.js';
