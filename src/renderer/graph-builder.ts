import type { CstNode, IToken } from 'chevrotain';
import { tokenize } from '../diagrams/flowchart/lexer.js';
import { parse } from '../diagrams/flowchart/parser.js';
import { childNode, childNodes, childToken, firstToken, has, sourceText, unquote } from '../core/cst.js';
import { mapFlowchartParserError } from '../core/diagnostics.js';
import { warningAtToken } from '../core/errorBuilder.js';
import { parseWithChevrotain, type BuildResult, type ParseResult } from '../core/pipeline.js';
import type { ValidationError } from '../core/types.js';
import type { Node, Edge, EdgeLine, Graph, NodeShape, Direction, Subgraph } from './types.js';

const LINKS: Record<string, { line: EdgeLine; arrow: boolean }> = {
  Arrow: { line: 'solid', arrow: true },
  Line: { line: 'solid', arrow: false },
  DottedArrow: { line: 'dotted', arrow: true },
  DottedLine: { line: 'dotted', arrow: false },
  ThickArrow: { line: 'thick', arrow: true },
  ThickLine: { line: 'thick', arrow: false },
};

const SHAPES: Array<[string, NodeShape]> = [
  ['SquareOpen', 'box'],
  ['DoubleRoundOpen', 'circle'],
  ['RoundOpen', 'round'],
  ['DiamondOpen', 'diamond'],
];

/**
 * Transforms a Chevrotain CST into a graph model suitable for rendering
 */
export class GraphBuilder {
  private nodes: Map<string, Node> = new Map();
  /** Nodes whose shape and label were given explicitly */
  private shaped: Set<string> = new Set();
  private edges: Edge[] = [];
  private subgraphs: Subgraph[] = [];
  private warnings: ValidationError[] = [];
  private source = '';

  build(cst: CstNode, source: string): BuildResult<Graph> {
    this.reset(source);

    const direction = this.extractDirection(cst);
    this.processStatements(childNodes(cst, 'statement'), undefined);

    return {
      model: {
        direction,
        nodes: Array.from(this.nodes.values()),
        edges: this.edges,
        subgraphs: this.subgraphs,
      },
      errors: this.warnings,
    };
  }

  private reset(source: string) {
    this.nodes.clear();
    this.shaped.clear();
    this.edges = [];
    this.subgraphs = [];
    this.warnings = [];
    this.source = source;
  }

  private extractDirection(cst: CstNode): Direction {
    // BT and RL are drawn as their forward counterparts
    switch (childToken(cst, 'Direction')?.image) {
      case 'LR':
      case 'RL': return 'LR';
      default: return 'TD';
    }
  }

  private processStatements(statements: CstNode[], members: string[] | undefined) {
    for (const stmt of statements) {
      const nodeStmt = childNode(stmt, 'nodeStatement');
      if (nodeStmt) {
        this.processNodeStatement(nodeStmt, members);
        continue;
      }
      const sub = childNode(stmt, 'subgraph');
      if (sub) {
        this.processSubgraph(sub);
        continue;
      }
      const dir = childNode(stmt, 'directionStatement');
      if (dir && members) {
        this.warnings.push(warningAtToken(childToken(dir, 'DirectionKeyword'), 'Direction inside a subgraph is ignored; the diagram direction applies.', {
          code: 'FL-SUBGRAPH-DIRECTION-IGNORED',
        }));
      } else if (dir) {
        this.warnings.push(warningAtToken(childToken(dir, 'DirectionKeyword'), "'direction' is only meaningful inside a subgraph.", {
          code: 'FL-DIRECTION-OUTSIDE-SUBGRAPH',
          hint: 'Set the direction in the header instead, e.g. flowchart LR',
        }));
      }
    }
  }

  private processNodeStatement(stmt: CstNode, members: string[] | undefined) {
    const groups = childNodes(stmt, 'nodeGroup').map((g) => childNodes(g, 'node').map((n) => this.processNode(n, members)));
    const links = childNodes(stmt, 'link');

    links.forEach((link, i) => {
      const { line, arrow } = this.linkKind(link);
      const label = this.linkLabel(link);
      for (const from of groups[i]) {
        for (const to of groups[i + 1]) {
          if (from === to) {
            this.warnings.push(warningAtToken(firstToken(link), `Self-loop on '${from}' is not drawn.`, {
              code: 'FL-SELF-LOOP-SKIPPED',
            }));
          }
          this.edges.push(label === undefined ? { from, to, line, arrow } : { from, to, line, arrow, label });
        }
      }
    });
  }

  private processNode(node: CstNode, members: string[] | undefined): string {
    const idTok: IToken | undefined = childToken(node, 'nodeId');
    const id = idTok?.image ?? '';
    const shapeNode = childNode(node, 'nodeShape');

    const existing = this.nodes.get(id);
    if (shapeNode) {
      const shape = SHAPES.find(([tok]) => has(shapeNode, tok))?.[1] ?? 'box';
      const content = childNode(shapeNode, 'nodeContent');
      const label = content ? this.text(content) : id;
      if (!existing) {
        this.nodes.set(id, { id, label, shape });
        this.shaped.add(id);
      } else if (!this.shaped.has(id)) {
        // A bare reference seen earlier takes the first explicit shape
        existing.label = label;
        existing.shape = shape;
        this.shaped.add(id);
      }
    } else if (!existing) {
      this.nodes.set(id, { id, label: id, shape: 'box' });
    }

    if (members && !members.includes(id)) members.push(id);
    return id;
  }

  private text(content: CstNode): string {
    return sourceText(this.source, content);
  }

  private linkKind(link: CstNode): { line: EdgeLine; arrow: boolean } {
    for (const [name, kind] of Object.entries(LINKS)) {
      if (has(link, name)) return kind;
    }
    return LINKS.Arrow;
  }

  private linkLabel(link: CstNode): string | undefined {
    const inline = childNode(link, 'inlineLabel');
    if (inline) return this.text(inline);
    const piped = childNode(childNode(link, 'linkLabel'), 'nodeContent');
    return piped ? this.text(piped) : undefined;
  }

  private processSubgraph(sub: CstNode) {
    const quoted = childToken(sub, 'subgraphTitleQ');
    const idTok = childToken(sub, 'subgraphId');
    let id: string;
    let label: string;
    if (quoted) {
      label = unquote(quoted.image);
      id = label.replace(/ /g, '_').toLowerCase();
    } else {
      const bracket = childNode(sub, 'nodeContent');
      const words = childNode(sub, 'titleWords');
      const idText = idTok?.image ?? '';
      if (bracket) {
        id = idText;
        label = this.text(bracket);
      } else if (words) {
        label = `${idText} ${this.text(words)}`;
        id = label.replace(/ /g, '_').toLowerCase();
      } else {
        id = idText;
        label = idText;
      }
    }

    const members: string[] = [];
    this.processStatements(childNodes(sub, 'statement'), members);
    // Nested subgraphs are pushed before the enclosing one
    this.subgraphs.push({ id, label, nodes: members });
  }
}

export function buildGraphFromCst(cst: CstNode, text: string): BuildResult<Graph> {
  return new GraphBuilder().build(cst, text);
}

export function buildGraphModel(text: string): ParseResult<Graph> {
  return parseWithChevrotain(text, {
    tokenize,
    parse,
    mapParserError: mapFlowchartParserError,
    build: buildGraphFromCst,
  });
}
