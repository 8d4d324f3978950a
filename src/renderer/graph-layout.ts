import type { Graph, GraphLayout, LayoutNode, LayoutSubgraph, Node, Edge, Direction } from './types.js';
import type { ILayoutEngine } from './interfaces.js';
import { assignRanks, groupByRank } from './ranks.js';
import { displayWidth, lineCount, multilineWidth } from './utils.js';
import { LayoutError } from '../core/errorBuilder.js';

const TD_RANK_SPACING = 2;
const TD_NODE_GAP = 3;
const LR_GAP = 5;
const LR_NODE_VERTICAL_GAP = 2;
const LR_LABEL_MARGIN = 2;

// Subgraph border plus one blank row/column on every side
const SUBGRAPH_PAD = 2;
const SUBGRAPH_TITLE_DECOR = 6;
const TD_GROUP_GAP = 2;
const LR_GROUP_GAP = 5;

interface Spacing {
  /** Between nodes of one rank in TD */
  nodeGap: number;
  /** Minimum between ranks in LR */
  rankGap: number;
}

const DEFAULT_SPACING: Spacing = { nodeGap: TD_NODE_GAP, rankGap: LR_GAP };

interface Placed {
  nodes: LayoutNode[];
  width: number;
  height: number;
}

export function nodeSize(node: Pick<Node, 'label' | 'shape'>): { width: number; height: number } {
  const base = multilineWidth(node.label) + 4;
  return {
    width: node.shape === 'circle' ? base + 4 : base,
    height: 2 + lineCount(node.label),
  };
}

function place(node: Node, x: number, y: number): LayoutNode {
  const { width, height } = nodeSize(node);
  return {
    ...node,
    x,
    y,
    width,
    height,
    centerX: x + Math.floor(width / 2),
    centerY: y + Math.floor(height / 2),
  };
}

function layoutTD(ranks: Node[][], spacing: Spacing): Placed {
  const rowWidth = (rank: Node[]) =>
    rank.reduce((sum, n) => sum + nodeSize(n).width, 0) + Math.max(0, rank.length - 1) * spacing.nodeGap;
  const widest = Math.max(0, ...ranks.map(rowWidth));

  const nodes: LayoutNode[] = [];
  let y = 0;
  for (const rank of ranks) {
    let x = Math.floor((widest - rowWidth(rank)) / 2);
    let tallest = 0;
    for (const node of rank) {
      const laid = place(node, x, y);
      nodes.push(laid);
      x += laid.width + spacing.nodeGap;
      tallest = Math.max(tallest, laid.height);
    }
    y += tallest + TD_RANK_SPACING;
  }
  return { nodes, width: widest, height: Math.max(0, y - TD_RANK_SPACING) };
}

function layoutLR(ranks: Node[][], rankOf: Map<string, number>, edges: Edge[], spacing: Spacing): Placed {
  const nodes: LayoutNode[] = [];
  let x = 0;
  let height = 0;
  ranks.forEach((rank, i) => {
    let y = 0;
    let widest = 0;
    for (const node of rank) {
      const laid = place(node, x, y);
      nodes.push(laid);
      y += laid.height + LR_NODE_VERTICAL_GAP;
      widest = Math.max(widest, laid.width);
    }
    height = Math.max(height, y - LR_NODE_VERTICAL_GAP);

    const next = ranks[i + 1];
    if (!next) {
      x += widest;
      return;
    }
    const here = rankOf.get(rank[0].id);
    const there = rankOf.get(next[0].id);
    const labelGap = edges
      .filter((e) => e.label !== undefined && rankOf.get(e.from) === here && rankOf.get(e.to) === there)
      .reduce((m, e) => Math.max(m, displayWidth(e.label ?? '') + LR_LABEL_MARGIN), 0);
    x += widest + Math.max(spacing.rankGap, labelGap);
  });
  return { nodes, width: x, height };
}

/** Lay out a set of nodes and the edges among them at the origin. */
function layoutGroup(direction: Direction, members: Node[], edges: Edge[], spacing: Spacing): Placed {
  const ids = members.map((n) => n.id);
  const inside = edges.filter((e) => ids.includes(e.from) && ids.includes(e.to));
  const rankOf = assignRanks(ids, inside);
  const byId = new Map(members.map((n) => [n.id, n]));
  const ranks = groupByRank(ids, rankOf).map((rank) => rank.flatMap((id) => byId.get(id) ?? []));
  return direction === 'TD' ? layoutTD(ranks, spacing) : layoutLR(ranks, rankOf, inside, spacing);
}

function shift(node: LayoutNode, dx: number, dy: number): LayoutNode {
  return { ...node, x: node.x + dx, y: node.y + dy, centerX: node.centerX + dx, centerY: node.centerY + dy };
}

function extent(nodes: LayoutNode[], subgraphs: LayoutSubgraph[]): { width: number; height: number } {
  let width = 0;
  let height = 0;
  for (const n of nodes) {
    width = Math.max(width, n.x + n.width);
    height = Math.max(height, n.y + n.height);
  }
  for (const sg of subgraphs) {
    width = Math.max(width, sg.x + sg.width);
    height = Math.max(height, sg.y + sg.height);
  }
  return { width, height };
}

/**
 * Each subgraph is laid out on its own and wrapped in a border; nodes outside
 * every subgraph form a last, borderless group. Groups follow one another
 * along the primary axis.
 */
function layoutWithSubgraphs(graph: Graph, spacing: Spacing): GraphLayout {
  const claimed = new Set<string>();
  const byId = new Map(graph.nodes.map((n) => [n.id, n]));
  const groups: Array<{ subgraph?: { id: string; label: string }; members: Node[] }> = [];

  for (const sg of graph.subgraphs) {
    const members = sg.nodes.filter((id) => !claimed.has(id)).flatMap((id) => byId.get(id) ?? []);
    if (members.length === 0) continue;
    members.forEach((n) => claimed.add(n.id));
    groups.push({ subgraph: { id: sg.id, label: sg.label }, members });
  }
  const bare = graph.nodes.filter((n) => !claimed.has(n.id));
  if (bare.length > 0) groups.push({ members: bare });

  const nodes: LayoutNode[] = [];
  const subgraphs: LayoutSubgraph[] = [];
  let cursor = 0;
  for (const group of groups) {
    const placed = layoutGroup(graph.direction, group.members, graph.edges, spacing);
    const x0 = graph.direction === 'LR' ? cursor : 0;
    const y0 = graph.direction === 'TD' ? cursor : 0;
    let width = placed.width;
    let height = placed.height;
    if (group.subgraph) {
      width = Math.max(placed.width + 2 * SUBGRAPH_PAD, displayWidth(group.subgraph.label) + SUBGRAPH_TITLE_DECOR);
      height = placed.height + 2 * SUBGRAPH_PAD;
      subgraphs.push({ ...group.subgraph, x: x0, y: y0, width, height });
      nodes.push(...placed.nodes.map((n) => shift(n, x0 + SUBGRAPH_PAD, y0 + SUBGRAPH_PAD)));
    } else {
      nodes.push(...placed.nodes.map((n) => shift(n, x0, y0)));
    }
    cursor += graph.direction === 'TD' ? height + TD_GROUP_GAP : width + LR_GROUP_GAP;
  }

  // Keep model order so renderers see nodes as declared
  const order = new Map(graph.nodes.map((n, i) => [n.id, i]));
  nodes.sort((a, b) => (order.get(a.id) ?? 0) - (order.get(b.id) ?? 0));

  return { direction: graph.direction, nodes, edges: graph.edges, subgraphs, ...extent(nodes, subgraphs) };
}

export function layoutGraph(graph: Graph, spacing: Spacing = DEFAULT_SPACING): GraphLayout {
  if (graph.nodes.length === 0) {
    throw new LayoutError('EMPTY_DIAGRAM', 'no nodes found');
  }
  if (graph.subgraphs.length > 0) return layoutWithSubgraphs(graph, spacing);

  const placed = layoutGroup(graph.direction, graph.nodes, graph.edges, spacing);
  return {
    direction: graph.direction,
    nodes: placed.nodes,
    edges: graph.edges,
    subgraphs: [],
    ...extent(placed.nodes, []),
  };
}

/**
 * Fit a graph into `maxWidth` columns by tightening node and rank gaps.
 * Diagrams with subgraphs are not tightened.
 */
export function layoutGraphWithMaxWidth(graph: Graph, maxWidth: number): GraphLayout {
  const full = layoutGraph(graph);
  if (full.width <= maxWidth) return full;

  if (graph.subgraphs.length > 0) {
    throw new LayoutError(
      'SUBGRAPH_TOO_WIDE',
      `diagram with subgraphs needs ${full.width} columns but only ${maxWidth} are available`,
      full.width
    );
  }

  let narrowest = full;
  for (let gap = LR_GAP - 1; gap >= 1; gap--) {
    narrowest = layoutGraph(graph, { nodeGap: Math.min(TD_NODE_GAP, gap), rankGap: Math.min(LR_GAP, gap) });
    if (narrowest.width <= maxWidth) return narrowest;
  }
  throw new LayoutError(
    'TOO_WIDE',
    `diagram needs at least ${narrowest.width} columns but only ${maxWidth} are available`,
    narrowest.width
  );
}

export class GridLayoutEngine implements ILayoutEngine<Graph, GraphLayout> {
  layout(graph: Graph, maxWidth?: number): GraphLayout {
    return maxWidth === undefined ? layoutGraph(graph) : layoutGraphWithMaxWidth(graph, maxWidth);
  }
}
