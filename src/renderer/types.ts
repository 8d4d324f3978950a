// Graph model and layout types

export type Direction = 'TD' | 'LR';

export type NodeShape =
  | 'box'      // [text]
  | 'round'    // (text)
  | 'circle'   // ((text))
  | 'diamond'; // {text}

export type EdgeLine = 'solid' | 'dotted' | 'thick';

export interface Node {
  id: string;
  label: string;
  shape: NodeShape;
}

export interface Edge {
  from: string;
  to: string;
  line: EdgeLine;
  /** false for open links (`---`, `-.-`, `===`) */
  arrow: boolean;
  label?: string;
}

export interface Subgraph {
  id: string;
  label: string;
  /** Ids of the nodes declared or referenced directly inside the block, in first-seen order */
  nodes: string[];
}

export interface Graph {
  direction: Direction;
  nodes: Node[];
  edges: Edge[];
  subgraphs: Subgraph[];
}

// Layout result after positioning

export interface LayoutNode extends Node {
  x: number;
  y: number;
  width: number;
  height: number;
  centerX: number;
  centerY: number;
}

export interface LayoutSubgraph {
  id: string;
  label: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface GraphLayout {
  direction: Direction;
  nodes: LayoutNode[];
  edges: Edge[];
  subgraphs: LayoutSubgraph[];
  width: number;
  height: number;
}
