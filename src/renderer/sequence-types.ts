// Sequence diagram model and layout types

export type ArrowMarker = 'none' | 'arrow' | 'open' | 'cross';
export type MessageLine = 'solid' | 'dotted';

export interface Participant {
  id: string;             // canonical id (A, User, etc.)
  display: string;        // display name (may include <br/>)
}

export interface Message {
  from: string;
  to: string;
  text: string;
  line: MessageLine;
  marker: ArrowMarker;
  activateTarget: boolean;   // trailing + before the target
  deactivateSource: boolean; // trailing - before the target
}

export type NotePos = 'leftOf' | 'rightOf' | 'over';

export interface Note {
  pos: NotePos;
  actors: string[]; // 1 or 2 ids
  text: string;
}

export type SimpleBlockKind = 'loop' | 'opt' | 'break' | 'rect';
export type BranchingBlockKind = 'alt' | 'par' | 'critical';
export type BlockKind = SimpleBlockKind | BranchingBlockKind;
export type BranchKind = 'else' | 'and' | 'option';

export interface BlockBranch {
  kind: BranchKind;
  title: string;
  body: Statement[];
}

export type Statement =
  | { kind: 'participant'; id: string; display?: string }
  | { kind: 'message'; msg: Message }
  | { kind: 'note'; note: Note }
  | { kind: 'activate'; actor: string }
  | { kind: 'deactivate'; actor: string }
  | { kind: 'destroy'; actor: string }
  | { kind: 'autonumber' }
  | { kind: 'block'; block: SimpleBlockKind; title: string; body: Statement[] }
  | { kind: 'branching'; block: BranchingBlockKind; title: string; body: Statement[]; branches: BlockBranch[] };

export interface SequenceModel {
  participants: Participant[];
  statements: Statement[];
}

// ---- Layout ----

export interface ParticipantBox {
  id: string;
  name: string;
  center: number;
  left: number;
  right: number;
  height: number;
}

export interface MessageRow {
  kind: 'message';
  fromIdx: number;
  toIdx: number;
  fromCol: number;
  toCol: number;
  text: string;
  line: MessageLine;
  marker: ArrowMarker;
  direction: 'ltr' | 'rtl';
}

export interface NoteRow {
  kind: 'note';
  left: number;
  right: number;
  text: string;
}

export interface FrameRow {
  kind: 'blockStart' | 'blockDivider' | 'blockEnd';
  /** Identifies the frame a divider or end row closes. */
  frame: number;
  left: number;
  right: number;
  label: string;
}

export interface DestroyRow {
  kind: 'destroy';
  participant: number;
  col: number;
}

export type SequenceRow = MessageRow | NoteRow | FrameRow | DestroyRow;

export interface SequenceLayout {
  participants: ParticipantBox[];
  rows: SequenceRow[];
  /** One entry per row: whether each participant is active on that row. */
  activations: boolean[][];
  destroyed: boolean[];
  width: number;
}
