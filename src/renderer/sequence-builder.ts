import type { CstNode, IToken } from 'chevrotain';
import { tokenize } from '../diagrams/sequence/lexer.js';
import { parse } from '../diagrams/sequence/parser.js';
import { childNode, childNodes, childToken, firstToken, has, sourceText } from '../core/cst.js';
import { mapSequenceParserError } from '../core/diagnostics.js';
import { warningAtToken } from '../core/errorBuilder.js';
import { parseWithChevrotain, type BuildResult, type ParseResult } from '../core/pipeline.js';
import type { ValidationError } from '../core/types.js';
import type {
  ArrowMarker,
  BlockBranch,
  BranchKind,
  BranchingBlockKind,
  MessageLine,
  NotePos,
  Participant,
  SequenceModel,
  SimpleBlockKind,
  Statement,
} from './sequence-types.js';

const ARROWS: Record<string, { line: MessageLine; marker: ArrowMarker }> = {
  DottedAsync: { line: 'dotted', marker: 'arrow' },
  Async: { line: 'solid', marker: 'arrow' },
  Dotted: { line: 'dotted', marker: 'none' },
  Solid: { line: 'solid', marker: 'none' },
  DottedCross: { line: 'dotted', marker: 'cross' },
  Cross: { line: 'solid', marker: 'cross' },
  DottedOpen: { line: 'dotted', marker: 'open' },
  Open: { line: 'solid', marker: 'open' },
};

const SIMPLE_BLOCKS: Record<string, SimpleBlockKind> = {
  LoopKeyword: 'loop',
  OptKeyword: 'opt',
  BreakKeyword: 'break',
  RectKeyword: 'rect',
};

const BRANCHING: Array<{ rule: string; block: BranchingBlockKind; branchRule: string; branch: BranchKind }> = [
  { rule: 'altBlock', block: 'alt', branchRule: 'elseBranch', branch: 'else' },
  { rule: 'parBlock', block: 'par', branchRule: 'andBranch', branch: 'and' },
  { rule: 'criticalBlock', block: 'critical', branchRule: 'optionBranch', branch: 'option' },
];

class SequenceBuilder {
  private readonly participants = new Map<string, Participant>();
  private readonly depth = new Map<string, number>();
  readonly warnings: ValidationError[] = [];

  constructor(private readonly source: string) {}

  build(cst: CstNode): SequenceModel {
    const statements = this.lines(childNodes(cst, 'line'));
    return { participants: [...this.participants.values()], statements };
  }

  private text(node: CstNode | undefined): string {
    return sourceText(this.source, node);
  }

  // The first sighting fixes the display name; later declarations do not rename.
  private touch(id: string, display?: string): void {
    if (!this.participants.has(id)) this.participants.set(id, { id, display: display ?? id });
  }

  private actor(node: CstNode, key = 'actorRef', index = 0): string {
    const id = this.text(childNode(node, key, index));
    this.touch(id);
    return id;
  }

  private lines(nodes: CstNode[]): Statement[] {
    const out: Statement[] = [];
    for (const ln of nodes) {
      const stmt = this.line(ln);
      if (stmt) out.push(stmt);
    }
    return out;
  }

  private line(ln: CstNode): Statement | undefined {
    const decl = childNode(ln, 'participantDecl') ?? childNode(ln, 'createStmt');
    if (decl) return this.participantDecl(decl);

    const auto = childNode(ln, 'autonumberStmt');
    if (auto) return this.autonumber(auto);

    const note = childNode(ln, 'noteStmt');
    if (note) return this.note(note);

    const act = childNode(ln, 'activateStmt');
    if (act) {
      const actor = this.actor(act);
      this.depth.set(actor, (this.depth.get(actor) ?? 0) + 1);
      return { kind: 'activate', actor };
    }

    const deact = childNode(ln, 'deactivateStmt');
    if (deact) {
      const actor = this.actor(deact);
      this.release(actor, childToken(deact, 'DeactivateKeyword'));
      return { kind: 'deactivate', actor };
    }

    const destroy = childNode(ln, 'destroyStmt');
    if (destroy) return { kind: 'destroy', actor: this.actor(destroy) };

    const simple = childNode(ln, 'simpleBlock');
    if (simple) return this.simpleBlock(simple);

    for (const b of BRANCHING) {
      const node = childNode(ln, b.rule);
      if (node) return this.branchingBlock(node, b);
    }

    const msg = childNode(ln, 'messageStmt');
    if (msg) return this.message(msg);

    // blank line
    return undefined;
  }

  private release(actor: string, at: IToken | undefined): void {
    const d = this.depth.get(actor) ?? 0;
    if (d === 0) {
      this.warnings.push(warningAtToken(at, `Participant '${actor}' is not active.`, {
        code: 'SE-DEACTIVATE-INACTIVE',
        hint: `Activate it first with 'activate ${actor}' or a '+' on an incoming message.`,
      }));
      return;
    }
    this.depth.set(actor, d - 1);
  }

  private participantDecl(decl: CstNode): Statement {
    const id = this.text(childNode(decl, 'actorRef'));
    const alias = childNode(decl, 'lineRemainder');
    const display = alias ? this.text(alias) : undefined;
    this.touch(id, display ?? id);
    return display === undefined ? { kind: 'participant', id } : { kind: 'participant', id, display };
  }

  private autonumber(node: CstNode): Statement | undefined {
    if (has(node, 'OffKeyword')) return undefined;
    const start = childToken(node, 'NumberLiteral');
    if (start) {
      this.warnings.push(warningAtToken(start, 'Autonumber start and step are ignored; numbering starts at 1.', {
        code: 'SE-AUTONUMBER-ARGS-IGNORED',
      }));
    }
    return { kind: 'autonumber' };
  }

  private note(node: CstNode): Statement {
    const pos: NotePos = has(node, 'LeftKeyword') ? 'leftOf' : has(node, 'RightKeyword') ? 'rightOf' : 'over';
    const actors = childNodes(node, 'actorRef').map((_, i) => this.actor(node, 'actorRef', i));
    return { kind: 'note', note: { pos, actors, text: this.text(childNode(node, 'lineRemainder')) } };
  }

  private message(node: CstNode): Statement {
    const from = this.actor(node, 'actorRef', 0);
    const to = this.actor(node, 'actorRef', 1);
    const arrowTok = firstToken(childNode(node, 'arrow') ?? node);
    const arrow = ARROWS[arrowTok?.tokenType.name ?? 'Async'] ?? ARROWS.Async;
    const activateTarget = has(node, 'Plus');
    const deactivateSource = has(node, 'Minus');
    if (activateTarget) this.depth.set(to, (this.depth.get(to) ?? 0) + 1);
    if (deactivateSource) this.release(from, childToken(node, 'Minus'));
    return {
      kind: 'message',
      msg: {
        from,
        to,
        text: this.text(childNode(node, 'lineRemainder')),
        line: arrow.line,
        marker: arrow.marker,
        activateTarget,
        deactivateSource,
      },
    };
  }

  private body(node: CstNode | undefined): { title: string; body: Statement[] } {
    return {
      title: this.text(childNode(node, 'lineRemainder')),
      body: this.lines(childNodes(node, 'line')),
    };
  }

  private simpleBlock(node: CstNode): Statement {
    const keyword = Object.keys(SIMPLE_BLOCKS).find((k) => has(node, k)) ?? 'LoopKeyword';
    const { title, body } = this.body(childNode(node, 'blockBody'));
    return { kind: 'block', block: SIMPLE_BLOCKS[keyword], title, body };
  }

  private branchingBlock(node: CstNode, form: (typeof BRANCHING)[number]): Statement {
    const { title, body } = this.body(childNode(node, 'blockBody'));
    const branches: BlockBranch[] = childNodes(node, form.branchRule).map((br) => ({
      kind: form.branch,
      ...this.body(childNode(br, 'blockBody')),
    }));
    return { kind: 'branching', block: form.block, title, body, branches };
  }
}

export function buildSequenceFromCst(cst: CstNode, text: string): BuildResult<SequenceModel> {
  const builder = new SequenceBuilder(text);
  const model = builder.build(cst);
  return { model, errors: builder.warnings };
}

export function buildSequenceModel(text: string): ParseResult<SequenceModel> {
  return parseWithChevrotain(text, {
    tokenize,
    parse,
    mapParserError: mapSequenceParserError,
    build: buildSequenceFromCst,
  });
}
