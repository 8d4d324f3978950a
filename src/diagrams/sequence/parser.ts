import { CstParser, type CstNode, type IRecognitionException, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class SequenceParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public diagram = this.RULE('diagram', () => {
    this.OPTION(() => this.CONSUME(t.SequenceKeyword));
    this.MANY(() => this.SUBRULE(this.line));
  });

  private line = this.RULE('line', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.participantDecl) },
      { ALT: () => this.SUBRULE(this.createStmt) },
      { ALT: () => this.SUBRULE(this.autonumberStmt) },
      { ALT: () => this.SUBRULE(this.noteStmt) },
      { ALT: () => this.SUBRULE(this.activateStmt) },
      { ALT: () => this.SUBRULE(this.deactivateStmt) },
      { ALT: () => this.SUBRULE(this.destroyStmt) },
      { ALT: () => this.SUBRULE(this.altBlock) },
      { ALT: () => this.SUBRULE(this.parBlock) },
      { ALT: () => this.SUBRULE(this.criticalBlock) },
      { ALT: () => this.SUBRULE(this.simpleBlock) },
      { ALT: () => this.SUBRULE(this.messageStmt) },
      { ALT: () => this.CONSUME(t.Newline) },
    ]);
  });

  private actorRef = this.RULE('actorRef', () => {
    this.AT_LEAST_ONE(() => this.OR([
      { ALT: () => this.CONSUME(t.Identifier) },
      { ALT: () => this.CONSUME(t.QuotedString) },
      { ALT: () => this.CONSUME(t.NumberLiteral) },
    ]));
  });

  private participantDecl = this.RULE('participantDecl', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.ParticipantKeyword) },
      { ALT: () => this.CONSUME(t.ActorKeyword) },
    ]);
    this.SUBRULE(this.actorRef);
    this.OPTION(() => {
      this.CONSUME(t.AsKeyword);
      this.SUBRULE(this.lineRemainder);
    });
    this.CONSUME(t.Newline);
  });

  private createStmt = this.RULE('createStmt', () => {
    this.CONSUME(t.CreateKeyword);
    this.OR([
      { ALT: () => this.CONSUME(t.ParticipantKeyword) },
      { ALT: () => this.CONSUME(t.ActorKeyword) },
    ]);
    this.SUBRULE(this.actorRef);
    this.OPTION(() => {
      this.CONSUME(t.AsKeyword);
      this.SUBRULE(this.lineRemainder);
    });
    this.CONSUME(t.Newline);
  });

  private autonumberStmt = this.RULE('autonumberStmt', () => {
    this.CONSUME(t.AutonumberKeyword);
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(t.OffKeyword) },
        { ALT: () => {
          this.CONSUME(t.NumberLiteral);
          this.OPTION2(() => this.CONSUME2(t.NumberLiteral));
        } },
      ]);
    });
    this.CONSUME(t.Newline);
  });

  private noteStmt = this.RULE('noteStmt', () => {
    this.CONSUME(t.NoteKeyword);
    this.OR([
      { ALT: () => {
        this.OR2([
          { ALT: () => this.CONSUME(t.LeftKeyword) },
          { ALT: () => this.CONSUME(t.RightKeyword) },
        ]);
        this.CONSUME(t.OfKeyword);
        this.SUBRULE(this.actorRef);
      } },
      { ALT: () => {
        this.CONSUME(t.OverKeyword);
        this.SUBRULE2(this.actorRef);
        this.OPTION(() => {
          this.CONSUME(t.Comma);
          this.SUBRULE3(this.actorRef);
        });
      } },
    ]);
    this.CONSUME(t.Colon);
    this.OPTION2(() => this.SUBRULE(this.lineRemainder));
    this.CONSUME(t.Newline);
  });

  private activateStmt = this.RULE('activateStmt', () => {
    this.CONSUME(t.ActivateKeyword);
    this.SUBRULE(this.actorRef);
    this.CONSUME(t.Newline);
  });

  private deactivateStmt = this.RULE('deactivateStmt', () => {
    this.CONSUME(t.DeactivateKeyword);
    this.SUBRULE(this.actorRef);
    this.CONSUME(t.Newline);
  });

  private destroyStmt = this.RULE('destroyStmt', () => {
    this.CONSUME(t.DestroyKeyword);
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(t.ParticipantKeyword) },
        { ALT: () => this.CONSUME(t.ActorKeyword) },
      ]);
    });
    this.SUBRULE(this.actorRef);
    this.CONSUME(t.Newline);
  });

  private messageStmt = this.RULE('messageStmt', () => {
    this.SUBRULE(this.actorRef);
    this.SUBRULE(this.arrow);
    this.OPTION(() => this.OR([
      { ALT: () => this.CONSUME(t.Plus) },
      { ALT: () => this.CONSUME(t.Minus) },
    ]));
    this.SUBRULE2(this.actorRef);
    this.OPTION2(() => {
      this.CONSUME(t.Colon);
      this.OPTION3(() => this.SUBRULE(this.lineRemainder));
    });
    this.CONSUME(t.Newline);
  });

  private arrow = this.RULE('arrow', () => {
    this.OR(t.arrowTokens.map((tok) => ({ ALT: () => this.CONSUME(tok) })));
  });

  // Blocks. Each branch is its own subrule so a branch keeps its body lines.
  private altBlock = this.RULE('altBlock', () => {
    this.CONSUME(t.AltKeyword);
    this.SUBRULE(this.blockBody);
    this.MANY(() => this.SUBRULE(this.elseBranch));
    this.CONSUME(t.EndKeyword);
    this.CONSUME(t.Newline);
  });

  private elseBranch = this.RULE('elseBranch', () => {
    this.CONSUME(t.ElseKeyword);
    this.SUBRULE(this.blockBody);
  });

  private parBlock = this.RULE('parBlock', () => {
    this.CONSUME(t.ParKeyword);
    this.SUBRULE(this.blockBody);
    this.MANY(() => this.SUBRULE(this.andBranch));
    this.CONSUME(t.EndKeyword);
    this.CONSUME(t.Newline);
  });

  private andBranch = this.RULE('andBranch', () => {
    this.CONSUME(t.AndKeyword);
    this.SUBRULE(this.blockBody);
  });

  private criticalBlock = this.RULE('criticalBlock', () => {
    this.CONSUME(t.CriticalKeyword);
    this.SUBRULE(this.blockBody);
    this.MANY(() => this.SUBRULE(this.optionBranch));
    this.CONSUME(t.EndKeyword);
    this.CONSUME(t.Newline);
  });

  private optionBranch = this.RULE('optionBranch', () => {
    this.CONSUME(t.OptionKeyword);
    this.SUBRULE(this.blockBody);
  });

  private simpleBlock = this.RULE('simpleBlock', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.LoopKeyword) },
      { ALT: () => this.CONSUME(t.OptKeyword) },
      { ALT: () => this.CONSUME(t.BreakKeyword) },
      { ALT: () => this.CONSUME(t.RectKeyword) },
    ]);
    this.SUBRULE(this.blockBody);
    this.CONSUME(t.EndKeyword);
    this.CONSUME(t.Newline);
  });

  // Optional title, then the lines up to the next branch keyword or `end`
  private blockBody = this.RULE('blockBody', () => {
    this.OPTION(() => this.SUBRULE(this.lineRemainder));
    this.CONSUME(t.Newline);
    this.MANY(() => this.SUBRULE(this.line));
  });

  private lineRemainder = this.RULE('lineRemainder', () => {
    this.AT_LEAST_ONE(() => this.OR(t.textTokens.map((tok) => ({ ALT: () => this.CONSUME(tok) }))));
  });
}

export const parserInstance = new SequenceParser();

export function parse(tokens: IToken[]): { cst: CstNode; errors: IRecognitionException[] } {
  parserInstance.input = tokens;
  const cst = parserInstance.diagram();
  return { cst, errors: parserInstance.errors };
}
