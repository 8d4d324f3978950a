import { CstParser, type CstNode, type IRecognitionException, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class ErParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public diagram = this.RULE('diagram', () => {
    this.MANY(() => this.CONSUME(t.Newline));
    this.CONSUME(t.ErKeyword);
    this.MANY2(() => this.SUBRULE(this.statement));
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.relationship) },
      { ALT: () => this.SUBRULE(this.entityStmt) },
      { ALT: () => this.CONSUME(t.Newline) },
    ]);
  });

  // CUSTOMER ||--o{ ORDER : places
  private relationship = this.RULE('relationship', () => {
    this.CONSUME(t.Identifier, { LABEL: 'from' });
    this.SUBRULE(this.cardinality);
    this.CONSUME2(t.Identifier, { LABEL: 'to' });
    this.CONSUME(t.Colon);
    this.SUBRULE(this.relLabel);
    this.CONSUME(t.Newline);
  });

  private cardinality = this.RULE('cardinality', () => {
    this.CONSUME(t.Cardinality, { LABEL: 'left' });
    this.OR([
      { ALT: () => this.CONSUME(t.Identifying) },
      { ALT: () => this.CONSUME(t.NonIdentifying) },
    ]);
    this.CONSUME2(t.Cardinality, { LABEL: 'right' });
  });

  private relLabel = this.RULE('relLabel', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.QuotedString) },
      {
        ALT: () =>
          this.AT_LEAST_ONE(() => {
            this.OR2(t.labelTokens.map((tok) => ({ ALT: () => this.CONSUME(tok) })));
          }),
      },
    ]);
  });

  // CUSTOMER, or CUSTOMER { ... }
  private entityStmt = this.RULE('entityStmt', () => {
    this.CONSUME(t.Identifier, { LABEL: 'name' });
    this.OPTION(() => this.SUBRULE(this.attributeBlock));
    this.CONSUME(t.Newline);
  });

  private attributeBlock = this.RULE('attributeBlock', () => {
    this.CONSUME(t.LCurly);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.SUBRULE(this.attribute) },
        { ALT: () => this.CONSUME(t.Newline) },
      ]);
    });
    this.CONSUME(t.RCurly);
  });

  // string name PK, FK "comment"
  private attribute = this.RULE('attribute', () => {
    this.CONSUME(t.Identifier, { LABEL: 'type' });
    this.CONSUME2(t.Identifier, { LABEL: 'name' });
    this.OPTION(() => {
      this.CONSUME(t.KeyMarker);
      this.MANY(() => {
        this.CONSUME(t.Comma);
        this.CONSUME2(t.KeyMarker);
      });
    });
    this.OPTION2(() => this.CONSUME(t.QuotedString, { LABEL: 'comment' }));
  });
}

export const parserInstance = new ErParser();

export function parse(tokens: IToken[]): { cst: CstNode; errors: IRecognitionException[] } {
  parserInstance.input = tokens;
  const cst = parserInstance.diagram();
  return { cst, errors: parserInstance.errors };
}
