import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { ValidationError } from './types.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const last = lines[lines.length - 1] ?? '';
  const column = Math.max(1, last.length + 1);
  return { line, column };
}

export function codeFrame(
  text: string,
  line: number,
  column: number,
  length = 1,
  contextLines = 1
): string {
  const lines = text.split(/\r?\n/);
  const idx = Math.max(0, Math.min(lines.length - 1, line - 1));
  const start = Math.max(0, idx - contextLines);
  const end = Math.min(lines.length - 1, idx + contextLines);
  const numWidth = String(end + 1).length;

  const parts: string[] = [];
  for (let i = start; i <= end; i++) {
    const lno = String(i + 1).padStart(numWidth, ' ');
    parts.push(`${lno} | ${lines[i] ?? ''}`);
    if (i === idx) {
      const caretPad = ' '.repeat(Math.max(0, column - 1));
      const marker = '^'.repeat(Math.max(1, Math.min(length, (lines[i] ?? '').length - column + 1)));
      parts.push(`${' '.repeat(numWidth)} | ${caretPad}${marker}`);
    }
  }
  return parts.join('\n');
}

export function fromLexerError(e: ILexingError): ValidationError {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    message: e.message,
    length: e.length,
  };
}

// Helpers shared by the per-diagram mappers
interface ErrorContext {
  line: number;
  column: number;
  found: string;
  tokType: string;
  len: number;
  lineText: string;
  stack: string[];
}

function tokenImage(t: IToken | undefined) {
  const img = t?.image ?? '';
  return img === '\n' ? '\\n' : img;
}

function contextOf(err: IRecognitionException, text: string): ErrorContext {
  const tok: IToken | undefined = err.token;
  const fallback = endOfTextPos(text);
  const { line, column } = coercePos(tok?.startLine, tok?.startColumn, fallback.line, fallback.column);
  const image = tok?.image ?? '';
  return {
    line,
    column,
    found: tokenImage(tok),
    tokType: tok?.tokenType.name ?? 'EOF',
    len: image.length > 0 ? image.length : 1,
    lineText: text.split(/\r?\n/)[line - 1] ?? '',
    stack: err.context?.ruleStack ?? [],
  };
}

function expecting(err: IRecognitionException, tokenName: string) {
  // Chevrotain does not expose expected tokens structurally; read the message.
  return err.message.includes(`--> ${tokenName} <--`);
}

function unbalancedQuote(lineText: string): number | undefined {
  const positions: number[] = [];
  for (let i = 0; i < lineText.length; i++) {
    if (lineText[i] === '"' && lineText[i - 1] !== '\\') positions.push(i);
  }
  return positions.length % 2 === 1 ? positions[positions.length - 1] + 1 : undefined;
}

function quoteError(c: ErrorContext, code: string): ValidationError | undefined {
  const col = unbalancedQuote(c.lineText);
  if (col === undefined) return undefined;
  return { line: c.line, column: col, severity: 'error', code, message: 'Unclosed quote.', hint: 'Close the quote, e.g. "Text"', length: 1 };
}

const BRANCHES: Record<string, { key: string; block: string; example: string }> = {
  ElseKeyword: { key: 'else', block: 'alt', example: 'alt Condition … else … end' },
  AndKeyword: { key: 'and', block: 'par', example: 'par … and … end' },
  OptionKeyword: { key: 'option', block: 'critical', example: 'critical … option Label … end' },
};

export function mapSequenceParserError(err: IRecognitionException, text: string): ValidationError {
  const c = contextOf(err, text);
  const { line, column, len } = c;
  const inRule = (name: string) => c.stack.includes(name);
  const currentBlock = [...c.stack].reverse().find((s) => /Block$/.test(s));

  const branch = BRANCHES[c.tokType];
  if (branch) {
    if (!currentBlock) {
      return {
        line, column, severity: 'error', code: 'SE-BRANCH-OUTSIDE-BLOCK',
        message: `'${branch.key}' is only allowed inside '${branch.block}' blocks.`,
        hint: `Use: ${branch.example}`, length: len,
      };
    }
    const actual = currentBlock === 'simpleBlock' ? 'loop/opt/break/rect' : currentBlock.replace(/Block$/, '');
    return {
      line, column, severity: 'error', code: 'SE-BRANCH-IN-WRONG-BLOCK',
      message: `'${branch.key}' is only valid in '${branch.block}' blocks (not inside '${actual}').`,
      hint: `Close the block with 'end' first. For '${branch.block}', use: ${branch.example}`, length: len,
    };
  }

  if (currentBlock && expecting(err, 'EndKeyword') && c.tokType === 'EOF') {
    return {
      line, column, severity: 'error', code: 'SE-BLOCK-MISSING-END',
      message: "Missing 'end' to close a block.",
      hint: "Add 'end' on its own line after the block's last statement.", length: 1,
    };
  }

  if (c.tokType === 'EndKeyword' && !currentBlock) {
    return {
      line, column, severity: 'error', code: 'SE-END-WITHOUT-BLOCK',
      message: "'end' without an open block (alt/opt/loop/par/rect/critical/break).",
      hint: 'Remove this end or open a block above it.', length: len,
    };
  }

  if (inRule('actorRef') || inRule('participantDecl')) {
    const q = quoteError(c, 'SE-QUOTE-UNCLOSED');
    if (q) return q;
  }

  if (inRule('messageStmt')) {
    if (inRule('arrow') || expecting(err, 'Async')) {
      return {
        line, column, severity: 'error', code: 'SE-ARROW-INVALID',
        message: `Invalid sequence arrow near '${c.found}'.`,
        hint: 'Use ->, -->, ->>, -->>, -x, --x, -) or --)', length: len,
      };
    }
    if (c.tokType === 'Text' || c.tokType === 'Newline' || c.tokType === 'EOF') {
      return {
        line, column, severity: 'error', code: 'SE-MSG-MALFORMED',
        message: 'Malformed message. Expected a target participant followed by a colon and text.',
        hint: 'Use: A->>B: Message text', length: len,
      };
    }
  }

  if (inRule('noteStmt')) {
    if (expecting(err, 'Colon')) {
      return {
        line, column, severity: 'error', code: 'SE-NOTE-MALFORMED',
        message: 'Malformed note: missing colon before the note text.',
        hint: 'Example: Note right of Alice: Hello', length: len,
      };
    }
    return {
      line, column, severity: 'error', code: 'SE-NOTE-MALFORMED',
      message: 'Malformed note statement. Use left of X, right of X or over X[,Y] followed by : text',
      hint: 'Example: Note over A,B: hi', length: len,
    };
  }

  if (inRule('autonumberStmt')) {
    return {
      line, column, severity: 'error', code: 'SE-AUTONUMBER-MALFORMED',
      message: 'Malformed autonumber statement.',
      hint: 'Use: autonumber | autonumber off | autonumber 10 10', length: len,
    };
  }

  if ((inRule('activateStmt') || inRule('deactivateStmt') || inRule('destroyStmt') || inRule('createStmt'))
      && (c.tokType === 'Newline' || c.tokType === 'EOF')) {
    return {
      line, column, severity: 'error', code: 'SE-NAME-MISSING',
      message: 'Missing participant name.',
      hint: 'Example: activate Alice', length: len,
    };
  }

  return { line, column, severity: 'error', code: 'SE-SYNTAX', message: err.message || 'Parser error', length: len };
}

export function mapFlowchartParserError(err: IRecognitionException, text: string): ValidationError {
  const c = contextOf(err, text);
  const { line, column, len } = c;
  const inRule = (name: string) => c.stack.includes(name);
  const atHeader = c.stack.length === 1 && c.stack[0] === 'diagram';

  if (atHeader && expecting(err, 'Direction')) {
    if (c.tokType === 'EOF' || c.tokType === 'Newline') {
      return {
        line, column, severity: 'error', code: 'FL-DIR-MISSING',
        message: 'Missing direction after diagram header. Use TD, TB, BT, RL, or LR.',
        hint: "Example: 'flowchart TD' for top-down layout.", length: 1,
      };
    }
    return {
      line, column, severity: 'error', code: 'FL-DIR-INVALID',
      message: `Invalid direction '${c.found}'. Use one of: TD, TB, BT, RL, LR.`,
      hint: "Try 'TD' (top-down) or 'LR' (left-to-right).", length: len,
    };
  }

  const q = quoteError(c, 'FL-QUOTE-UNCLOSED');
  if (q) return q;

  if (inRule('nodeShape')) {
    const closers: Array<[string, string]> = [
      ['SquareClose', ']'], ['DoubleRoundClose', '))'], ['RoundClose', ')'], ['DiamondClose', '}'],
    ];
    const missing = closers.find(([name]) => expecting(err, name));
    if (missing) {
      return {
        line, column, severity: 'error', code: 'FL-NODE-UNCLOSED-BRACKET',
        message: `Unclosed node shape. Expected '${missing[1]}' before '${c.found}'.`,
        hint: 'Example: A[Label], B(Round), C((Circle)), D{Decision}', length: len,
      };
    }
  }

  if (inRule('linkLabel') && expecting(err, 'Pipe')) {
    return {
      line, column, severity: 'error', code: 'FL-LABEL-UNCLOSED',
      message: "Edge label is missing its closing '|'.",
      hint: 'Example: A -->|yes| B', length: len,
    };
  }

  if (inRule('edgeStmt') && (c.tokType === 'Newline' || c.tokType === 'EOF')) {
    return {
      line, column, severity: 'error', code: 'FL-LINK-MISSING',
      message: 'Edge is missing its target node.',
      hint: 'Example: A --> B', length: 1,
    };
  }

  if (c.tokType === 'EndKeyword' && !inRule('subgraph')) {
    return {
      line, column, severity: 'error', code: 'FL-END-WITHOUT-SUBGRAPH',
      message: "'end' without an open subgraph.",
      hint: 'Remove this end or open a subgraph above it.', length: len,
    };
  }

  if (inRule('subgraph') && expecting(err, 'EndKeyword') && c.tokType === 'EOF') {
    return {
      line, column, severity: 'error', code: 'FL-SUBGRAPH-MISSING-END',
      message: "Missing 'end' for subgraph.",
      hint: "Add 'end' on its own line after the subgraph contents.", length: 1,
    };
  }

  return { line, column, severity: 'error', code: 'FL-SYNTAX', message: err.message || 'Parser error', length: len };
}

export function mapErParserError(err: IRecognitionException, text: string): ValidationError {
  const c = contextOf(err, text);
  const { line, column, len } = c;
  const inRule = (name: string) => c.stack.includes(name);
  const atHeader = c.stack.length === 1 && c.stack[0] === 'diagram';

  if (atHeader && expecting(err, 'ErKeyword')) {
    return {
      line, column, severity: 'error', code: 'ER-HEADER-MISSING',
      message: "Missing 'erDiagram' header.",
      hint: 'Start with: erDiagram', length: len,
    };
  }

  const q = quoteError(c, 'ER-QUOTE-UNCLOSED');
  if (q) return q;

  if (inRule('relationship')) {
    if (inRule('cardinality')) {
      return {
        line, column, severity: 'error', code: 'ER-CARDINALITY-INVALID',
        message: `Invalid cardinality near '${c.found}'.`,
        hint: 'Use ||, |o, o|, }|, |{, }o or o{ around -- or ..', length: len,
      };
    }
    if (expecting(err, 'Colon') || c.tokType === 'Newline' || c.tokType === 'EOF') {
      return {
        line, column, severity: 'error', code: 'ER-REL-MALFORMED',
        message: 'Malformed relationship. Expected a target entity, a colon and a label.',
        hint: 'Example: CUSTOMER ||--o{ ORDER : places', length: len,
      };
    }
  }

  if (inRule('attributeBlock') && c.tokType === 'EOF') {
    return {
      line, column, severity: 'error', code: 'ER-ATTRS-UNCLOSED',
      message: "Attribute block is missing its closing '}'.",
      hint: 'Example: CUSTOMER { string name PK }', length: 1,
    };
  }

  return { line, column, severity: 'error', code: 'ER-SYNTAX', message: err.message || 'Parser error', length: len };
}
