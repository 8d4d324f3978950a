import { createToken, Lexer } from 'chevrotain';

// Entity names may contain hyphens after the first character (LINE-ITEM)
export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_\u00C0-\uFFFF][A-Za-z0-9_\-\u00C0-\uFFFF]*/ });
export const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /[0-9]+(\.[0-9]+)?/ });

export const ErKeyword = createToken({ name: 'ErKeyword', pattern: /erDiagram/, longer_alt: Identifier });
export const KeyMarker = createToken({ name: 'KeyMarker', pattern: /PK|FK|UK/, longer_alt: Identifier });

// Crow's foot ends; which side they are valid on is checked when building
export const Cardinality = createToken({ name: 'Cardinality', pattern: /\|\||\|o|o\||\}\||\|\{|\}o|o\{/ });
export const Identifying = createToken({ name: 'Identifying', pattern: /--/ });
export const NonIdentifying = createToken({ name: 'NonIdentifying', pattern: /\.\./ });

export const LCurly = createToken({ name: 'LCurly', pattern: /\{/ });
export const RCurly = createToken({ name: 'RCurly', pattern: /\}/ });
export const Colon = createToken({ name: 'Colon', pattern: /:/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });

export const QuotedString = createToken({ name: 'QuotedString', pattern: /"(?:\\.|[^"\\\n\r])*"/ });
export const Comment = createToken({ name: 'Comment', pattern: /%%[^\n\r]*/, group: Lexer.SKIPPED });
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Newline = createToken({ name: 'Newline', pattern: /[\n\r]+/, line_breaks: true });
// Anything else that can appear in a relationship label
export const Text = createToken({ name: 'Text', pattern: /[^\s{}:",]+/ });

export const allTokens = [
  Comment,
  WhiteSpace,
  Newline,
  QuotedString,
  Cardinality,
  Identifying,
  NonIdentifying,
  ErKeyword,
  KeyMarker,
  NumberLiteral,
  Identifier,
  LCurly,
  RCurly,
  Colon,
  Comma,
  Text,
];

export const labelTokens = [Identifier, KeyMarker, NumberLiteral, Cardinality, Identifying, NonIdentifying, Comma, Text];

export const ErLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return ErLexer.tokenize(text.endsWith('\n') ? text : text + '\n');
}
