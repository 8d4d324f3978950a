import { createToken, Lexer, type TokenType } from 'chevrotain';

// Participant ids. '-' stays out so the arrow after `A` is not swallowed.
export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_\u00C0-\uFFFF][A-Za-z0-9_\u00C0-\uFFFF]*/ });

export const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /[0-9]+/ });

/** Case-insensitive word that still lexes as an id when followed by more id characters. */
function keyword(name: string, word: string): TokenType {
  return createToken({ name, pattern: new RegExp(word, 'i'), longer_alt: Identifier });
}

// Header (optional in a sequence source)
export const SequenceKeyword = createToken({ name: 'SequenceKeyword', pattern: /sequenceDiagram/, longer_alt: Identifier });

export const ParticipantKeyword = keyword('ParticipantKeyword', 'participant');
export const ActorKeyword = keyword('ActorKeyword', 'actor');
export const AsKeyword = keyword('AsKeyword', 'as');

export const AutonumberKeyword = keyword('AutonumberKeyword', 'autonumber');
export const OffKeyword = keyword('OffKeyword', 'off');

export const NoteKeyword = keyword('NoteKeyword', 'note');
export const LeftKeyword = keyword('LeftKeyword', 'left');
export const RightKeyword = keyword('RightKeyword', 'right');
export const OverKeyword = keyword('OverKeyword', 'over');
export const OfKeyword = keyword('OfKeyword', 'of');

export const ActivateKeyword = keyword('ActivateKeyword', 'activate');
export const DeactivateKeyword = keyword('DeactivateKeyword', 'deactivate');

export const CreateKeyword = keyword('CreateKeyword', 'create');
export const DestroyKeyword = keyword('DestroyKeyword', 'destroy');

export const AltKeyword = keyword('AltKeyword', 'alt');
export const ElseKeyword = keyword('ElseKeyword', 'else');
export const OptionKeyword = keyword('OptionKeyword', 'option');
export const OptKeyword = keyword('OptKeyword', 'opt');
export const LoopKeyword = keyword('LoopKeyword', 'loop');
export const ParKeyword = keyword('ParKeyword', 'par');
export const AndKeyword = keyword('AndKeyword', 'and');
export const RectKeyword = keyword('RectKeyword', 'rect');
export const CriticalKeyword = keyword('CriticalKeyword', 'critical');
export const BreakKeyword = keyword('BreakKeyword', 'break');
export const EndKeyword = keyword('EndKeyword', 'end');

// Arrows (order matters: longest first)
export const DottedAsync = createToken({ name: 'DottedAsync', pattern: /-->>/ });
export const Async = createToken({ name: 'Async', pattern: /->>/ });
export const Dotted = createToken({ name: 'Dotted', pattern: /-->/ });
export const Solid = createToken({ name: 'Solid', pattern: /->/ });
export const DottedCross = createToken({ name: 'DottedCross', pattern: /--x/ });
export const Cross = createToken({ name: 'Cross', pattern: /-x/ });
export const DottedOpen = createToken({ name: 'DottedOpen', pattern: /--\)/ });
export const Open = createToken({ name: 'Open', pattern: /-\)/ });

// Activation shorthand before the target: + (activate target) or - (deactivate source)
export const Plus = createToken({ name: 'Plus', pattern: /\+/ });
export const Minus = createToken({ name: 'Minus', pattern: /-/ });

export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const Colon = createToken({ name: 'Colon', pattern: /:/ });

export const QuotedString = createToken({ name: 'QuotedString', pattern: /"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*'/ });

export const Comment = createToken({ name: 'Comment', pattern: /%%[^\n\r]*/, group: Lexer.SKIPPED });
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Newline = createToken({ name: 'Newline', pattern: /[\n\r]+/, line_breaks: true });

// Anything else up to end of line (message and note bodies)
export const Text = createToken({ name: 'Text', pattern: /[^\n\r]+/ });

export const keywordTokens: TokenType[] = [
  SequenceKeyword,
  ParticipantKeyword,
  ActorKeyword,
  AsKeyword,
  AutonumberKeyword,
  OffKeyword,
  NoteKeyword,
  LeftKeyword,
  RightKeyword,
  OverKeyword,
  OfKeyword,
  ActivateKeyword,
  DeactivateKeyword,
  CreateKeyword,
  DestroyKeyword,
  AltKeyword,
  ElseKeyword,
  OptionKeyword,
  OptKeyword,
  LoopKeyword,
  ParKeyword,
  AndKeyword,
  RectKeyword,
  CriticalKeyword,
  BreakKeyword,
  EndKeyword,
];

export const arrowTokens: TokenType[] = [DottedAsync, Async, Dotted, Solid, DottedCross, Cross, DottedOpen, Open];

export const allTokens: TokenType[] = [
  Comment,
  QuotedString,
  // Whitespace and newlines first so Text won't eat indentation
  WhiteSpace,
  Newline,
  ...keywordTokens,
  ...arrowTokens,
  Comma,
  Colon,
  Plus,
  Minus,
  NumberLiteral,
  Identifier,
  Text,
];

/** Every token that may appear inside free text after a colon or a block keyword. */
export const textTokens: TokenType[] = allTokens.filter(
  (tok) => tok !== Comment && tok !== WhiteSpace && tok !== Newline
);

export const SequenceLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  // Statements end at a newline; give the last one its terminator.
  return SequenceLexer.tokenize(text.endsWith('\n') ? text : `${text}\n`);
}
