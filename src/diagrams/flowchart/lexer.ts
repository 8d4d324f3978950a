import { createToken, Lexer, type TokenType } from 'chevrotain';

// Node ids. Dashes stay out so `A-->B` splits at the arrow.
export const Identifier = createToken({
    name: "Identifier",
    pattern: /[A-Za-z0-9_\u00C0-\uFFFF]+/
});

// Keywords
export const FlowchartKeyword = createToken({
    name: "FlowchartKeyword",
    pattern: /flowchart/,
    longer_alt: Identifier
});

export const GraphKeyword = createToken({
    name: "GraphKeyword",
    pattern: /graph/,
    longer_alt: Identifier
});

export const Direction = createToken({
    name: "Direction",
    pattern: /TD|TB|BT|RL|LR/,
    longer_alt: Identifier
});

export const DirectionKeyword = createToken({
    name: "DirectionKeyword",
    pattern: /direction/,
    longer_alt: Identifier
});

export const SubgraphKeyword = createToken({
    name: "SubgraphKeyword",
    pattern: /subgraph/,
    longer_alt: Identifier
});

export const EndKeyword = createToken({
    name: "EndKeyword",
    pattern: /end/,
    longer_alt: Identifier
});

export const Ampersand = createToken({ name: "Ampersand", pattern: /&/ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });

// Links - order matters, more specific first
export const DottedArrow = createToken({ name: "DottedArrow", pattern: /-\.+->/ });
export const DottedLine = createToken({ name: "DottedLine", pattern: /-\.+-/ });
export const ThickArrow = createToken({ name: "ThickArrow", pattern: /==+>/ });
export const ThickLine = createToken({ name: "ThickLine", pattern: /===+/ });
export const Arrow = createToken({ name: "Arrow", pattern: /--+>/ });
export const Line = createToken({ name: "Line", pattern: /---+/ });

// Opens an inline label: A -- text --> B
export const TwoDashes = createToken({ name: "TwoDashes", pattern: /--/ });

// Node shapes
export const DoubleRoundOpen = createToken({ name: "DoubleRoundOpen", pattern: /\(\(/ });
export const DoubleRoundClose = createToken({ name: "DoubleRoundClose", pattern: /\)\)/ });
export const SquareOpen = createToken({ name: "SquareOpen", pattern: /\[/ });
export const SquareClose = createToken({ name: "SquareClose", pattern: /\]/ });
export const RoundOpen = createToken({ name: "RoundOpen", pattern: /\(/ });
export const RoundClose = createToken({ name: "RoundClose", pattern: /\)/ });
export const DiamondOpen = createToken({ name: "DiamondOpen", pattern: /\{/ });
export const DiamondClose = createToken({ name: "DiamondClose", pattern: /\}/ });

// Edge label delimiter
export const Pipe = createToken({ name: "Pipe", pattern: /\|/ });

export const QuotedString = createToken({
    name: "QuotedString",
    pattern: /"[^"\n\r]*"/
});

export const Comment = createToken({
    name: "Comment",
    pattern: /%%[^\n\r]*/,
    group: Lexer.SKIPPED
});

// Label text that is neither an id nor a delimiter
export const Text = createToken({
    name: "Text",
    pattern: /[^\[\](){}|&;"\n\r\t ]+/
});

export const WhiteSpace = createToken({
    name: "WhiteSpace",
    pattern: /[ \t]+/,
    group: Lexer.SKIPPED
});

export const Newline = createToken({
    name: "Newline",
    pattern: /[\n\r]+/,
    line_breaks: true
});

export const linkTokens: TokenType[] = [DottedArrow, DottedLine, ThickArrow, ThickLine, Arrow, Line];

export const keywordTokens: TokenType[] = [
    FlowchartKeyword,
    GraphKeyword,
    SubgraphKeyword,
    EndKeyword,
    DirectionKeyword,
    Direction,
];

// Token order is CRUCIAL - most specific first
export const allTokens: TokenType[] = [
    Comment,
    QuotedString,
    ...keywordTokens,
    DoubleRoundOpen,
    DoubleRoundClose,
    ...linkTokens,
    TwoDashes,
    SquareOpen,
    SquareClose,
    RoundOpen,
    RoundClose,
    DiamondOpen,
    DiamondClose,
    Pipe,
    Ampersand,
    Semicolon,
    Identifier,
    Text,
    WhiteSpace,
    Newline
];

/** Words allowed in an unquoted label inside a shape or between pipes. */
export const labelTokens: TokenType[] = [Identifier, Text, ...keywordTokens, ...linkTokens, TwoDashes, Ampersand, Semicolon];

/** Words allowed in an inline `-- text -->` label; the closing link ends it. */
export const inlineLabelTokens: TokenType[] = [Identifier, Text, ...keywordTokens];

export const FlowchartLexer = new Lexer(allTokens);

export function tokenize(text: string) {
    return FlowchartLexer.tokenize(text.endsWith('\n') ? text : `${text}\n`);
}
