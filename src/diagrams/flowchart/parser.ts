import { CstParser, type CstNode, type IRecognitionException, type IToken } from 'chevrotain';
import * as tokens from './lexer.js';

export class FlowchartParser extends CstParser {
    constructor() {
        super(tokens.allTokens);

        // Perform self analysis to detect grammar errors
        this.performSelfAnalysis();
    }

    // Main rule - a flowchart diagram
    public diagram = this.RULE("diagram", () => {
        this.OR([
            { ALT: () => this.CONSUME(tokens.FlowchartKeyword) },
            { ALT: () => this.CONSUME(tokens.GraphKeyword) }
        ]);

        this.CONSUME(tokens.Direction);

        this.MANY(() => {
            this.SUBRULE(this.statement);
        });
    });

    private statement = this.RULE("statement", () => {
        this.OR([
            { ALT: () => this.SUBRULE(this.nodeStatement) },
            { ALT: () => this.SUBRULE(this.subgraph) },
            { ALT: () => this.SUBRULE(this.directionStatement) },
            { ALT: () => this.CONSUME(tokens.Semicolon) },
            { ALT: () => this.CONSUME(tokens.Newline) } // Empty lines
        ]);
    });

    // A chain of node groups joined by links: A & B --> C --> D
    private nodeStatement = this.RULE("nodeStatement", () => {
        this.SUBRULE(this.nodeGroup);

        this.MANY(() => {
            this.SUBRULE(this.link);
            this.SUBRULE2(this.nodeGroup);
        });

        // Statement ends at a separator (prevents two nodes on one line without a link)
        this.OR2([
            { ALT: () => this.CONSUME(tokens.Newline) },
            { ALT: () => this.CONSUME(tokens.Semicolon) }
        ]);
    });

    private nodeGroup = this.RULE("nodeGroup", () => {
        this.SUBRULE(this.node);

        this.MANY(() => {
            this.CONSUME(tokens.Ampersand);
            this.SUBRULE2(this.node);
        });
    });

    private node = this.RULE("node", () => {
        this.CONSUME(tokens.Identifier, { LABEL: "nodeId" });
        this.OPTION(() => {
            this.SUBRULE(this.nodeShape);
        });
    });

    private nodeShape = this.RULE("nodeShape", () => {
        this.OR([
            // Square brackets: [text]
            {
                ALT: () => {
                    this.CONSUME(tokens.SquareOpen);
                    this.OPTION(() => this.SUBRULE(this.nodeContent));
                    this.CONSUME(tokens.SquareClose);
                }
            },
            // Double round: ((text)) (circle)
            {
                ALT: () => {
                    this.CONSUME(tokens.DoubleRoundOpen);
                    this.OPTION2(() => this.SUBRULE2(this.nodeContent));
                    this.CONSUME(tokens.DoubleRoundClose);
                }
            },
            // Round brackets: (text)
            {
                ALT: () => {
                    this.CONSUME(tokens.RoundOpen);
                    this.OPTION3(() => this.SUBRULE3(this.nodeContent));
                    this.CONSUME(tokens.RoundClose);
                }
            },
            // Diamond: {text}
            {
                ALT: () => {
                    this.CONSUME(tokens.DiamondOpen);
                    this.OPTION4(() => this.SUBRULE4(this.nodeContent));
                    this.CONSUME(tokens.DiamondClose);
                }
            }
        ]);
    });

    // Content inside node shapes and pipes; brackets need quotes
    private nodeContent = this.RULE("nodeContent", () => {
        this.OR([
            { ALT: () => this.CONSUME(tokens.QuotedString) },
            {
                ALT: () => {
                    this.AT_LEAST_ONE(() => {
                        this.OR2(tokens.labelTokens.map((tok) => ({ ALT: () => this.CONSUME(tok) })));
                    });
                }
            }
        ]);
    });

    private link = this.RULE("link", () => {
        this.OR([
            // Inline label: -- text --> or -- text ---
            {
                ALT: () => {
                    this.CONSUME(tokens.TwoDashes);
                    this.SUBRULE(this.inlineLabel);
                    this.OR2([
                        { ALT: () => this.CONSUME(tokens.Arrow) },
                        { ALT: () => this.CONSUME(tokens.Line) }
                    ]);
                }
            },
            ...tokens.linkTokens.map((tok) => ({ ALT: () => this.CONSUME2(tok) }))
        ]);

        // Optional link text in pipes |text|
        this.OPTION(() => this.SUBRULE(this.linkLabel));
    });

    private linkLabel = this.RULE("linkLabel", () => {
        this.CONSUME(tokens.Pipe);
        this.SUBRULE(this.nodeContent);
        this.CONSUME2(tokens.Pipe);
    });

    private inlineLabel = this.RULE("inlineLabel", () => {
        this.AT_LEAST_ONE(() => {
            this.OR(tokens.inlineLabelTokens.map((tok) => ({ ALT: () => this.CONSUME(tok) })));
        });
    });

    // subgraph id, subgraph id [Title], subgraph "Title" or subgraph Some Title
    private subgraph = this.RULE("subgraph", () => {
        this.CONSUME(tokens.SubgraphKeyword);
        this.OR([
            { ALT: () => this.CONSUME(tokens.QuotedString, { LABEL: 'subgraphTitleQ' }) },
            {
                ALT: () => {
                    this.CONSUME(tokens.Identifier, { LABEL: 'subgraphId' });
                    this.OPTION(() => {
                        this.OR2([
                            {
                                ALT: () => {
                                    this.CONSUME(tokens.SquareOpen);
                                    this.SUBRULE(this.nodeContent);
                                    this.CONSUME(tokens.SquareClose);
                                }
                            },
                            { ALT: () => this.SUBRULE(this.inlineLabel, { LABEL: 'titleWords' }) }
                        ]);
                    });
                }
            }
        ]);

        this.CONSUME(tokens.Newline);

        this.MANY(() => {
            this.SUBRULE(this.statement);
        });

        this.CONSUME(tokens.EndKeyword);
    });

    // direction TB/RL/LR/BT inside a subgraph
    private directionStatement = this.RULE("directionStatement", () => {
        this.CONSUME(tokens.DirectionKeyword);
        this.CONSUME(tokens.Direction);
    });
}

export const parserInstance = new FlowchartParser();

export function parse(input: IToken[]): { cst: CstNode; errors: IRecognitionException[] } {
    parserInstance.input = input;
    const cst = parserInstance.diagram();
    return { cst, errors: parserInstance.errors };
}
