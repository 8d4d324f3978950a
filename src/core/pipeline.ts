import type { CstNode, ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { ValidationError } from './types.js';
import { fromLexerError } from './diagnostics.js';

export interface BuildResult<TModel> {
  model: TModel;
  errors: ValidationError[];
}

export interface ParseAdapters<TModel> {
  tokenize: (text: string) => { tokens: IToken[]; errors: ILexingError[] };
  parse: (tokens: IToken[]) => { cst: CstNode; errors: IRecognitionException[] };
  mapParserError: (err: IRecognitionException, text: string) => ValidationError;
  build: (cst: CstNode, text: string) => BuildResult<TModel>;
}

export interface ParseResult<TModel> {
  /** Present only when lexing and parsing succeeded. */
  model?: TModel;
  errors: ValidationError[];
}

/**
 * Lex, parse and build a model. The builder only sees a CST from an input
 * that parsed cleanly; its own diagnostics (usually warnings) are appended.
 */
export function parseWithChevrotain<TModel>(text: string, adapters: ParseAdapters<TModel>): ParseResult<TModel> {
  const lex = adapters.tokenize(text);
  if (lex.errors.length > 0) {
    return { errors: lex.errors.map(fromLexerError) };
  }

  const parsed = adapters.parse(lex.tokens);
  if (parsed.errors.length > 0) {
    return { errors: parsed.errors.map((e) => adapters.mapParserError(e, text)) };
  }

  const built = adapters.build(parsed.cst, text);
  return { model: built.model, errors: built.errors };
}
