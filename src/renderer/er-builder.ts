import type { CstNode, IToken } from 'chevrotain';
import { tokenize } from '../diagrams/er/lexer.js';
import { parse } from '../diagrams/er/parser.js';
import { childNode, childNodes, childToken, childTokens, has, sourceText } from '../core/cst.js';
import { mapErParserError } from '../core/diagnostics.js';
import { errorAtToken } from '../core/errorBuilder.js';
import { parseWithChevrotain, type BuildResult, type ParseResult } from '../core/pipeline.js';
import type { ValidationError } from '../core/types.js';
import type { Cardinality, Entity, ErAttribute, ErDiagram, Relationship } from './er-types.js';

// The crow's foot points away from the entity, so each side has its own spelling
const LEFT: Record<string, Cardinality> = {
  '||': 'exactly-one',
  'o|': 'zero-or-one',
  '}|': 'one-or-many',
  '}o': 'zero-or-many',
};

const RIGHT: Record<string, Cardinality> = {
  '||': 'exactly-one',
  '|o': 'zero-or-one',
  '|{': 'one-or-many',
  'o{': 'zero-or-many',
};

export class ErBuilder {
  private entities = new Map<string, Entity>();
  private relationships: Relationship[] = [];
  private errors: ValidationError[] = [];

  constructor(private readonly source: string) {}

  build(cst: CstNode): BuildResult<ErDiagram> {
    for (const stmt of childNodes(cst, 'statement')) {
      const rel = childNode(stmt, 'relationship');
      if (rel) this.relationship(rel);
      const ent = childNode(stmt, 'entityStmt');
      if (ent) this.entityStmt(ent);
    }
    return {
      model: { entities: [...this.entities.values()], relationships: this.relationships },
      errors: this.errors,
    };
  }

  private entity(name: string): Entity {
    let e = this.entities.get(name);
    if (!e) {
      e = { name, attributes: [] };
      this.entities.set(name, e);
    }
    return e;
  }

  private relationship(node: CstNode) {
    const from = childToken(node, 'from')?.image ?? '';
    const to = childToken(node, 'to')?.image ?? '';
    this.entity(from);
    this.entity(to);

    const card = childNode(node, 'cardinality');
    this.relationships.push({
      from,
      to,
      leftCard: this.side(childToken(card, 'left'), LEFT, 'left'),
      rightCard: this.side(childToken(card, 'right'), RIGHT, 'right'),
      label: sourceText(this.source, childNode(node, 'relLabel')),
      identifying: has(card, 'Identifying'),
    });
  }

  private side(tok: IToken | undefined, table: Record<string, Cardinality>, where: 'left' | 'right'): Cardinality {
    const image = tok?.image ?? '||';
    const card = table[image];
    if (card) return card;
    this.errors.push(errorAtToken(tok, `'${image}' is not a valid cardinality on the ${where} of a relationship.`, {
      code: 'ER-CARDINALITY-SIDE',
      hint: where === 'left' ? 'Use ||, o|, }| or }o before the line' : 'Use ||, |o, |{ or o{ after the line',
    }));
    return 'exactly-one';
  }

  private entityStmt(node: CstNode) {
    const entity = this.entity(childToken(node, 'name')?.image ?? '');
    // Repeated blocks for one entity accumulate
    for (const attr of childNodes(childNode(node, 'attributeBlock'), 'attribute')) {
      entity.attributes.push(this.attribute(attr));
    }
  }

  private attribute(node: CstNode): ErAttribute {
    return {
      type: childToken(node, 'type')?.image ?? '',
      name: childToken(node, 'name')?.image ?? '',
      keys: childTokens(node, 'KeyMarker').map((k) => k.image),
    };
  }
}

export function buildErFromCst(cst: CstNode, text: string): BuildResult<ErDiagram> {
  return new ErBuilder(text).build(cst);
}

export function buildErModel(text: string): ParseResult<ErDiagram> {
  return parseWithChevrotain(text, {
    tokenize,
    parse,
    mapParserError: mapErParserError,
    build: buildErFromCst,
  });
}
