export type Cardinality = 'exactly-one' | 'zero-or-one' | 'one-or-many' | 'zero-or-many';

export interface ErAttribute {
  type: string;
  name: string;
  /** PK, FK, UK markers in source order */
  keys: string[];
}

export interface Entity {
  name: string;
  attributes: ErAttribute[];
}

export interface Relationship {
  from: string;
  to: string;
  leftCard: Cardinality;
  rightCard: Cardinality;
  label: string;
  /** `--` is identifying, `..` is not */
  identifying: boolean;
}

export interface ErDiagram {
  entities: Entity[];
  relationships: Relationship[];
}

export interface LayoutEntity extends Entity {
  x: number;
  y: number;
  width: number;
  height: number;
  /** Row of the entity name, where relationship lines attach */
  centerY: number;
}

export interface ErLayout {
  entities: LayoutEntity[];
  relationships: Relationship[];
  width: number;
  height: number;
}
