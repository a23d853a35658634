import { SchemaFrozenError } from '../errors';

/** Header of a finished batch. Only a frozen schema can be used to assemble rows. */
export interface FrozenSchema {
  readonly frozen: true;
  readonly columns: readonly string[];
  indexOf(column: string): number;
}

/**
 * Ordered, de-duplicating, append-only set of column names.
 * A column's position is fixed by the first record that carries it.
 */
export class UnifiedSchema {
  private readonly _columns: string[] = [];
  private readonly _index = new Map<string, number>();
  private _frozen: FrozenSchema | null = null;

  constructor(seed: Iterable<string> = []) {
    this.observe(seed);
  }

  get columns(): readonly string[] {
    return this._columns;
  }

  get size(): number {
    return this._columns.length;
  }

  get isFrozen(): boolean {
    return this._frozen !== null;
  }

  has(column: string): boolean {
    return this._index.has(column);
  }

  /** Append unseen columns in the given order; returns the ones that were new. */
  observe(columns: Iterable<string>): string[] {
    const added: string[] = [];
    for (const column of columns) {
      if (this._index.has(column) || added.includes(column)) continue;
      added.push(column);
    }
    if (added.length && this._frozen) throw new SchemaFrozenError(added);
    for (const column of added) {
      this._index.set(column, this._columns.length);
      this._columns.push(column);
    }
    return added;
  }

  freeze(): FrozenSchema {
    if (!this._frozen) {
      const columns = Object.freeze([...this._columns]);
      const index = new Map(this._index);
      this._frozen = Object.freeze({
        frozen: true as const,
        columns,
        indexOf: (column: string) => index.get(column) ?? -1,
      });
    }
    return this._frozen;
  }
}
