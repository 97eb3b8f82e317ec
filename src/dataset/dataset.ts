import type { Row, SchemaDescription } from '../types.js';

import { renderSchema } from './schema.js';

/** A schema-bearing collection of rows. Row order is not part of the contract. */
export interface Dataset {
  readonly schema: SchemaDescription;
  collect(): Row[];
  count(): number;
}

export interface InMemoryDatasetOptions {
  // Called before every row access; lets the owning context reject use after stop.
  guard?: () => void;
}

/**
 * Rows held as partitions. `collect` concatenates partitions in order, so a
 * dataset spread over several partitions does not return rows in insertion order.
 */
export class InMemoryDataset implements Dataset {
  readonly schema: SchemaDescription;
  private readonly partitions: readonly (readonly Row[])[];
  private readonly guard?: () => void;

  constructor(schema: SchemaDescription, partitions: readonly (readonly Row[])[], options: InMemoryDatasetOptions = {}) {
    this.schema = schema;
    this.partitions = partitions;
    this.guard = options.guard;
  }

  get partitionCount(): number {
    return this.partitions.length;
  }

  collect(): Row[] {
    this.guard?.();
    return this.partitions.flatMap((partition) => [...partition]);
  }

  count(): number {
    this.guard?.();
    return this.partitions.reduce((acc, partition) => acc + partition.length, 0);
  }

  union(other: Dataset): InMemoryDataset {
    const mine = renderSchema(this.schema);
    const theirs = renderSchema(other.schema);
    if (mine !== theirs) {
      throw new Error(`cannot union datasets with different schemas: "${mine}" vs "${theirs}"`);
    }
    if (other instanceof InMemoryDataset) {
      return new InMemoryDataset(this.schema, [...this.partitions, ...other.partitions], {
        guard: combineGuards(this.guard, other.guard),
      });
    }
    return new InMemoryDataset(this.schema, [...this.partitions, other.collect()], { guard: this.guard });
  }
}

function combineGuards(first?: () => void, second?: () => void): (() => void) | undefined {
  if (first === undefined || second === undefined || first === second) return first ?? second;
  const checkFirst = first;
  const checkSecond = second;
  return () => {
    checkFirst();
    checkSecond();
  };
}

/** Round-robin split of `rows` into `count` partitions. */
export function partitionRows(rows: readonly Row[], count: number): Row[][] {
  const slots = Math.max(1, Math.trunc(count));
  const partitions: Row[][] = Array.from({ length: slots }, () => []);
  rows.forEach((row, idx) => {
    partitions[idx % slots].push(row);
  });
  return partitions;
}

export const schemaOf = (dataset: Dataset): SchemaDescription => dataset.schema;
