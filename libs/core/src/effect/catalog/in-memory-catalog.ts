import { Effect } from "effect";

import {
  ColumnSchemaRelation,
  IndexColumnSchemaRelation,
  IndexSchemaRelation,
  decodeCatalogRows,
  type CatalogRelation,
  type CatalogTransaction,
  type ColumnSchemaRow,
  type IndexColumnSchemaRow,
  type IndexSchemaRow,
} from "../contracts/index.js";
import { CatalogReadError } from "../errors.js";
import type { CatalogFetchService } from "../services/catalog-fetch-service.js";
import {
  filtersOf,
  orderingsOf,
  type CatalogCondition,
  type EqualityCondition,
  type InequalityCondition,
  type OrderDirection,
} from "./conditions.js";

type CatalogRecord = Readonly<Record<string, unknown>>;
type RelationRows = ReadonlyMap<string, readonly CatalogRecord[]>;

export interface InMemoryCatalogSeed {
  readonly columns?: readonly ColumnSchemaRow[];
  readonly indexColumns?: readonly IndexColumnSchemaRow[];
  readonly indexes?: readonly IndexSchemaRow[];
}

export interface CatalogReadRecord {
  readonly relation: string;
  readonly transactionId: string | null;
}

export interface InMemoryCatalog extends CatalogFetchService {
  readonly insert: <Row, Encoded extends CatalogRecord>(
    relation: CatalogRelation<Row, Encoded>,
    rows: readonly Encoded[],
  ) => void;
  readonly deleteWhere: <Row, Encoded>(
    relation: CatalogRelation<Row, Encoded>,
    predicate: (row: CatalogRecord) => boolean,
  ) => void;
  /** Freezes the current rows; reads carrying the returned handle see only them. */
  readonly beginSnapshot: () => CatalogTransaction;
  readonly endSnapshot: (transaction: CatalogTransaction) => void;
  readonly reads: () => readonly CatalogReadRecord[];
}

const isMissing = (value: unknown): boolean => value === null || value === undefined;

const matchesFilter = <Row>(
  row: CatalogRecord,
  condition: EqualityCondition<Row> | InequalityCondition<Row>,
): boolean => {
  const value = row[condition.column];
  const equal = condition.value === null ? isMissing(value) : value === condition.value;
  return condition._tag === "Equality" ? equal : !equal;
};

// Nulls sort first, as the catalog does for ascending orderings.
const compareValues = (left: unknown, right: unknown): number => {
  if (isMissing(left) || isMissing(right)) {
    return Number(!isMissing(left)) - Number(!isMissing(right));
  }
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }

  const leftText = String(left);
  const rightText = String(right);
  if (leftText === rightText) {
    return 0;
  }
  return leftText < rightText ? -1 : 1;
};

const sortRows = (
  rows: readonly CatalogRecord[],
  orderings: ReadonlyArray<readonly [string, OrderDirection]>,
): readonly CatalogRecord[] => {
  if (orderings.length === 0) {
    return rows;
  }

  // Array.prototype.sort is stable, so rows with equal keys keep insertion order.
  return [...rows].sort((left, right) => {
    for (const [column, direction] of orderings) {
      const compared = compareValues(left[column], right[column]);
      if (compared !== 0) {
        return direction === "ASC" ? compared : -compared;
      }
    }
    return 0;
  });
};

const selectRows = <Row>(
  rows: readonly CatalogRecord[],
  conditions: readonly CatalogCondition<Row>[],
): readonly CatalogRecord[] => {
  const filters = filtersOf(conditions);
  const matching = rows.filter((row) => filters.every((condition) => matchesFilter(row, condition)));
  return sortRows(matching, orderingsOf(conditions));
};

export const makeInMemoryCatalog = (seed: InMemoryCatalogSeed = {}): InMemoryCatalog => {
  let live: RelationRows = new Map<string, readonly CatalogRecord[]>([
    [ColumnSchemaRelation.name, seed.columns ?? []],
    [IndexColumnSchemaRelation.name, seed.indexColumns ?? []],
    [IndexSchemaRelation.name, seed.indexes ?? []],
  ]);
  const snapshots = new Map<string, RelationRows>();
  const readLog: CatalogReadRecord[] = [];
  let snapshotSequence = 0;

  const replaceRelation = (name: string, rows: readonly CatalogRecord[]) => {
    const next = new Map(live);
    next.set(name, rows);
    live = next;
  };

  return {
    fetch: <Row, Encoded>(
      relation: CatalogRelation<Row, Encoded>,
      transaction: CatalogTransaction | undefined,
      conditions: readonly CatalogCondition<Row>[],
    ): Effect.Effect<readonly Row[], CatalogReadError> =>
      Effect.suspend(() => {
        readLog.push({ relation: relation.name, transactionId: transaction?.id ?? null });

        const state = transaction === undefined ? live : snapshots.get(transaction.id);
        if (state === undefined) {
          return Effect.fail(
            new CatalogReadError({
              relation: relation.name,
              message: `Catalog snapshot ${transaction?.id ?? "<none>"} is not open`,
              details: "The transaction handle was never opened or has already been closed.",
            }),
          );
        }

        return decodeCatalogRows(relation, selectRows(state.get(relation.name) ?? [], conditions));
      }),
    insert: (relation, rows) => {
      replaceRelation(relation.name, [...(live.get(relation.name) ?? []), ...rows]);
    },
    deleteWhere: (relation, predicate) => {
      replaceRelation(
        relation.name,
        (live.get(relation.name) ?? []).filter((row) => !predicate(row)),
      );
    },
    beginSnapshot: () => {
      snapshotSequence += 1;
      const transaction: CatalogTransaction = { id: `snapshot-${snapshotSequence}` };
      snapshots.set(transaction.id, live);
      return transaction;
    },
    endSnapshot: (transaction) => {
      snapshots.delete(transaction.id);
    },
    reads: () => [...readLog],
  };
};
