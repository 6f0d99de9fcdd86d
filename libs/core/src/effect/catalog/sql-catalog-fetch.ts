import { Effect } from "effect";

import {
  decodeCatalogRows,
  type CatalogRelation,
  type CatalogTransaction,
} from "../contracts/index.js";
import { CatalogReadError, describeCause } from "../errors.js";
import type { CatalogFetchService } from "../services/catalog-fetch-service.js";
import { filtersOf, orderingsOf, type CatalogCondition } from "./conditions.js";

export type CatalogQueryParam = string | number | boolean;

export interface CatalogQuery {
  readonly sql: string;
  readonly params: Readonly<Record<string, CatalogQueryParam>>;
}

/**
 * Runs one read-only catalog query. When a transaction is given, the query
 * must run inside it so that several reads observe the same snapshot.
 */
export type CatalogQueryExecutor = (
  query: CatalogQuery,
  transaction?: CatalogTransaction,
) => Promise<readonly unknown[]>;

export const renderCatalogQuery = <Row, Encoded>(
  relation: CatalogRelation<Row, Encoded>,
  conditions: readonly CatalogCondition<Row>[],
): CatalogQuery => {
  const params: Record<string, CatalogQueryParam> = {};
  const predicates: string[] = [];

  for (const condition of filtersOf(conditions)) {
    if (condition.value === null) {
      predicates.push(
        `${condition.column} ${condition._tag === "Equality" ? "IS NULL" : "IS NOT NULL"}`,
      );
      continue;
    }

    const name = `p${Object.keys(params).length}`;
    params[name] = condition.value;
    predicates.push(`${condition.column} ${condition._tag === "Equality" ? "=" : "!="} @${name}`);
  }

  const orderings = orderingsOf(conditions).map(([column, direction]) => `${column} ${direction}`);

  const clauses = [`SELECT ${relation.columns.join(", ")} FROM ${relation.name}`];
  if (predicates.length > 0) {
    clauses.push(`WHERE ${predicates.join(" AND ")}`);
  }
  if (orderings.length > 0) {
    clauses.push(`ORDER BY ${orderings.join(", ")}`);
  }

  return { sql: clauses.join(" "), params };
};

export const makeSqlCatalogFetch = (executor: CatalogQueryExecutor): CatalogFetchService => ({
  fetch: (relation, transaction, conditions) => {
    const query = renderCatalogQuery(relation, conditions);

    return Effect.tryPromise({
      try: () => executor(query, transaction),
      catch: (cause) =>
        new CatalogReadError({
          relation: relation.name,
          message: `Failed to read catalog relation ${relation.name}`,
          details: describeCause(cause),
        }),
    }).pipe(Effect.flatMap((rows) => decodeCatalogRows(relation, rows)));
  },
});
