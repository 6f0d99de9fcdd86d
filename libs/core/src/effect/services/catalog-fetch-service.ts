import { Context, type Effect, Layer } from "effect";

import type { CatalogRelation, CatalogTransaction } from "../contracts/index.js";
import type { CatalogCondition } from "../catalog/conditions.js";
import type { CatalogReadError } from "../errors.js";

/**
 * Row source for the catalog relations. Implementations must apply every
 * filter and honor every ordering they are given: callers fold the result by
 * appending, so an ignored ORDER BY produces wrong index column sequences.
 */
export interface CatalogFetchService {
  readonly fetch: <Row, Encoded>(
    relation: CatalogRelation<Row, Encoded>,
    transaction: CatalogTransaction | undefined,
    conditions: readonly CatalogCondition<Row>[],
  ) => Effect.Effect<readonly Row[], CatalogReadError>;
}

export const CatalogFetchServiceTag = Context.GenericTag<CatalogFetchService>(
  "@schema-catalog/effect/CatalogFetchService",
);

export const makeCatalogFetchLayer = (
  service: CatalogFetchService,
): Layer.Layer<CatalogFetchService> => Layer.succeed(CatalogFetchServiceTag, service);
