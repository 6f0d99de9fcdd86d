import { Context, Effect, Layer } from "effect";

import type { CatalogTransaction } from "../contracts/index.js";
import type { ModelServiceError } from "../errors.js";
import { synthesizeModels, type ModelMap } from "../models/model-descriptor.js";
import { CatalogReaderServiceTag, type CatalogReaderService } from "./catalog-reader-service.js";

export interface ModelService {
  /**
   * Reads the catalog and builds one descriptor per table. Nothing is cached:
   * every call re-reads and returns new descriptors. Pass a transaction to
   * read columns and indexes from one snapshot.
   */
  readonly models: (transaction?: CatalogTransaction) => Effect.Effect<ModelMap, ModelServiceError>;
}

export const ModelServiceTag = Context.GenericTag<ModelService>(
  "@schema-catalog/effect/ModelService",
);

export const makeModelService = (reader: CatalogReaderService): ModelService => ({
  models: (transaction) =>
    Effect.gen(function* () {
      const tables = yield* reader.readColumns(transaction);
      const indexes = yield* reader.readIndexes(transaction);
      return yield* synthesizeModels(tables, indexes);
    }),
});

export const modelLayer: Layer.Layer<ModelService, never, CatalogReaderService> = Layer.effect(
  ModelServiceTag,
  Effect.gen(function* () {
    const reader = yield* CatalogReaderServiceTag;
    return makeModelService(reader);
  }),
);
