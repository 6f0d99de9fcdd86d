import { Layer } from "effect";

import { catalogReaderLayer } from "./services/catalog-reader-service.js";
import { modelLayer } from "./services/model-service.js";
import { schemaChangeLayer } from "./services/schema-change-service.js";

/**
 * Catalog reader, model service and schema-change applier wired together.
 * Still requires a catalog fetch, a schema admin, config and a logger.
 */
export const catalogServicesLayer = schemaChangeLayer.pipe(
  Layer.provideMerge(modelLayer),
  Layer.provideMerge(catalogReaderLayer),
);
