import { Effect } from "effect";

import type { SchemaChangeKind } from "../contracts/index.js";
import { InvalidSchemaChangeError } from "../errors.js";
import type { ModelDescriptor } from "../models/model-descriptor.js";

interface SchemaChangeBase<Kind extends SchemaChangeKind> {
  readonly kind: Kind;
  readonly table: string;
  /** Name of the concrete change, such as "AddColumn". */
  readonly change: string;
}

export interface ColumnUpdate extends SchemaChangeBase<"column"> {
  readonly validate: (model: ModelDescriptor) => Effect.Effect<void, InvalidSchemaChangeError>;
  readonly ddl: (model: ModelDescriptor) => readonly string[];
}

export interface CreateTableUpdate extends SchemaChangeBase<"create_table"> {
  readonly validate: () => Effect.Effect<void, InvalidSchemaChangeError>;
  readonly ddl: () => readonly string[];
}

export interface IndexUpdate extends SchemaChangeBase<"index"> {
  readonly validate: (model: ModelDescriptor) => Effect.Effect<void, InvalidSchemaChangeError>;
  readonly ddl: (model: ModelDescriptor) => readonly string[];
}

export type SchemaChange = ColumnUpdate | CreateTableUpdate | IndexUpdate;

/** A check returns the reason it failed, or undefined when it passes. */
export type SchemaChangeCheck = () => string | undefined;

export const runChecks = (
  change: string,
  table: string,
  checks: readonly SchemaChangeCheck[],
): Effect.Effect<void, InvalidSchemaChangeError> =>
  Effect.suspend(() => {
    for (const check of checks) {
      const reason = check();
      if (reason !== undefined) {
        return Effect.fail(
          new InvalidSchemaChangeError({
            table,
            change,
            reason,
            message: `${change} on ${table} rejected: ${reason}`,
          }),
        );
      }
    }
    return Effect.void;
  });

export const findDuplicate = (values: readonly string[]): string | undefined => {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      return value;
    }
    seen.add(value);
  }
  return undefined;
};
