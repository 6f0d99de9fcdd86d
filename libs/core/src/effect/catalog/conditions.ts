export type OrderDirection = "ASC" | "DESC";

export type ConditionValue = string | number | boolean | null;

type RowColumn<Row> = keyof Row & string;

export interface EqualityCondition<Row> {
  readonly _tag: "Equality";
  readonly column: RowColumn<Row>;
  readonly value: ConditionValue;
}

export interface InequalityCondition<Row> {
  readonly _tag: "Inequality";
  readonly column: RowColumn<Row>;
  readonly value: ConditionValue;
}

export interface OrderByCondition<Row> {
  readonly _tag: "OrderBy";
  readonly orderings: ReadonlyArray<readonly [RowColumn<Row>, OrderDirection]>;
}

export type CatalogCondition<Row> =
  | EqualityCondition<Row>
  | InequalityCondition<Row>
  | OrderByCondition<Row>;

/** `column = value`, or `column IS NULL` when value is null. */
export const equalTo = <Row>(column: RowColumn<Row>, value: ConditionValue): EqualityCondition<Row> => ({
  _tag: "Equality",
  column,
  value,
});

/** `column != value`, or `column IS NOT NULL` when value is null. */
export const notEqualTo = <Row>(
  column: RowColumn<Row>,
  value: ConditionValue,
): InequalityCondition<Row> => ({
  _tag: "Inequality",
  column,
  value,
});

export const orderBy = <Row>(
  ...orderings: ReadonlyArray<readonly [RowColumn<Row>, OrderDirection]>
): OrderByCondition<Row> => ({
  _tag: "OrderBy",
  orderings,
});

export const orderingsOf = <Row>(
  conditions: readonly CatalogCondition<Row>[],
): ReadonlyArray<readonly [RowColumn<Row>, OrderDirection]> =>
  conditions.flatMap((condition) => (condition._tag === "OrderBy" ? condition.orderings : []));

export const filtersOf = <Row>(
  conditions: readonly CatalogCondition<Row>[],
): ReadonlyArray<EqualityCondition<Row> | InequalityCondition<Row>> =>
  conditions.filter(
    (condition): condition is EqualityCondition<Row> | InequalityCondition<Row> =>
      condition._tag !== "OrderBy",
  );
