import { Clock, Context, Effect, Layer } from "effect";

export interface ClockService {
  readonly nowMillis: Effect.Effect<number>;
}

export const ClockServiceTag = Context.GenericTag<ClockService>(
  "@schema-catalog/effect/ClockService",
);

export const systemClockLayer: Layer.Layer<ClockService> = Layer.succeed(ClockServiceTag, {
  nowMillis: Clock.currentTimeMillis,
});

export const makeDeterministicClockLayer = (fixedNowMillis: number): Layer.Layer<ClockService> =>
  Layer.succeed(ClockServiceTag, {
    nowMillis: Effect.succeed(fixedNowMillis),
  });
