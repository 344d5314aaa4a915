import * as Config from "effect/Config";
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as LogLevel from "effect/LogLevel";

// =============================================================================
// Service
// =============================================================================

/**
 * Deferred-callback primitive the scheduler wakes the app through.
 */
export type WakeStrategy = "message-channel" | "microtask";

export interface SprigConfigService {
  readonly scheduler: WakeStrategy;
  readonly logLevel: LogLevel.LogLevel;
}

export class SprigConfig extends Context.Tag("sprig/Config")<SprigConfig, SprigConfigService>() {
  /**
   * Supply values directly, falling back to the defaults.
   */
  static layer = (options: Partial<SprigConfigService> = {}) =>
    Layer.succeed(SprigConfig, {
      scheduler: options.scheduler ?? "message-channel",
      logLevel: options.logLevel ?? LogLevel.Info,
    });
}

// =============================================================================
// Layers
// =============================================================================

/**
 * Reads SPRIG_SCHEDULER and SPRIG_LOG_LEVEL from the active ConfigProvider.
 */
export const SprigConfigLive = Layer.effect(
  SprigConfig,
  Effect.gen(function* () {
    const scheduler = yield* Config.literal("message-channel", "microtask")("SPRIG_SCHEDULER").pipe(
      Config.withDefault("message-channel" as const),
    );
    const logLevel = yield* Config.logLevel("SPRIG_LOG_LEVEL").pipe(
      Config.withDefault(LogLevel.Info),
    );
    return { scheduler, logLevel };
  }),
);
