/**
 * Update coalescing.
 *
 * However many times components ask for a re-render inside one synchronous
 * stretch, a single wake-up is posted. The pending flag is cleared when the
 * wake-up is consumed, before the render pass runs, so a request made during
 * the pass schedules exactly one more.
 */
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Queue from "effect/Queue";
import * as Ref from "effect/Ref";
import * as Runtime from "effect/Runtime";
import type * as Scope from "effect/Scope";

import { SprigConfig, type WakeStrategy } from "./config.js";

// =============================================================================
// Wake Channels
// =============================================================================

/**
 * A deferred-callback primitive. `post` must never run the handler
 * synchronously.
 */
export interface WakeChannel {
  readonly post: () => void;
  readonly listen: (handler: () => void) => void;
  readonly close: () => void;
}

/**
 * Wake through a MessageChannel: the handler runs as a macrotask, after the
 * current call stack and its microtasks.
 */
export const messageChannelWake = (channel: MessageChannel = new MessageChannel()): WakeChannel => {
  return {
    post: () => channel.port1.postMessage(null),
    listen: (handler) => {
      channel.port2.onmessage = () => handler();
    },
    close: () => {
      channel.port2.onmessage = null;
      channel.port1.close();
      channel.port2.close();
    },
  };
};

export const microtaskWake = (): WakeChannel => {
  let handler: (() => void) | undefined;
  return {
    post: () =>
      queueMicrotask(() => {
        handler?.();
      }),
    listen: (h) => {
      handler = h;
    },
    close: () => {
      handler = undefined;
    },
  };
};

export const makeWakeChannel = (strategy: WakeStrategy): WakeChannel =>
  strategy === "microtask" ? microtaskWake() : messageChannelWake();

// =============================================================================
// Service
// =============================================================================

export interface SchedulerService {
  /** Request a render pass. Posts a wake-up only if none is pending. */
  readonly notify: Effect.Effect<void>;
  /** Synchronous `notify`, for component state setters and DOM callbacks. */
  readonly unsafeNotify: () => void;
  readonly isPending: Effect.Effect<boolean>;
  /** Suspend until the next wake-up, then clear the pending flag. */
  readonly awaitWake: Effect.Effect<void>;
}

export class Scheduler extends Context.Tag("sprig/Scheduler")<Scheduler, SchedulerService>() {}

/**
 * Build a scheduler over `channel`. The channel is closed with the scope.
 */
export const makeScheduler = (
  channel: WakeChannel,
): Effect.Effect<SchedulerService, never, Scope.Scope> =>
  Effect.gen(function* () {
    // Captured so state setters log under the app's logger and level
    const runtime = yield* Effect.runtime<never>();
    const pending = yield* Ref.make(false);
    const wakeups = yield* Queue.unbounded<void>();

    yield* Effect.acquireRelease(
      Effect.sync(() => channel.listen(() => Queue.unsafeOffer(wakeups, undefined))),
      () =>
        Effect.sync(() => channel.close()).pipe(
          Effect.zipRight(Queue.shutdown(wakeups)),
        ),
    );

    const notify = Ref.modify(pending, (isPending) => [!isPending, true] as const).pipe(
      Effect.flatMap((shouldPost) =>
        shouldPost
          ? Effect.sync(() => channel.post()).pipe(
              Effect.zipRight(Effect.logDebug("[Scheduler] wake-up posted")),
            )
          : Effect.void,
      ),
    );

    const awaitWake = Queue.take(wakeups).pipe(Effect.zipRight(Ref.set(pending, false)));

    return {
      notify,
      unsafeNotify: () => Runtime.runSync(runtime)(notify),
      isPending: Ref.get(pending),
      awaitWake,
    };
  });

/**
 * Scheduler whose wake channel is picked by SprigConfig.
 */
export const SchedulerLive = Layer.scoped(
  Scheduler,
  Effect.gen(function* () {
    const config = yield* SprigConfig;
    return yield* makeScheduler(makeWakeChannel(config.scheduler));
  }),
);

export const schedulerLayer = (channel: WakeChannel) =>
  Layer.scoped(Scheduler, makeScheduler(channel));
