import * as Effect from "effect/Effect";
import type * as Layer from "effect/Layer";
import * as Logger from "effect/Logger";
import * as Option from "effect/Option";
import type * as Fiber from "effect/Fiber";

import type { Component, ComponentType } from "./component.js";
import { SprigConfig, SprigConfigLive } from "./config.js";
import { DocumentHost, DocumentHostLive } from "./dom.js";
import { Scheduler, SchedulerLive } from "./scheduler.js";
import { ComponentWrapper } from "./vcomponent.js";

// =============================================================================
// Mount targets
// =============================================================================

/**
 * Where an app is mounted: the id of an element in the document, or the
 * element itself.
 */
export type MountTarget = string | Element;

/**
 * Resolve a mount target. An id that matches nothing is a defect: there is no
 * point running an app with nowhere to render.
 */
export const resolveMountTarget = (
  target: MountTarget,
): Effect.Effect<Element, never, DocumentHost> =>
  Effect.gen(function* () {
    if (typeof target !== "string") return target;
    const host = yield* DocumentHost;
    return yield* Option.match(host.getElementById(target), {
      onNone: () =>
        Effect.dieMessage(`Could not find element with id \`${target}\` to mount the App.`),
      onSome: Effect.succeed,
    });
  });

// =============================================================================
// App
// =============================================================================

export interface MountOptions {
  /** Configuration to use instead of reading SPRIG_* from the environment. */
  readonly config?: Layer.Layer<SprigConfig>;
}

/**
 * A root component bound to a document. The root takes no props.
 *
 * @example
 * ```typescript
 * const fiber = App.make(MyApp).run("app");
 * ```
 */
export class App<State, C extends Component<void, State>> {
  private constructor(readonly root: ComponentType<void, State, C>) {}

  static make<State, C extends Component<void, State>>(root: ComponentType<void, State, C>): App<State, C> {
    return new App(root);
  }

  /**
   * Render the root into `target`, then re-render once per scheduler wake-up,
   * forever. A failed render pass is fatal: it is logged and the effect dies.
   */
  mount(target: MountTarget, options: MountOptions = {}): Effect.Effect<never, never, DocumentHost> {
    const root = this.root;
    const configLayer = options.config ?? SprigConfigLive;

    const renderLoop = (parent: Element) =>
      Effect.gen(function* () {
        const scheduler = yield* Scheduler;
        const manager = new ComponentWrapper(root, undefined);

        yield* Effect.logDebug(`[App] mounting ${root.name}`);
        yield* manager.renderWalk(parent, Option.none());

        return yield* Effect.forever(
          scheduler.awaitWake.pipe(
            Effect.zipRight(Effect.logDebug("[App] render pass")),
            Effect.zipRight(manager.renderWalk(parent, Option.none())),
          ),
        );
      }).pipe(
        Effect.tapErrorCause((cause) => Effect.logError("[App] render failed", cause)),
        Effect.orDie,
      );

    return Effect.gen(function* () {
      const config = yield* SprigConfig;
      const parent = yield* resolveMountTarget(target);
      // The scheduler is built under the level so state setters log with it
      return yield* renderLoop(parent).pipe(
        Effect.provide(SchedulerLive),
        Logger.withMinimumLogLevel(config.logLevel),
      );
    }).pipe(Effect.provide(configLayer), Effect.orDie);
  }

  /**
   * Fork `mount` against the global document. Interrupt the returned fiber to
   * tear the app's scheduler down.
   */
  run(target: MountTarget, options: MountOptions = {}): Fiber.RuntimeFiber<never, never> {
    return Effect.runFork(this.mount(target, options).pipe(Effect.provide(DocumentHostLive)));
  }
}
