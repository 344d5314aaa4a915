/**
 * Shared fixtures for the test suites: a wake channel driven by hand, and a
 * document host that counts the mutations going through it.
 */
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";

import { DocumentHost, type DocumentHostService, makeDocumentHost } from "./dom.js";
import { type WakeChannel, schedulerLayer } from "./scheduler.js";

/**
 * Helper to run an Effect in tests. Uses runPromise so a failure or defect
 * fails the test.
 */
export const runTest = <A, E>(effect: Effect.Effect<A, E, never>): Promise<A> =>
  Effect.runPromise(effect);

export const settle = (ms = 20) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// =============================================================================
// Wake channel
// =============================================================================

export interface ManualWake extends WakeChannel {
  /** Wake-ups posted so far */
  readonly posts: () => number;
  /** Run the listener, as the host would when a posted wake-up fires */
  readonly deliver: () => void;
}

export const manualWake = (): ManualWake => {
  let handler: (() => void) | undefined;
  let posts = 0;
  return {
    post: () => {
      posts++;
    },
    listen: (h) => {
      handler = h;
    },
    close: () => {
      handler = undefined;
    },
    posts: () => posts,
    deliver: () => handler?.(),
  };
};

// =============================================================================
// Document host
// =============================================================================

export interface CountingHost {
  readonly host: DocumentHostService;
  readonly mutations: () => number;
  readonly reset: () => void;
}

/**
 * Wraps the happy-dom document host, counting every call that changes the
 * document.
 */
export const countingHost = (doc: Document = document): CountingHost => {
  const live = makeDocumentHost(doc);
  let mutations = 0;
  const counted = <Args extends ReadonlyArray<unknown>, A, E>(
    f: (...args: Args) => Effect.Effect<A, E>,
  ) =>
    (...args: Args): Effect.Effect<A, E> =>
      Effect.sync(() => {
        mutations++;
      }).pipe(Effect.zipRight(f(...args)));

  return {
    host: {
      ...live,
      createElement: counted(live.createElement),
      createText: counted(live.createText),
      setAttribute: counted(live.setAttribute),
      removeAttribute: counted(live.removeAttribute),
      setText: counted(live.setText),
      addEventListener: counted(live.addEventListener),
      removeEventListener: counted(live.removeEventListener),
      insertBefore: counted(live.insertBefore),
      removeChild: counted(live.removeChild),
    },
    mutations: () => mutations,
    reset: () => {
      mutations = 0;
    },
  };
};

/**
 * DocumentHost plus a Scheduler over `channel`.
 */
export const testLayer = (
  host: DocumentHostService = makeDocumentHost(document),
  channel: WakeChannel = manualWake(),
) => Layer.merge(Layer.succeed(DocumentHost, host), schedulerLayer(channel));
