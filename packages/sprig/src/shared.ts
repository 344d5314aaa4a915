import * as Data from "effect/Data";
import type * as Effect from "effect/Effect";
import type * as Option from "effect/Option";

import type { DocumentHost } from "./dom.js";
import type { Scheduler } from "./scheduler.js";

// =============================================================================
// Errors
// =============================================================================

/**
 * A document host primitive failed (node creation, insertion, removal...).
 *
 * The only error the reconciler produces. `renderWalk`, `patch` and `remove`
 * hand it back to their caller untouched; the App treats one coming out of
 * the root pass as fatal.
 *
 * @example
 * ```typescript
 * yield* vnode.patch(Option.none(), container, Option.none()).pipe(
 *   Effect.catchTag("DomError", (err) =>
 *     Effect.logError(`${err.operation} failed`, err.cause),
 *   ),
 * );
 * ```
 */
export class DomError extends Data.TaggedError("DomError")<{
  /** Name of the host primitive that failed (e.g. "insertBefore") */
  readonly operation: string;
  /** Whatever the host threw */
  readonly cause: unknown;
}> {}

// =============================================================================
// Patch Protocol
// =============================================================================

/**
 * Services every patch operation may reach for.
 */
export type PatchContext = DocumentHost | Scheduler;

/**
 * Patch effect returned by every protocol operation.
 */
export type PatchEffect = Effect.Effect<void, DomError, PatchContext>;

/**
 * Contract shared by every renderable tree element (text, element, list and
 * component nodes), so the reconciler can treat them uniformly.
 *
 * `next` is the sibling to insert before; `None` appends to `parent`.
 */
export interface DomPatch<Self> {
  /** Visit the subtree, re-rendering dirty components below this node. */
  renderWalk(parent: Node, next: Option.Option<Node>): PatchEffect;
  /** Reconcile against the node that previously held this position, then walk. */
  patch(old: Option.Option<Self>, parent: Node, next: Option.Option<Node>): PatchEffect;
  /** Detach from the document, running destroy hooks below this node. */
  remove(parent: Node): PatchEffect;
  /** Root document node currently owned by this node. */
  node(): Option.Option<Node>;
}

// =============================================================================
// Markup helpers
// =============================================================================

export const escapeHtml = (str: string): string =>
  str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

export const isEvent = (key: string) => key.startsWith("on");
