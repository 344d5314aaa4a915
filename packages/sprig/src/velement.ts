import * as Effect from "effect/Effect";
import * as Option from "effect/Option";

import { DocumentHost, type DocumentHostService } from "./dom.js";
import type { KeyedVNodes } from "./keyed.js";
import { type DomPatch, type PatchEffect, escapeHtml } from "./shared.js";

export interface Attribute {
  readonly name: string;
  readonly value: string;
}

export interface Listener {
  /** DOM event type, e.g. "click" */
  readonly event: string;
  readonly handler: EventListener;
}

// =============================================================================
// Attribute and listener diffing
// =============================================================================

const patchAttributes = (
  host: DocumentHostService,
  el: Element,
  previous: ReadonlyArray<Attribute>,
  next: ReadonlyArray<Attribute>,
) =>
  Effect.gen(function* () {
    const nextNames = new Set(next.map((attr) => attr.name));
    for (const attr of previous) {
      if (!nextNames.has(attr.name)) {
        yield* host.removeAttribute(el, attr.name);
      }
    }
    const previousValues = new Map(previous.map((attr) => [attr.name, attr.value]));
    for (const attr of next) {
      if (previousValues.get(attr.name) !== attr.value) {
        yield* host.setAttribute(el, attr.name, attr.value);
      }
    }
  });

const sameListener = (a: Listener, b: Listener) => a.event === b.event && a.handler === b.handler;

const patchListeners = (
  host: DocumentHostService,
  el: Element,
  previous: ReadonlyArray<Listener>,
  next: ReadonlyArray<Listener>,
) =>
  Effect.gen(function* () {
    for (const listener of previous) {
      if (!next.some((l) => sameListener(l, listener))) {
        yield* host.removeEventListener(el, listener.event, listener.handler);
      }
    }
    for (const listener of next) {
      if (!previous.some((l) => sameListener(l, listener))) {
        yield* host.addEventListener(el, listener.event, listener.handler);
      }
    }
  });

// =============================================================================
// VElement
// =============================================================================

/**
 * An element node with its attributes, event listeners and (at most one)
 * child. Several children travel as a single `VList` child.
 */
export class VElement implements DomPatch<VElement> {
  readonly _tag = "VElement";
  private dom: Option.Option<Element> = Option.none();

  constructor(
    readonly tag: string,
    readonly attributes: ReadonlyArray<Attribute>,
    readonly listeners: ReadonlyArray<Listener>,
    readonly child: Option.Option<KeyedVNodes>,
  ) {}

  renderWalk(): PatchEffect {
    return Effect.gen(this, function* () {
      if (Option.isNone(this.dom) || Option.isNone(this.child)) return;
      yield* this.child.value.renderWalk(this.dom.value, Option.none());
    });
  }

  patch(old: Option.Option<VElement>, parent: Node, next: Option.Option<Node>): PatchEffect {
    return Effect.gen(this, function* () {
      const host = yield* DocumentHost;

      if (Option.isSome(old) && old.value.tag === this.tag && Option.isSome(old.value.dom)) {
        const previous = old.value;
        const el = old.value.dom.value;
        previous.dom = Option.none();
        this.dom = Option.some(el);
        yield* patchAttributes(host, el, previous.attributes, this.attributes);
        yield* patchListeners(host, el, previous.listeners, this.listeners);
        yield* this.patchChild(previous.child, el);
        return;
      }

      if (Option.isSome(old)) {
        yield* old.value.remove(parent);
      }

      const el = yield* host.createElement(this.tag);
      for (const attr of this.attributes) {
        yield* host.setAttribute(el, attr.name, attr.value);
      }
      for (const listener of this.listeners) {
        yield* host.addEventListener(el, listener.event, listener.handler);
      }
      this.dom = Option.some(el);
      yield* this.patchChild(Option.none(), el);
      yield* host.insertBefore(parent, el, next);
    });
  }

  private patchChild(previous: Option.Option<KeyedVNodes>, el: Element): PatchEffect {
    if (Option.isSome(this.child)) {
      return this.child.value.patch(previous, el, Option.none());
    }
    if (Option.isSome(previous)) {
      return previous.value.remove(el);
    }
    return Effect.void;
  }

  remove(parent: Node): PatchEffect {
    return Effect.gen(this, function* () {
      if (Option.isNone(this.dom)) return;
      const el = this.dom.value;
      const host = yield* DocumentHost;
      // Tear the child down first so components below run their destroy hooks
      if (Option.isSome(this.child)) {
        yield* this.child.value.remove(el);
      }
      yield* host.removeChild(parent, el);
      this.dom = Option.none();
    });
  }

  node(): Option.Option<Node> {
    return this.dom;
  }

  toString(): string {
    const attrs = this.attributes
      .map((attr) => ` ${attr.name}="${escapeHtml(attr.value)}"`)
      .join("");
    const inner = Option.match(this.child, {
      onNone: () => "",
      onSome: (child) => child.toString(),
    });
    return `<${this.tag}${attrs}>${inner}</${this.tag}>`;
  }
}
