/**
 * DocumentHost service: the primitive document operations the reconciler is
 * allowed to perform.
 *
 * The live layer wraps the global `document`. Tests run it under happy-dom, or
 * wrap it to count or fail operations.
 */
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";

import { DomError } from "./shared.js";

// =============================================================================
// Service
// =============================================================================

export interface DocumentHostService {
  readonly createElement: (tag: string) => Effect.Effect<Element, DomError>;
  readonly createText: (text: string) => Effect.Effect<Text, DomError>;
  readonly setAttribute: (el: Element, name: string, value: string) => Effect.Effect<void, DomError>;
  readonly removeAttribute: (el: Element, name: string) => Effect.Effect<void, DomError>;
  readonly setText: (node: Text, text: string) => Effect.Effect<void, DomError>;
  readonly addEventListener: (
    el: Element,
    event: string,
    listener: EventListener,
  ) => Effect.Effect<void, DomError>;
  readonly removeEventListener: (
    el: Element,
    event: string,
    listener: EventListener,
  ) => Effect.Effect<void, DomError>;
  /** Insert `node` before `next`, or append when `next` is None. */
  readonly insertBefore: (
    parent: Node,
    node: Node,
    next: Option.Option<Node>,
  ) => Effect.Effect<void, DomError>;
  readonly removeChild: (parent: Node, node: Node) => Effect.Effect<void, DomError>;
  readonly nextSibling: (node: Node) => Option.Option<Node>;
  readonly getElementById: (id: string) => Option.Option<Element>;
  /** Serialized markup of an element's children. Used for verification. */
  readonly innerHtml: (el: Element) => string;
}

export class DocumentHost extends Context.Tag("sprig/DocumentHost")<
  DocumentHost,
  DocumentHostService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const attempt = <A>(operation: string, f: () => A): Effect.Effect<A, DomError> =>
  Effect.try({
    try: f,
    catch: (cause) => new DomError({ operation, cause }),
  });

/**
 * Build a host over a concrete `Document`.
 */
export const makeDocumentHost = (doc: Document): DocumentHostService => ({
  createElement: (tag) => attempt("createElement", () => doc.createElement(tag)),
  createText: (text) => attempt("createText", () => doc.createTextNode(text)),
  setAttribute: (el, name, value) => attempt("setAttribute", () => el.setAttribute(name, value)),
  removeAttribute: (el, name) => attempt("removeAttribute", () => el.removeAttribute(name)),
  setText: (node, text) =>
    attempt("setText", () => {
      node.data = text;
    }),
  addEventListener: (el, event, listener) =>
    attempt("addEventListener", () => el.addEventListener(event, listener)),
  removeEventListener: (el, event, listener) =>
    attempt("removeEventListener", () => el.removeEventListener(event, listener)),
  insertBefore: (parent, node, next) =>
    attempt("insertBefore", () => {
      parent.insertBefore(node, Option.getOrNull(next));
    }),
  removeChild: (parent, node) =>
    attempt("removeChild", () => {
      parent.removeChild(node);
    }),
  nextSibling: (node) => Option.fromNullable(node.nextSibling),
  getElementById: (id) => Option.fromNullable(doc.getElementById(id)),
  innerHtml: (el) => el.innerHTML,
});

// =============================================================================
// Layers
// =============================================================================

/**
 * Host backed by the global `document`. Dies when there is none.
 */
export const DocumentHostLive = Layer.effect(
  DocumentHost,
  Effect.suspend(() =>
    typeof document === "undefined"
      ? Effect.dieMessage("No global document to mount on")
      : Effect.succeed(makeDocumentHost(document)),
  ),
);

export const documentHostLayer = (doc: Document) =>
  Layer.succeed(DocumentHost, makeDocumentHost(doc));
