import * as Effect from "effect/Effect";
import * as Option from "effect/Option";

import type { DomPatch, PatchEffect } from "./shared.js";
import type { VText } from "./vtext.js";
import type { VElement } from "./velement.js";
import type { VList } from "./vlist.js";
import type { VComponent } from "./vcomponent.js";

/**
 * Any renderable tree element, discriminated by `_tag`.
 */
export type VNode = VText | VElement | VList | VComponent;

/**
 * What `Component.render` may return.
 */
export type Markup = VNode | KeyedVNodes;

// =============================================================================
// Keyed nodes
// =============================================================================

/**
 * A VNode plus the optional key list reconciliation matches it by.
 */
export class KeyedVNodes implements DomPatch<KeyedVNodes> {
  constructor(
    readonly key: Option.Option<string>,
    readonly vnode: VNode,
  ) {}

  static unkeyed(vnode: VNode): KeyedVNodes {
    return new KeyedVNodes(Option.none(), vnode);
  }

  static keyed(key: string, vnode: VNode): KeyedVNodes {
    return new KeyedVNodes(Option.some(key), vnode);
  }

  static from(markup: Markup): KeyedVNodes {
    return markup instanceof KeyedVNodes ? markup : KeyedVNodes.unkeyed(markup);
  }

  renderWalk(parent: Node, next: Option.Option<Node>): PatchEffect {
    return this.vnode.renderWalk(parent, next);
  }

  patch(old: Option.Option<KeyedVNodes>, parent: Node, next: Option.Option<Node>): PatchEffect {
    return Option.match(old, {
      onNone: () => patchFresh(this.vnode, parent, next),
      onSome: (previous) => patchVNode(this.vnode, previous.vnode, parent, next),
    });
  }

  remove(parent: Node): PatchEffect {
    return this.vnode.remove(parent);
  }

  node(): Option.Option<Node> {
    return this.vnode.node();
  }

  toString(): string {
    return this.vnode.toString();
  }
}

// =============================================================================
// Dispatch
// =============================================================================

const patchFresh = (vnode: VNode, parent: Node, next: Option.Option<Node>): PatchEffect => {
  switch (vnode._tag) {
    case "VText":
      return vnode.patch(Option.none(), parent, next);
    case "VElement":
      return vnode.patch(Option.none(), parent, next);
    case "VList":
      return vnode.patch(Option.none(), parent, next);
    case "VComponent":
      return vnode.patch(Option.none(), parent, next);
  }
};

/**
 * Nodes of a different kind are never patched into each other: the previous
 * one is removed and the new one mounted in its place.
 */
const replace = (
  vnode: VNode,
  previous: VNode,
  parent: Node,
  next: Option.Option<Node>,
): PatchEffect =>
  previous.remove(parent).pipe(Effect.zipRight(patchFresh(vnode, parent, next)));

const patchVNode = (
  vnode: VNode,
  previous: VNode,
  parent: Node,
  next: Option.Option<Node>,
): PatchEffect => {
  switch (vnode._tag) {
    case "VText":
      return previous._tag === "VText"
        ? vnode.patch(Option.some(previous), parent, next)
        : replace(vnode, previous, parent, next);
    case "VElement":
      return previous._tag === "VElement"
        ? vnode.patch(Option.some(previous), parent, next)
        : replace(vnode, previous, parent, next);
    case "VList":
      return previous._tag === "VList"
        ? vnode.patch(Option.some(previous), parent, next)
        : replace(vnode, previous, parent, next);
    case "VComponent":
      // Component identity is decided one level down, by the managers
      return previous._tag === "VComponent"
        ? vnode.patch(Option.some(previous), parent, next)
        : replace(vnode, previous, parent, next);
  }
};
