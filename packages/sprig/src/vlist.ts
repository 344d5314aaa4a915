import * as Effect from "effect/Effect";
import * as Option from "effect/Option";

import { DocumentHost } from "./dom.js";
import type { KeyedVNodes } from "./keyed.js";
import type { DomPatch, PatchEffect } from "./shared.js";

const sameNode = (a: Option.Option<Node>, b: Option.Option<Node>): boolean =>
  Option.isNone(a) ? Option.isNone(b) : Option.isSome(b) && a.value === b.value;

/**
 * Pair every new child with the old child it should be patched against:
 * keyed children by key, unkeyed children in order. Old children left over
 * are returned for removal.
 */
const matchChildren = (
  previous: ReadonlyArray<KeyedVNodes>,
  next: ReadonlyArray<KeyedVNodes>,
): { matches: Array<Option.Option<KeyedVNodes>>; leftovers: Array<KeyedVNodes> } => {
  const byKey = new Map<string, KeyedVNodes>();
  const unkeyed: Array<KeyedVNodes> = [];
  for (const child of previous) {
    if (Option.isSome(child.key) && !byKey.has(child.key.value)) {
      byKey.set(child.key.value, child);
    } else {
      unkeyed.push(child);
    }
  }

  const matches = next.map((child) => {
    if (Option.isSome(child.key)) {
      const found = Option.fromNullable(byKey.get(child.key.value));
      byKey.delete(child.key.value);
      return found;
    }
    return Option.fromNullable(unkeyed.shift());
  });

  return { matches, leftovers: [...byKey.values(), ...unkeyed] };
};

/**
 * A sequence of sibling nodes. Children are visited last to first so each
 * one knows the node it has to sit in front of.
 */
export class VList implements DomPatch<VList> {
  readonly _tag = "VList";

  constructor(readonly children: ReadonlyArray<KeyedVNodes>) {}

  renderWalk(parent: Node, next: Option.Option<Node>): PatchEffect {
    return Effect.gen(this, function* () {
      let anchor = next;
      for (let i = this.children.length - 1; i >= 0; i--) {
        const child = this.children[i];
        yield* child.renderWalk(parent, anchor);
        anchor = Option.orElse(child.node(), () => anchor);
      }
    });
  }

  patch(old: Option.Option<VList>, parent: Node, next: Option.Option<Node>): PatchEffect {
    return Effect.gen(this, function* () {
      const host = yield* DocumentHost;
      const { matches, leftovers } = Option.match(old, {
        onNone: () => ({
          matches: this.children.map(() => Option.none<KeyedVNodes>()),
          leftovers: [],
        }),
        onSome: (previous) => matchChildren(previous.children, this.children),
      });

      for (const leftover of leftovers) {
        yield* leftover.remove(parent);
      }

      let anchor = next;
      for (let i = this.children.length - 1; i >= 0; i--) {
        const child = this.children[i];
        const match = matches[i];
        yield* child.patch(match, parent, anchor);

        // A reused node keeps its old position; move it in front of the anchor
        const node = child.node();
        if (Option.isSome(match) && Option.isSome(node)) {
          if (!sameNode(host.nextSibling(node.value), anchor)) {
            yield* host.insertBefore(parent, node.value, anchor);
          }
        }
        anchor = Option.orElse(node, () => anchor);
      }
    });
  }

  remove(parent: Node): PatchEffect {
    return Effect.forEach(this.children, (child) => child.remove(parent), { discard: true });
  }

  node(): Option.Option<Node> {
    for (const child of this.children) {
      const node = child.node();
      if (Option.isSome(node)) return node;
    }
    return Option.none();
  }

  toString(): string {
    return this.children.map((child) => child.toString()).join("");
  }
}
