import * as Effect from "effect/Effect";
import * as Option from "effect/Option";

import { DocumentHost } from "./dom.js";
import { type DomPatch, type PatchEffect, escapeHtml } from "./shared.js";

/**
 * A text node.
 */
export class VText implements DomPatch<VText> {
  readonly _tag = "VText";
  private dom: Option.Option<Text> = Option.none();

  constructor(readonly text: string) {}

  renderWalk(): PatchEffect {
    return Effect.void;
  }

  patch(old: Option.Option<VText>, parent: Node, next: Option.Option<Node>): PatchEffect {
    return Effect.gen(this, function* () {
      const host = yield* DocumentHost;

      if (Option.isSome(old) && Option.isSome(old.value.dom)) {
        const previous = old.value;
        const textNode = old.value.dom.value;
        if (previous.text !== this.text) {
          yield* host.setText(textNode, this.text);
        }
        previous.dom = Option.none();
        this.dom = Option.some(textNode);
        return;
      }

      const textNode = yield* host.createText(this.text);
      yield* host.insertBefore(parent, textNode, next);
      this.dom = Option.some(textNode);
    });
  }

  remove(parent: Node): PatchEffect {
    return Effect.gen(this, function* () {
      if (Option.isNone(this.dom)) return;
      const host = yield* DocumentHost;
      yield* host.removeChild(parent, this.dom.value);
      this.dom = Option.none();
    });
  }

  node(): Option.Option<Node> {
    return this.dom;
  }

  toString(): string {
    return escapeHtml(this.text);
  }
}
