import * as Option from "effect/Option";

import type { Component, ComponentType } from "./component.js";
import { KeyedVNodes, type VNode } from "./keyed.js";
import { isEvent } from "./shared.js";
import { VComponent } from "./vcomponent.js";
import { type Attribute, type Listener, VElement } from "./velement.js";
import { VList } from "./vlist.js";
import { VText } from "./vtext.js";

// =============================================================================
// Element Creation
// =============================================================================

export type AttributeValue = string | number | boolean;

/**
 * Element props: attributes, plus `on*` keys holding event listeners.
 * `null`/`undefined` values are left out.
 */
export type ElementProps = {
  readonly [name: string]: AttributeValue | EventListener | null | undefined;
};

/**
 * What may appear as a child: strings become text nodes.
 */
export type Child = VNode | KeyedVNodes | string | number;

export const text = (value: string | number): VText => new VText(String(value));

const toKeyed = (child: Child): KeyedVNodes =>
  typeof child === "string" || typeof child === "number"
    ? KeyedVNodes.unkeyed(text(child))
    : KeyedVNodes.from(child);

/**
 * Attach a key to a node for list reconciliation.
 */
export const keyed = (key: string | number, vnode: VNode): KeyedVNodes =>
  KeyedVNodes.keyed(String(key), vnode);

export const list = (children: ReadonlyArray<Child>): VList => new VList(children.map(toKeyed));

/**
 * Create an element node. A single child is stored as is; several are
 * wrapped in a `VList`.
 *
 * @example
 * ```typescript
 * h("button", { disabled: false, onclick: () => count++ }, ["Click"]);
 * // <button disabled="false">Click</button>
 * ```
 */
export const h = (
  tag: string,
  props: ElementProps = {},
  children: ReadonlyArray<Child> = [],
): VElement => {
  const attributes: Array<Attribute> = [];
  const listeners: Array<Listener> = [];
  for (const [name, value] of Object.entries(props)) {
    if (value === null || value === undefined) continue;
    if (typeof value === "function") {
      if (isEvent(name)) {
        listeners.push({ event: name.slice(2).toLowerCase(), handler: value });
      }
      continue;
    }
    attributes.push({ name, value: String(value) });
  }

  const child =
    children.length === 0
      ? Option.none()
      : children.length === 1
        ? Option.some(toKeyed(children[0]))
        : Option.some(KeyedVNodes.unkeyed(list(children)));

  return new VElement(tag, attributes, listeners, child);
};

/**
 * Create a component node.
 */
export const component = <Props, State, C extends Component<Props, State>>(
  type: ComponentType<Props, State, C>,
  props: NoInfer<Props>,
): VComponent => VComponent.make(type, props);
