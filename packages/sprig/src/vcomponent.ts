/**
 * Component nodes.
 *
 * Every component class gets its own `ComponentWrapper<Props, State, C>`, and
 * the reconciler only ever sees them through the erased `ComponentManager`
 * interface. When a position is re-patched, `tryCast` decides whether the
 * previous occupant wraps the same class: if so its live instance and cached
 * render are carried over, otherwise it is removed and the new one mounts
 * fresh. State never leaks between unrelated classes.
 */
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as Option from "effect/Option";

import { type Component, ComponentStatus, type ComponentType } from "./component.js";
import { KeyedVNodes } from "./keyed.js";
import { Scheduler } from "./scheduler.js";
import type { DomPatch, PatchEffect } from "./shared.js";

// =============================================================================
// Erased manager
// =============================================================================

export interface ComponentManager {
  /** Name of the managed component class, for logs and debugging */
  readonly componentName: string;
  renderWalk(parent: Node, next: Option.Option<Node>): PatchEffect;
  patch(old: Option.Option<ComponentManager>, parent: Node, next: Option.Option<Node>): PatchEffect;
  remove(parent: Node): PatchEffect;
  node(): Option.Option<Node>;
  toString(): string;
}

// =============================================================================
// Wrapper
// =============================================================================

export class ComponentWrapper<Props, State, C extends Component<Props, State>>
  implements ComponentManager
{
  private component: Option.Option<C> = Option.none();
  private props: Option.Option<Props>;
  private cachedRender: Option.Option<KeyedVNodes> = Option.none();

  constructor(
    readonly type: ComponentType<Props, State, C>,
    props: NoInfer<Props>,
  ) {
    this.props = Option.some(props);
  }

  get componentName(): string {
    return this.type.name;
  }

  /**
   * True when `other` wraps the same component class.
   */
  isSameType(other: ComponentManager): other is ComponentWrapper<Props, State, C> {
    return other instanceof ComponentWrapper && other.type === this.type;
  }

  /**
   * Reinterpret `other` as a wrapper of this class, or hand it back untouched.
   */
  tryCast(other: ComponentManager): Either.Either<ComponentWrapper<Props, State, C>, ComponentManager> {
    return this.isSameType(other) ? Either.right(other) : Either.left(other);
  }

  private takeProps(): Effect.Effect<Props> {
    return Effect.suspend(() => {
      const props = this.props;
      if (Option.isNone(props)) {
        return Effect.dieMessage(`${this.componentName}: props were already taken`);
      }
      this.props = Option.none();
      return Effect.succeed(props.value);
    });
  }

  renderWalk(parent: Node, next: Option.Option<Node>): PatchEffect {
    return Effect.gen(this, function* () {
      if (Option.isNone(this.component)) {
        const props = yield* this.takeProps();
        const scheduler = yield* Scheduler;
        const instance = new this.type(
          props,
          new ComponentStatus(this.type.initialState(), scheduler.unsafeNotify),
        );
        instance.created();
        yield* Effect.logDebug(`[Component] created ${this.componentName}`);

        const initialRender = KeyedVNodes.from(instance.render());
        yield* initialRender.patch(Option.none(), parent, next);
        this.component = Option.some(instance);
        this.cachedRender = Option.some(initialRender);
      } else {
        const instance = this.component.value;

        // State is committed before props are looked at
        const stateChanged = instance.isStateDirty() ? instance.refreshState() : false;

        if (stateChanged || instance.isPropsDirty()) {
          const rerender = KeyedVNodes.from(instance.render());
          const cached = this.cachedRender;
          this.cachedRender = Option.none();
          yield* rerender.patch(cached, parent, next);
          this.cachedRender = Option.some(rerender);
          instance.markClean();
          yield* Effect.logDebug(`[Component] re-rendered ${this.componentName}`);
        }
      }

      if (Option.isNone(this.cachedRender)) {
        return yield* Effect.dieMessage(`${this.componentName}: rendered without a cached render`);
      }
      yield* this.cachedRender.value.renderWalk(parent, next);
    });
  }

  patch(old: Option.Option<ComponentManager>, parent: Node, next: Option.Option<Node>): PatchEffect {
    return Effect.gen(this, function* () {
      if (Option.isSome(old)) {
        const cast = this.tryCast(old.value);
        if (Either.isRight(cast)) {
          const same = cast.right;
          if (Option.isNone(same.component)) {
            return yield* Effect.dieMessage(`${this.componentName}: reused before it was rendered`);
          }
          const instance = same.component.value;
          const props = yield* this.takeProps();

          // Reuse the live instance, handing it the new props
          Option.match(instance.update(props), {
            onNone: () => {},
            onSome: (oldProps) => instance.updated(oldProps),
          });
          this.component = Option.some(instance);

          // ...and its cached render, so the next render diffs against it
          this.cachedRender = same.cachedRender;
          same.component = Option.none();
          same.cachedRender = Option.none();
        } else {
          yield* Effect.logDebug(
            `[Component] ${cast.left.componentName} replaced by ${this.componentName}`,
          );
          yield* cast.left.remove(parent);
        }
      }
      yield* this.renderWalk(parent, next);
    });
  }

  remove(parent: Node): PatchEffect {
    return Effect.gen(this, function* () {
      if (Option.isNone(this.cachedRender)) return;
      const cached = this.cachedRender.value;
      this.cachedRender = Option.none();
      yield* cached.remove(parent);

      if (Option.isNone(this.component)) {
        return yield* Effect.dieMessage(`${this.componentName}: cached render without an instance`);
      }
      this.component.value.destroyed();
      yield* Effect.logDebug(`[Component] destroyed ${this.componentName}`);
    });
  }

  node(): Option.Option<Node> {
    return Option.flatMap(this.cachedRender, (cached) => cached.node());
  }

  toString(): string {
    return Option.match(this.cachedRender, {
      onNone: () => "",
      onSome: (cached) => cached.toString(),
    });
  }
}

// =============================================================================
// VComponent
// =============================================================================

/**
 * A component in the virtual tree.
 */
export class VComponent implements DomPatch<VComponent> {
  readonly _tag = "VComponent";

  constructor(readonly manager: ComponentManager) {}

  static make<Props, State, C extends Component<Props, State>>(
    type: ComponentType<Props, State, C>,
    props: Props,
  ): VComponent {
    return new VComponent(new ComponentWrapper(type, props));
  }

  renderWalk(parent: Node, next: Option.Option<Node>): PatchEffect {
    return this.manager.renderWalk(parent, next);
  }

  patch(old: Option.Option<VComponent>, parent: Node, next: Option.Option<Node>): PatchEffect {
    return this.manager.patch(
      Option.map(old, (previous) => previous.manager),
      parent,
      next,
    );
  }

  remove(parent: Node): PatchEffect {
    return this.manager.remove(parent);
  }

  node(): Option.Option<Node> {
    return this.manager.node();
  }

  toString(): string {
    return this.manager.toString();
  }
}
