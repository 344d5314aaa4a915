import * as Equal from "effect/Equal";
import type * as Equivalence from "effect/Equivalence";
import * as Option from "effect/Option";

import type { Markup } from "./keyed.js";

// =============================================================================
// Component Status
// =============================================================================

/**
 * Mutable cell shared by a component instance and the callbacks it hands out.
 *
 * Holds the latest (uncommitted) state and the dirty flags. Setting state marks
 * it dirty and asks the scheduler for a render pass; the instance commits the
 * pending state in `refreshState` at the start of that pass.
 */
export class ComponentStatus<State> {
  private stateDirty = false;
  private propsDirty = false;

  constructor(
    private pending: State,
    private readonly react: () => void,
  ) {}

  get state(): State {
    return this.pending;
  }

  setState(f: (state: State) => State): void {
    this.pending = f(this.pending);
    this.stateDirty = true;
    this.react();
  }

  isStateDirty(): boolean {
    return this.stateDirty;
  }

  isPropsDirty(): boolean {
    return this.propsDirty;
  }

  markPropsDirty(): void {
    this.propsDirty = true;
  }

  markStateClean(): void {
    this.stateDirty = false;
  }

  markPropsClean(): void {
    this.propsDirty = false;
  }
}

// =============================================================================
// Component
// =============================================================================

/**
 * Base class for user components.
 *
 * The reconciler only talks to a component through these methods; it never
 * reads `props` or `state` directly. Stateful components override the static
 * `initialState`:
 *
 * @example
 * ```typescript
 * class Counter extends Component<{ step: number }, { count: number }> {
 *   static override initialState() {
 *     return { count: 0 };
 *   }
 *
 *   render() {
 *     return h("button", { onclick: () => this.setState((s) => ({ count: s.count + this.props.step })) }, [
 *       String(this.state.count),
 *     ]);
 *   }
 * }
 * ```
 */
export abstract class Component<Props = void, State = void> {
  protected props: Props;
  protected state: State;

  /**
   * Decides whether new props count as a change. Use `Data.struct` props, or
   * override this, to get structural comparison.
   */
  protected propsEquivalence: Equivalence.Equivalence<Props> = (a, b) => Equal.equals(a, b);

  constructor(
    props: Props,
    protected readonly status: ComponentStatus<State>,
  ) {
    this.props = props;
    this.state = status.state;
  }

  static initialState(): void {}

  abstract render(): Markup;

  created(): void {}

  updated(_oldProps: Props): void {}

  destroyed(): void {}

  /**
   * Swap in new props. Returns the previous ones when they differ.
   */
  update(next: Props): Option.Option<Props> {
    if (this.propsEquivalence(this.props, next)) {
      return Option.none();
    }
    const previous = this.props;
    this.props = next;
    this.status.markPropsDirty();
    return Option.some(previous);
  }

  isStateDirty(): boolean {
    return this.status.isStateDirty();
  }

  /**
   * Commit the pending state. True when it differs from the committed one.
   */
  refreshState(): boolean {
    const next = this.status.state;
    const changed = !Equal.equals(this.state, next);
    this.state = next;
    this.status.markStateClean();
    return changed;
  }

  isPropsDirty(): boolean {
    return this.status.isPropsDirty();
  }

  /**
   * Called after a committed re-render. Only props are cleared here: state
   * set during `render` must still trigger the next pass.
   */
  markClean(): void {
    this.status.markPropsClean();
  }

  protected setState(f: (state: State) => State): void {
    this.status.setState(f);
  }
}

/**
 * The static side of a component class: what `ComponentWrapper` needs to
 * construct it. Two wrappers manage the same component type exactly when
 * their `ComponentType`s are the same constructor.
 */
export interface ComponentType<Props, State, C extends Component<Props, State>> {
  new (props: Props, status: ComponentStatus<State>): C;
  initialState(): State;
  readonly name: string;
}
