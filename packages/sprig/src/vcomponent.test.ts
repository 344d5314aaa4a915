import { beforeEach, describe, expect, test } from "vitest";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Either from "effect/Either";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";

import { Component } from "./component.js";
import { DocumentHost, makeDocumentHost } from "./dom.js";
import { component, h } from "./h.js";
import { DomError } from "./shared.js";
import { Scheduler, schedulerLayer } from "./scheduler.js";
import { ComponentWrapper } from "./vcomponent.js";
import { countingHost, manualWake, runTest, testLayer } from "./test-helpers.js";

// =============================================================================
// Fixtures
// =============================================================================

let log: Array<string> = [];
let increments: Array<() => void> = [];
let resets: Array<() => void> = [];

class Button extends Component<{ readonly disabled: boolean }> {
  render() {
    return h("button", { disabled: this.props.disabled }, ["Click"]);
  }
}

class Tracked extends Component<{ readonly label: string }> {
  override created() {
    log.push(`created ${this.props.label}`);
  }
  override updated(old: { readonly label: string }) {
    log.push(`updated ${old.label} -> ${this.props.label}`);
  }
  override destroyed() {
    log.push(`destroyed ${this.props.label}`);
  }
  render() {
    return h("span", {}, [this.props.label]);
  }
}

class Other extends Component<{ readonly label: string }> {
  override created() {
    log.push(`created other ${this.props.label}`);
  }
  override updated() {
    log.push("updated other");
  }
  override destroyed() {
    log.push(`destroyed other ${this.props.label}`);
  }
  render() {
    return h("em", {}, [this.props.label]);
  }
}

class Parent extends Component<{ readonly child: string }> {
  render() {
    return h("div", {}, [component(Tracked, { label: this.props.child })]);
  }
}

class Counter extends Component<void, { readonly count: number }> {
  static override initialState() {
    return { count: 0 };
  }
  override created() {
    increments.push(() => this.setState((s) => ({ count: s.count + 1 })));
    resets.push(() => this.setState((s) => s));
  }
  render() {
    return h("p", {}, [String(this.state.count)]);
  }
}

const container = () => document.createElement("div");

beforeEach(() => {
  log = [];
  increments = [];
  resets = [];
});

// =============================================================================
// Mounting and reuse
// =============================================================================

describe("VComponent", () => {
  describe("fresh mount", () => {
    test("patches a container with a component", async () => {
      const div = container();
      await runTest(
        component(Button, { disabled: false })
          .patch(Option.none(), div, Option.none())
          .pipe(Effect.provide(testLayer())),
      );
      expect(div.innerHTML).toBe('<button disabled="false">Click</button>');
    });

    test("fires created once and updated never", async () => {
      const div = container();
      await runTest(
        component(Tracked, { label: "a" })
          .patch(Option.none(), div, Option.none())
          .pipe(Effect.provide(testLayer())),
      );
      expect(log).toEqual(["created a"]);
      expect(div.innerHTML).toBe("<span>a</span>");
    });
  });

  describe("same component type", () => {
    test("reuses the instance when props change", async () => {
      const div = container();
      await runTest(
        Effect.gen(function* () {
          const first = component(Button, { disabled: false });
          yield* first.patch(Option.none(), div, Option.none());
          expect(div.innerHTML).toBe('<button disabled="false">Click</button>');
          const button = div.firstChild;

          const second = component(Button, { disabled: true });
          yield* second.patch(Option.some(first), div, Option.none());
          expect(div.innerHTML).toBe('<button disabled="true">Click</button>');
          expect(div.firstChild).toBe(button);
        }).pipe(Effect.provide(testLayer())),
      );
    });

    test("fires updated with the previous props and no created or destroyed", async () => {
      const div = container();
      await runTest(
        Effect.gen(function* () {
          const first = component(Tracked, { label: "a" });
          yield* first.patch(Option.none(), div, Option.none());
          const textNode = div.firstChild?.firstChild;

          const second = component(Tracked, { label: "b" });
          yield* second.patch(Option.some(first), div, Option.none());

          expect(log).toEqual(["created a", "updated a -> b"]);
          expect(div.innerHTML).toBe("<span>b</span>");
          // The cached render was the diff base: the text node was edited in place
          expect(div.firstChild?.firstChild).toBe(textNode);
        }).pipe(Effect.provide(testLayer())),
      );
    });

    test("does not fire updated when structurally equal props come in", async () => {
      const div = container();
      await runTest(
        Effect.gen(function* () {
          const first = component(Tracked, Data.struct({ label: "x" }));
          yield* first.patch(Option.none(), div, Option.none());
          const second = component(Tracked, Data.struct({ label: "x" }));
          yield* second.patch(Option.some(first), div, Option.none());
        }).pipe(Effect.provide(testLayer())),
      );
      expect(log).toEqual(["created x"]);
      expect(div.innerHTML).toBe("<span>x</span>");
    });

    test("treats fresh plain-object props as changed", async () => {
      const div = container();
      await runTest(
        Effect.gen(function* () {
          const first = component(Tracked, { label: "x" });
          yield* first.patch(Option.none(), div, Option.none());
          const second = component(Tracked, { label: "x" });
          yield* second.patch(Option.some(first), div, Option.none());
        }).pipe(Effect.provide(testLayer())),
      );
      expect(log).toEqual(["created x", "updated x -> x"]);
    });
  });

  describe("different component type", () => {
    test("removes the old component before mounting the new one", async () => {
      const div = container();
      await runTest(
        Effect.gen(function* () {
          const first = component(Tracked, { label: "a" });
          yield* first.patch(Option.none(), div, Option.none());
          const second = component(Other, { label: "b" });
          yield* second.patch(Option.some(first), div, Option.none());
        }).pipe(Effect.provide(testLayer())),
      );
      expect(log).toEqual(["created a", "destroyed a", "created other b"]);
      expect(div.innerHTML).toBe("<em>b</em>");
    });

    test("destroys nested components of the old subtree", async () => {
      const div = container();
      await runTest(
        Effect.gen(function* () {
          const first = component(Parent, { child: "inner" });
          yield* first.patch(Option.none(), div, Option.none());
          expect(div.innerHTML).toBe("<div><span>inner</span></div>");

          const second = component(Other, { label: "b" });
          yield* second.patch(Option.some(first), div, Option.none());
        }).pipe(Effect.provide(testLayer())),
      );
      expect(log).toEqual(["created inner", "destroyed inner", "created other b"]);
      expect(div.innerHTML).toBe("<em>b</em>");
    });

    test("swaps back and forth without reusing state across types", async () => {
      const div = container();
      await runTest(
        Effect.gen(function* () {
          const a = component(Tracked, { label: "a" });
          yield* a.patch(Option.none(), div, Option.none());
          const b = component(Other, { label: "b" });
          yield* b.patch(Option.some(a), div, Option.none());
          const c = component(Tracked, { label: "c" });
          yield* c.patch(Option.some(b), div, Option.none());
        }).pipe(Effect.provide(testLayer())),
      );
      expect(log).toEqual([
        "created a",
        "destroyed a",
        "created other b",
        "destroyed other b",
        "created c",
      ]);
      expect(div.innerHTML).toBe("<span>c</span>");
    });
  });

  describe("remove", () => {
    test("detaches the rendered subtree and fires destroyed", async () => {
      const div = container();
      await runTest(
        Effect.gen(function* () {
          const vcomp = component(Tracked, { label: "a" });
          yield* vcomp.patch(Option.none(), div, Option.none());
          yield* vcomp.remove(div);
          expect(Option.isNone(vcomp.node())).toBe(true);
        }).pipe(Effect.provide(testLayer())),
      );
      expect(log).toEqual(["created a", "destroyed a"]);
      expect(div.innerHTML).toBe("");
    });

    test("is a no-op for a component that never rendered", async () => {
      const div = container();
      await runTest(
        component(Tracked, { label: "a" }).remove(div).pipe(Effect.provide(testLayer())),
      );
      expect(log).toEqual([]);
    });
  });

  describe("node", () => {
    test("is None before the first render and the root node after", async () => {
      const div = container();
      const vcomp = component(Button, { disabled: false });
      expect(Option.isNone(vcomp.node())).toBe(true);
      await runTest(
        vcomp.patch(Option.none(), div, Option.none()).pipe(Effect.provide(testLayer())),
      );
      expect(Option.getOrNull(vcomp.node())).toBe(div.firstChild);
    });
  });
});

// =============================================================================
// Type erasure
// =============================================================================

describe("ComponentWrapper.tryCast", () => {
  test("returns the same-typed wrapper on the right", () => {
    const a = new ComponentWrapper(Tracked, { label: "a" });
    const b = new ComponentWrapper(Tracked, { label: "b" });
    const result = a.tryCast(b);
    expect(Either.isRight(result)).toBe(true);
    expect(Either.getOrNull(result)).toBe(b);
  });

  test("hands a different type back untouched on the left", () => {
    const a = new ComponentWrapper(Tracked, { label: "a" });
    const other = new ComponentWrapper(Other, { label: "a" });
    const result = a.tryCast(other);
    expect(Either.isLeft(result)).toBe(true);
    expect(Either.getLeft(result).pipe(Option.getOrNull)).toBe(other);
  });

  test("names the managed component", () => {
    expect(new ComponentWrapper(Button, { disabled: true }).componentName).toBe("Button");
  });
});

// =============================================================================
// Render walk
// =============================================================================

describe("renderWalk", () => {
  test("makes no document mutation when nothing changed", async () => {
    const div = container();
    const counting = countingHost();
    await runTest(
      Effect.gen(function* () {
        const vcomp = component(Parent, { child: "x" });
        yield* vcomp.patch(Option.none(), div, Option.none());
        expect(counting.mutations()).toBeGreaterThan(0);

        counting.reset();
        yield* vcomp.renderWalk(div, Option.none());
        yield* vcomp.renderWalk(div, Option.none());
        expect(counting.mutations()).toBe(0);
      }).pipe(Effect.provide(testLayer(counting.host))),
    );
  });

  test("re-renders a component whose state changed", async () => {
    const div = container();
    const wake = manualWake();
    await runTest(
      Effect.gen(function* () {
        const vcomp = component(Counter, undefined);
        yield* vcomp.patch(Option.none(), div, Option.none());
        expect(div.innerHTML).toBe("<p>0</p>");
        const textNode = div.firstChild?.firstChild;

        increments.forEach((increment) => increment());
        increments.forEach((increment) => increment());
        increments.forEach((increment) => increment());
        expect(wake.posts()).toBe(1);

        yield* vcomp.renderWalk(div, Option.none());
        expect(div.innerHTML).toBe("<p>3</p>");
        expect(div.firstChild?.firstChild).toBe(textNode);
      }).pipe(Effect.provide(testLayer(undefined, wake))),
    );
  });

  test("skips the render when the committed state is unchanged", async () => {
    const div = container();
    const counting = countingHost();
    await runTest(
      Effect.gen(function* () {
        const vcomp = component(Counter, undefined);
        yield* vcomp.patch(Option.none(), div, Option.none());
        counting.reset();

        resets.forEach((reset) => reset());
        yield* vcomp.renderWalk(div, Option.none());
        expect(counting.mutations()).toBe(0);
        expect(div.innerHTML).toBe("<p>0</p>");
      }).pipe(Effect.provide(testLayer(counting.host))),
    );
  });

  test("visits nested components even when the parent is clean", async () => {
    class Shell extends Component {
      render() {
        return h("section", {}, [component(Counter, undefined)]);
      }
    }
    const div = container();
    await runTest(
      Effect.gen(function* () {
        const vcomp = component(Shell, undefined);
        yield* vcomp.patch(Option.none(), div, Option.none());
        increments.forEach((increment) => increment());
        yield* vcomp.renderWalk(div, Option.none());
      }).pipe(Effect.provide(testLayer())),
    );
    expect(div.innerHTML).toBe("<section><p>1</p></section>");
  });
});

// =============================================================================
// Errors
// =============================================================================

describe("document failures", () => {
  test("propagate unchanged as DomError", async () => {
    const failing = {
      ...makeDocumentHost(document),
      insertBefore: () =>
        Effect.fail(new DomError({ operation: "insertBefore", cause: "host refused" })),
    };
    const div = container();
    const error = await runTest(
      component(Button, { disabled: false })
        .patch(Option.none(), div, Option.none())
        .pipe(
          Effect.flip,
          Effect.provide(
            Layer.merge(Layer.succeed(DocumentHost, failing), schedulerLayer(manualWake())),
          ),
        ),
    );
    expect(error._tag).toBe("DomError");
    expect(error.operation).toBe("insertBefore");
    expect(error.cause).toBe("host refused");
  });

  test("components ask the provided scheduler for re-renders", async () => {
    const div = container();
    const pending = await runTest(
      Effect.gen(function* () {
        const vcomp = component(Counter, undefined);
        yield* vcomp.patch(Option.none(), div, Option.none());
        increments.forEach((increment) => increment());
        const scheduler = yield* Scheduler;
        return yield* scheduler.isPending;
      }).pipe(Effect.provide(testLayer())),
    );
    expect(pending).toBe(true);
  });
});
