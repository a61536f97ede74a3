import { deepStrictEqual, ok, strictEqual, throws } from "node:assert";
import { mock, test } from "node:test";
import { inspect } from "node:util";
import {
  DuplicateKeyError,
  NotFoundError,
  TypeMismatchError,
} from "./errors.ts";
import { Kind } from "./kind.ts";
import { createRegistry } from "./registry.ts";

class Point {
  constructor(public x: number, public y: number) {}
}

class Label {
  constructor(public text: string) {}
}

class Bag {
  constructor(public items: string[]) {}
}

test("inserted values are read back with their type", () => {
  const registry = createRegistry();
  const point = new Point(1, 2);

  deepStrictEqual(registry.insert("point", point), {
    ok: true,
    value: undefined,
  });
  deepStrictEqual(registry.read(Point, "point"), new Point(1, 2));
  strictEqual(registry.read(Point, "point"), registry.use(Point, "point"));
});

test("inserting an existing key fails and keeps the first value", () => {
  const registry = createRegistry();
  registry.insert("point", new Point(1, 2));

  const res = registry.insert("point", new Point(3, 4));

  ok(!res.ok);
  ok(res.error instanceof DuplicateKeyError);
  strictEqual(res.error.key, "point");
  strictEqual(res.error.code, "duplicate-key");
  deepStrictEqual(registry.read(Point, "point"), new Point(1, 2));
  strictEqual(registry.size, 1);
});

test("reading a missing key or a mistyped value gives undefined", () => {
  const registry = createRegistry();
  registry.insert("point", new Point(1, 2));

  strictEqual(registry.read(Point, "missing"), undefined);
  strictEqual(registry.read(Label, "point"), undefined);
  strictEqual(registry.read(Kind.string, "point"), undefined);
});

test("changes to a copy built from a read don't persist", () => {
  const registry = createRegistry();
  registry.insert("point", new Point(1, 2));

  const read = registry.read(Point, "point");
  ok(read);
  const doubled = new Point(read.x * 2, read.y * 2);
  doubled.x = 100;

  deepStrictEqual(registry.read(Point, "point"), new Point(1, 2));
});

test("values can't be changed through read", () => {
  const registry = createRegistry();
  registry.insert("point", new Point(1, 2));

  const read = registry.read(Point, "point");
  ok(read);
  throws(() => {
    Reflect.set(read, "x", 100);
  }, { name: "TypeError", message: "Cannot set x of a read-only view" });
  throws(() => Object.defineProperty(read, "y", { value: 0 }), TypeError);
  throws(() => Reflect.deleteProperty(read, "y"), TypeError);

  deepStrictEqual(registry.read(Point, "point"), new Point(1, 2));
});

test("nested values can't be changed through read or use", () => {
  const registry = createRegistry();
  registry.insert("bag", new Bag(["a"]));

  throws(() => {
    const items: unknown = registry.read(Bag, "bag")?.items;
    ok(Array.isArray(items));
    items.push("leaked");
  }, { name: "TypeError", message: "Cannot set 1 of a read-only view" });
  throws(() => {
    const items: unknown = registry.use(Bag, "bag").items;
    ok(Array.isArray(items));
    items.length = 0;
  }, TypeError);

  deepStrictEqual(registry.read(Bag, "bag")?.items, ["a"]);
});

test("changes made within writeWith persist", () => {
  const registry = createRegistry();
  registry.insert("point", new Point(1, 2));

  const res = registry.writeWith(Point, "point", (point) => {
    point.x = 10;
  });

  strictEqual(res.ok, true);
  deepStrictEqual(registry.read(Point, "point"), new Point(10, 2));
});

test("writeWith replaces the value returned by the mutator", () => {
  const registry = createRegistry();
  registry.insert("count", 1);

  registry.writeWith(Kind.number, "count", (count) => count + 1);

  strictEqual(registry.read(Kind.number, "count"), 2);
});

test("writeWith on a missing key fails with NotFoundError", () => {
  const registry = createRegistry();
  const mutator = mock.fn();

  const res = registry.writeWith(Point, "missing", mutator);

  ok(!res.ok);
  ok(res.error instanceof NotFoundError);
  strictEqual(res.error.code, "not-found");
  strictEqual(res.error.key, "missing");
  strictEqual(mutator.mock.callCount(), 0);
});

test("writeWith with the wrong type fails with TypeMismatchError", () => {
  const registry = createRegistry();
  registry.insert("point", new Point(1, 2));
  const mutator = mock.fn();

  const res = registry.writeWith(Label, "point", mutator);

  ok(!res.ok);
  ok(res.error instanceof TypeMismatchError);
  strictEqual(res.error.key, "point");
  strictEqual(res.error.expected, "Label");
  strictEqual(res.error.actual, "Point");
  strictEqual(
    res.error.message,
    'Value under key "point" is not of expected type Label (found Point)',
  );
  strictEqual(mutator.mock.callCount(), 0);
  deepStrictEqual(registry.read(Point, "point"), new Point(1, 2));
});

test("writeWith rejects a replacement of another type", () => {
  class Point3 extends Point {
    constructor(x: number, y: number, public z: number) {
      super(x, y);
    }
  }
  const trace = mock.fn();
  const registry = createRegistry({ name: "test", trace });
  registry.insert("point", new Point(1, 2));

  const res = registry.writeWith(Point, "point", () => new Point3(5, 6, 7));

  ok(!res.ok);
  ok(res.error instanceof TypeMismatchError);
  strictEqual(res.error.expected, "Point");
  strictEqual(res.error.actual, "Point3");
  deepStrictEqual(registry.read(Point, "point"), new Point(1, 2));
  deepStrictEqual(trace.mock.calls.map((call) => call.arguments), [
    ["test: insert", "point"],
  ]);
});

test("errors thrown by a mutator propagate", () => {
  const registry = createRegistry();
  registry.insert("point", new Point(1, 2));

  throws(
    () =>
      registry.writeWith(Point, "point", () => {
        throw new RangeError("out of bounds");
      }),
    RangeError,
  );
});

test("use throws the precise access error", () => {
  const registry = createRegistry();
  registry.insert("label", new Label("hello"));

  strictEqual(registry.use(Label, "label").text, "hello");
  throws(() => registry.use(Label, "missing"), NotFoundError);
  throws(() => registry.use(Point, "label"), TypeMismatchError);
});

test("subclass instances don't match their parent's type", () => {
  class Point3 extends Point {
    constructor(x: number, y: number, public z: number) {
      super(x, y);
    }
  }
  const registry = createRegistry();
  registry.insert("point", new Point3(1, 2, 3));

  strictEqual(registry.read(Point, "point"), undefined);
  strictEqual(registry.read(Point3, "point")?.z, 3);
});

test("keys are listed in insertion order", () => {
  const registry = createRegistry();
  registry.insert("b", "first");
  registry.insert("a", new Label("second"));

  deepStrictEqual(registry.keys(), ["b", "a"]);
  strictEqual(registry.has("a"), true);
  strictEqual(registry.has("c"), false);
});

test("trace receives insert and write events", () => {
  const trace = mock.fn();
  const registry = createRegistry({ name: "test", trace });

  registry.insert("label", new Label("hello"));
  registry.insert("label", new Label("again"));
  registry.writeWith(Label, "label", (label) => {
    label.text = "bye";
  });
  registry.writeWith(Point, "label", () => {});

  deepStrictEqual(
    trace.mock.calls.map((call) => call.arguments),
    [
      ["test: insert", "label"],
      ["test: write", "label"],
    ],
  );
});

test("registries inspect as their name and keys", () => {
  const registry = createRegistry({ name: "session" });
  registry.insert("user", new Label("John"));
  registry.insert("count", 1);

  strictEqual(inspect(registry), 'Registry(session) ["user","count"]');
  strictEqual(inspect(createRegistry()), "Registry(registry) []");
});
