/**
 * # holdall registry
 *
 * Type-safe heterogeneous value store.
 *
 * 1. Create a registry
 * 2. Insert values of any type under string keys
 * 3. Read them back by asserting their type
 * 4. Update them through `writeWith`, the only way changes persist
 *
 * @example Insert, read & write
 * ```ts
 * import { createRegistry } from "@holdall/registry";
 * import { strictEqual } from "node:assert";
 *
 * class User {
 *   constructor(public id: bigint, public name: string) {}
 * }
 *
 * const registry = createRegistry();
 * registry.insert("user", new User(42n, "John"));
 *
 * registry.writeWith(User, "user", (user) => {
 *   user.name = "Jane";
 * });
 *
 * strictEqual(registry.read(User, "user")?.name, "Jane");
 * ```
 *
 * @example Absent and mistyped values
 * ```ts
 * import { createRegistry, Kind } from "@holdall/registry";
 * import { strictEqual, throws } from "node:assert";
 *
 * const registry = createRegistry();
 * registry.insert("sessionId", "secret");
 *
 * strictEqual(registry.read(Kind.number, "sessionId"), undefined);
 * strictEqual(registry.read(Kind.string, "missing"), undefined);
 * throws(() => registry.use(Kind.number, "sessionId"));
 * ```
 *
 * @example Replace a primitive
 * ```ts
 * import { createRegistry, Kind } from "@holdall/registry";
 * import { strictEqual } from "node:assert";
 *
 * const registry = createRegistry();
 * registry.insert("count", 1);
 * registry.writeWith(Kind.number, "count", (count) => count + 1);
 *
 * strictEqual(registry.read(Kind.number, "count"), 2);
 * ```
 *
 * @module
 */

export {
  AccessError,
  DuplicateKeyError,
  NotFoundError,
  TypeMismatchError,
} from "./errors.ts";
export {
  type Constructor,
  Kind,
  kindOf,
  type TypeId,
  typeIdName,
  typeIdOf,
  type TypeRef,
} from "./kind.ts";
export {
  createRegistry,
  type Mutator,
  Registry,
  type RegistryOptions,
} from "./registry.ts";
export {
  err,
  type Err,
  ok,
  type Ok,
  type Result,
  unwrap,
} from "./result.ts";
export { readonlyView, type ReadonlyView } from "./view.ts";
