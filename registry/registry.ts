import {
  type AccessError,
  DuplicateKeyError,
  NotFoundError,
  TypeMismatchError,
} from "./errors.ts";
import {
  kindOf,
  type TypeId,
  typeIdName,
  typeIdOf,
  type TypeRef,
} from "./kind.ts";
import { err, ok, type Result, unwrap } from "./result.ts";
import { type ReadonlyView, readonlyView } from "./view.ts";

/** {@linkcode Registry} configuration */
export interface RegistryOptions {
  /** Name identifying the registry in traces and inspection */
  name?: string;

  /**
   * Sink receiving insert and write events, like `console.debug`
   *
   * @param data Event label followed by the affected key
   */
  trace?: (...data: unknown[]) => void;
}

/**
 * Function receiving exclusive access to a stored value.
 *
 * Changes made to `value` persist. Returning a value of the same type
 * replaces the stored one instead, which is the only way to update primitives.
 * Returning a value of any other identity fails the write, though changes
 * already made to `value` stay.
 */
export type Mutator<T> = (value: T) => T | void;

interface Entry {
  readonly type: TypeId;
  value: unknown;
}

/**
 * Idiomatic {@linkcode Registry} factory
 *
 * @param options Optional configuration
 */
export const createRegistry = (options?: RegistryOptions): Registry =>
  new Registry(options);

/**
 * Heterogeneous store owning values of arbitrary types under string keys.
 *
 * Each entry remembers the identity of the value it was inserted with,
 * and every typed access checks it.
 */
export class Registry {
  /**
   * @param options Optional configuration
   */
  constructor(options: RegistryOptions = {}) {
    this.name = options.name ?? "registry";
    this.#trace = options.trace;
  }

  readonly name: string;
  #trace?: (...data: unknown[]) => void;
  #store = new Map<string, Entry>();

  /**
   * Store a value under a new key
   *
   * @param key Unique key
   * @param value Value to take ownership of
   *
   * @returns An error if `key` is already used, in which case nothing changes
   */
  insert(key: string, value: unknown): Result<void, DuplicateKeyError> {
    if (this.#store.has(key)) return err(new DuplicateKeyError(key));

    this.#store.set(key, { type: typeIdOf(value), value });
    this.#trace?.(`${this.name}: insert`, key);
    return ok();
  }

  /**
   * Safely get the value stored under given `key`
   *
   * A missing key and a value of another type both give `undefined`.
   *
   * @param type Expected type of the value
   * @param key Key the value was inserted with
   *
   * @returns A read-only view of the value if it exists with that type, `undefined` otherwise
   */
  read<T>(type: TypeRef<T>, key: string): ReadonlyView<T> | undefined {
    const res = this.#access(type, key);
    return res.ok ? readonlyView(res.value) : undefined;
  }

  /**
   * Expect the value stored under given `key`
   *
   * @param type Expected type of the value
   * @param key Key the value was inserted with
   *
   * @returns A read-only view of the value
   *
   * @throws {NotFoundError} if nothing is stored under `key`
   * @throws {TypeMismatchError} if the stored value is of another type
   */
  use<T>(type: TypeRef<T>, key: string): ReadonlyView<T> {
    return readonlyView(unwrap(this.#access(type, key)));
  }

  /**
   * Update the value stored under given `key`
   *
   * @param type Expected type of the value
   * @param key Key the value was inserted with
   * @param mutator Function applying the changes, called at most once
   *
   * @returns An error if nothing is stored under `key`, if it is of another type
   *          or if `mutator` returns a value of another type
   */
  writeWith<T>(
    type: TypeRef<T>,
    key: string,
    mutator: Mutator<T>,
  ): Result<void, AccessError> {
    const res = this.#access(type, key);
    if (!res.ok) return res;

    const kind = kindOf(type);
    const replacement = mutator(res.value);
    if (replacement !== undefined) {
      if (!kind.is(replacement)) {
        return err(
          new TypeMismatchError(
            key,
            kind.name,
            typeIdName(typeIdOf(replacement)),
          ),
        );
      }
      const entry = this.#store.get(key);
      if (entry) entry.value = replacement;
    }

    this.#trace?.(`${this.name}: write`, key);
    return ok();
  }

  /**
   * Check if any value is stored under given `key`, whatever its type
   *
   * @param key Key to look up
   */
  has(key: string): boolean {
    return this.#store.has(key);
  }

  /** Stored keys, in insertion order */
  keys(): string[] {
    return [...this.#store.keys()];
  }

  /** Number of stored values */
  get size(): number {
    return this.#store.size;
  }

  #access<T>(type: TypeRef<T>, key: string): Result<T, AccessError> {
    const entry = this.#store.get(key);
    if (!entry) return err(new NotFoundError(key));

    const kind = kindOf(type);
    const { value } = entry;
    return kind.is(value)
      ? ok(value)
      : err(new TypeMismatchError(key, kind.name, typeIdName(entry.type)));
  }

  /** @ignore */
  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return `Registry(${this.name}) ${JSON.stringify(this.keys())}`;
  }
}
