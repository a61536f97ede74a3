/**
 * Runtime identity of a value: the prototype of an object,
 * the `typeof` tag of a primitive.
 */
export type TypeId =
  | object
  | null
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "symbol"
  | "undefined"
  | "null";

/** Any class whose instances are `T` */
export type Constructor<T> = abstract new (...args: never[]) => T;

/** Either a {@linkcode Kind} or a class, as accepted by typed accessors */
export type TypeRef<T> = Kind<T> | Constructor<T>;

/**
 * Compute the runtime identity of a value
 *
 * @param value Any value
 * @returns Its prototype if it is an object or a function, its `typeof` tag otherwise
 */
export const typeIdOf = (value: unknown): TypeId => {
  if (value === null) return "null";

  const tag = typeof value;
  if (tag === "object" || tag === "function") {
    return Object.getPrototypeOf(value);
  }
  return tag;
};

declare const $type: unique symbol;

/**
 * Runtime type token.
 *
 * Acts like a `TypeId` but carries the static type it stands for.
 * Two values share a kind only if they share the exact same identity:
 * an instance of a subclass is not of its parent's kind.
 */
export class Kind<T> {
  /**
   * @param name Type name, used in diagnostics
   * @param id Identity values of this kind must have
   */
  constructor(
    public readonly name: string,
    public readonly id: TypeId,
  ) {}
  declare private [$type]: T;

  /** Check that `value` has this kind's exact identity */
  is(value: unknown): value is T {
    return typeIdOf(value) === this.id;
  }

  /**
   * Kind of the instances of a class
   *
   * @param ctor Class to derive the kind from
   */
  static of<T>(ctor: Constructor<T>): Kind<T> {
    return new Kind<T>(ctor.name, ctor.prototype);
  }

  static readonly string: Kind<string> = new Kind("string", "string");
  static readonly number: Kind<number> = new Kind("number", "number");
  static readonly boolean: Kind<boolean> = new Kind("boolean", "boolean");
  static readonly bigint: Kind<bigint> = new Kind("bigint", "bigint");
}

/**
 * Normalize a {@linkcode TypeRef} to its {@linkcode Kind}
 *
 * @param type Kind or class
 */
export const kindOf = <T>(type: TypeRef<T>): Kind<T> =>
  type instanceof Kind ? type : Kind.of(type);

/**
 * Readable name of a {@linkcode TypeId}, for diagnostics
 *
 * @param id Identity to describe
 */
export const typeIdName = (id: TypeId): string => {
  if (typeof id === "string") return id;
  if (id === null) return "null-prototype object";
  const ctor: unknown = Object.getOwnPropertyDescriptor(id, "constructor")
    ?.value;
  return typeof ctor === "function" && ctor.name ? ctor.name : "anonymous";
};
