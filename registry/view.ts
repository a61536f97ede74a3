/**
 * Deeply read-only version of `T`.
 *
 * Symbol-keyed members and functions are left as they are: they describe
 * a type's protocol rather than its data.
 */
export type ReadonlyView<T> = T extends (...args: never[]) => unknown ? T
  : T extends object ? {
      readonly [K in keyof T]: K extends symbol ? T[K] : ReadonlyView<T[K]>;
    }
  : T;

const views = new WeakMap<object, object>();

const refuse = (action: string, property?: string | symbol): never => {
  throw new TypeError(
    property === undefined
      ? `Cannot ${action} a read-only view`
      : `Cannot ${action} ${String(property)} of a read-only view`,
  );
};

const handler: ProxyHandler<object> = {
  get(target, property, receiver) {
    const value: unknown = Reflect.get(target, property, receiver);
    if (typeof property === "symbol") return value;

    // Proxies must report frozen properties as they are
    const descriptor = Reflect.getOwnPropertyDescriptor(target, property);
    if (
      descriptor && "value" in descriptor && !descriptor.configurable &&
      !descriptor.writable
    ) {
      return value;
    }
    return readonlyView(value);
  },
  set: (_target, property) => refuse("set", property),
  defineProperty: (_target, property) => refuse("define", property),
  deleteProperty: (_target, property) => refuse("delete", property),
  setPrototypeOf: () => refuse("change the prototype of"),
  preventExtensions: () => refuse("prevent extensions of"),
};

/**
 * Wrap a value so that it can be read but not changed
 *
 * Objects are wrapped in a proxy rejecting any change, their properties
 * lazily wrapped the same way. Primitives and functions are returned as is.
 * Objects relying on internal slots or `#private` fields (`Map`, `Date`...)
 * can't be read through a view.
 *
 * @param value Value to protect
 *
 * @returns The same view for the same object
 */
export function readonlyView<T>(value: T): ReadonlyView<T>;
export function readonlyView(value: unknown): unknown {
  if (typeof value !== "object" || value === null) return value;

  let view = views.get(value);
  if (!view) {
    view = new Proxy(value, handler);
    views.set(value, view);
  }
  return view;
}
