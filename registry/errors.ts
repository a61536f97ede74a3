/** Inserting under a key that already holds a value */
export class DuplicateKeyError extends Error {
  readonly code = "duplicate-key";

  constructor(public readonly key: string) {
    super(`A value is already stored under key "${key}"`);
    this.name = "DuplicateKeyError";
  }
}

/** Failure to access the value stored under a key with an expected type */
export abstract class AccessError extends Error {
  abstract readonly code: "not-found" | "type-mismatch";

  constructor(public readonly key: string, message: string) {
    super(message);
  }
}

/** No value is stored under the key */
export class NotFoundError extends AccessError {
  readonly code = "not-found";

  constructor(key: string) {
    super(key, `No value is stored under key "${key}"`);
    this.name = "NotFoundError";
  }
}

/** The value stored under the key is not of the expected type */
export class TypeMismatchError extends AccessError {
  readonly code = "type-mismatch";

  /**
   * @param key Accessed key
   * @param expected Name of the type the caller expected
   * @param actual Name of the type actually stored
   */
  constructor(
    key: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(
      key,
      `Value under key "${key}" is not of expected type ${expected} (found ${actual})`,
    );
    this.name = "TypeMismatchError";
  }
}
