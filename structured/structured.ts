import type { z } from "zod";

/** Self-describing tree of primitives, sequences and maps */
export type StructuredValue =
  | null
  | boolean
  | number
  | string
  | StructuredValue[]
  | StructuredObject;

/** Map branch of {@linkcode StructuredValue}, `undefined` standing for an absent field */
export type StructuredObject = { [key: string]: StructuredValue | undefined };

/** Well-known key under which a {@linkcode Structured} type exposes its schema */
export const structure: unique symbol = Symbol.for("holdall.structure");

/**
 * Capability of types losslessly convertible to and from a {@linkcode StructuredValue}.
 *
 * Types opt in by exposing the schema of their structured shape:
 *
 * ```ts
 * const PointShape = z.object({ x: z.number(), y: z.number() });
 *
 * class Point implements Structured<z.output<typeof PointShape>> {
 *   constructor(public x: number, public y: number) {}
 *   get [structure]() {
 *     return PointShape;
 *   }
 * }
 * ```
 */
export interface Structured<Shape extends StructuredValue = StructuredValue> {
  readonly [structure]: z.ZodType<Shape, z.ZodTypeDef, unknown>;
}

const describe = (issues: z.ZodIssue[]): string =>
  issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");

/** A structured value failed its type's schema */
export class StructuredShapeError extends Error {
  /**
   * @param typeName Name of the type whose schema was violated
   * @param issues Violations reported by the schema
   */
  constructor(
    public readonly typeName: string,
    public readonly issues: z.ZodIssue[],
  ) {
    super(`Structured value doesn't fit ${typeName}: ${describe(issues)}`);
    this.name = "StructuredShapeError";
  }
}

/**
 * Check that a structured value is a map
 *
 * @param value Value to check
 */
export const isStructuredObject = (
  value: StructuredValue,
): value is StructuredObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const typeNameOf = (value: object): string => value.constructor?.name ?? "Object";

const parse = <Shape extends StructuredValue>(
  value: Structured<Shape>,
  input: unknown,
): Shape => {
  const res = value[structure].safeParse(input);
  if (!res.success) {
    throw new StructuredShapeError(typeNameOf(value), res.error.issues);
  }
  return res.data;
};

/**
 * Project a value to its structured representation
 *
 * The result is a fresh tree holding only the fields the schema names:
 * changing it has no effect on `value`.
 *
 * @param value Value of a {@linkcode Structured} type
 *
 * @throws {StructuredShapeError} if `value` was put in a state its own schema rejects
 */
export const toStructured = <Shape extends StructuredValue>(
  value: Structured<Shape>,
): Shape => parse(value, value);

/**
 * Rewrite a value through its structured representation
 *
 * Projects `value`, applies `transform` and overwrites `value` in place with the validated result:
 * fields the result leaves out are removed from `value`.
 *
 * @param value Value of a {@linkcode Structured} type, updated in place
 * @param transform Function computing the new structured representation
 *
 * @throws {StructuredShapeError} if the transformed value doesn't fit the schema, leaving `value` untouched
 */
export const updateStructured = <Shape extends StructuredObject>(
  value: Structured<Shape>,
  transform: (structured: Shape) => StructuredValue,
): void => {
  const current = toStructured(value);
  const previousKeys = Object.keys(current);
  const updated = parse(value, transform(current));

  for (const key of previousKeys) {
    if (!Object.hasOwn(updated, key)) Reflect.deleteProperty(value, key);
  }
  Object.assign(value, updated);
};
