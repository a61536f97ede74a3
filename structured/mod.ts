/**
 * # holdall structured
 *
 * Generic structured (JSON-like) view of values whose type opts in.
 *
 * A type gains the capability by exposing a zod schema under {@linkcode structure}.
 * {@linkcode toStructured} and {@linkcode updateStructured} only accept such types,
 * so calling them on any other type is a compile-time error.
 *
 * @example Read and rewrite a value as structured data
 * ```ts
 * import {
 *   type Structured,
 *   structure,
 *   toStructured,
 *   updateStructured,
 * } from "@holdall/structured";
 * import { deepStrictEqual } from "node:assert";
 * import { z } from "zod";
 *
 * const CounterShape = z.object({ label: z.string(), count: z.number() });
 *
 * class Counter implements Structured<z.output<typeof CounterShape>> {
 *   constructor(public label: string, public count: number) {}
 *   get [structure]() {
 *     return CounterShape;
 *   }
 * }
 *
 * const counter = new Counter("clicks", 1);
 * updateStructured(counter, (value) => ({ ...value, count: 2 }));
 *
 * deepStrictEqual(toStructured(counter), { label: "clicks", count: 2 });
 * ```
 *
 * @module
 */

export {
  isStructuredObject,
  structure,
  type Structured,
  StructuredShapeError,
  type StructuredObject,
  type StructuredValue,
  toStructured,
  updateStructured,
} from "./structured.ts";
