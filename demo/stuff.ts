import { type Structured, structure } from "@holdall/structured";
import { z } from "zod";

export const StuffShape = z.object({
  foo: z.number().int().nonnegative(),
  bar: z.string(),
});

/** Sample type supporting structured access */
export class Stuff implements Structured<z.output<typeof StuffShape>> {
  constructor(public foo: number, public bar: string) {}

  get [structure](): typeof StuffShape {
    return StuffShape;
  }
}

/** Sample type without structured access */
export class NotSerializableStuff {
  constructor(public baz: number) {}
}
