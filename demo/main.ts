import { createRegistry, type Registry, unwrap } from "@holdall/registry";
import { toStructured, updateStructured } from "@holdall/structured";
import { NotSerializableStuff, Stuff } from "./stuff.ts";

/**
 * Walk through the registry's API with a structured and a plain type
 *
 * @param log Sink for the walkthrough's trace, like `console.debug`
 * @returns The registry in its final state
 */
export const main = (log: (...data: unknown[]) => void): Registry => {
  const stuff = new Stuff(42, "hello");
  log("created stuff", stuff);

  const ctx = createRegistry({ name: "demo", trace: log });
  unwrap(ctx.insert("stuff", stuff));

  // Reads never persist
  const read = ctx.read(Stuff, "stuff");
  if (read) {
    log("within read", new Stuff(read.foo * 2, read.bar));
  }
  log("after read", ctx.read(Stuff, "stuff"));

  unwrap(
    ctx.writeWith(Stuff, "stuff", (stuff) => {
      stuff.bar = "persisted";
      log("within write", stuff);
    }),
  );
  log("after write", ctx.read(Stuff, "stuff"));

  const written = ctx.read(Stuff, "stuff");
  if (written) {
    log("structured", toStructured(written));
  }

  unwrap(
    ctx.writeWith(Stuff, "stuff", (stuff) => {
      updateStructured(stuff, (value) => ({ ...value, foo: 1 }));
    }),
  );
  log("after structured write", ctx.read(Stuff, "stuff"));

  unwrap(ctx.insert("notserializablestuff", new NotSerializableStuff(42)));
  unwrap(
    ctx.writeWith(NotSerializableStuff, "notserializablestuff", (ns) => {
      ns.baz = 14;
    }),
  );
  log(
    "after plain write",
    ctx.read(NotSerializableStuff, "notserializablestuff"),
  );

  // NotSerializableStuff doesn't implement Structured:
  // toStructured and updateStructured don't accept it

  return ctx;
};
