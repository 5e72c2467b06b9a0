// rulecore/test/contract_functionRegistry.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { DuplicateRegistrationError } from "../errors/EngineErrors";
import { FunctionRegistry, tokenize } from "../functions/FunctionRegistry";
import { fakeFunction, intent } from "./fixtures";

const names = (fns: { name: string }[]) => fns.map((f) => f.name);

test("[contract] tokenize lowercases and splits on punctuation", () => {
  assert.deepEqual(tokenize("Pick-up the Rusty_Sword, now!"), ["pick", "up", "the", "rusty_sword", "now"]);
  assert.deepEqual(tokenize("   "), []);
});

test("[contract] query matches category case-insensitively", () => {
  const reg = new FunctionRegistry({ defaultPriority: 5 });
  reg.register(fakeFunction("attack"), { category: "Attack" });
  reg.register(fakeFunction("search"), { category: "search" });

  assert.deepEqual(names(reg.query(intent("ATTACK"))), ["attack"]);
  assert.deepEqual(names(reg.query(intent("fly"))), []);
});

test("[contract] query matches keywords against action and target tokens", () => {
  const reg = new FunctionRegistry({ defaultPriority: 5 });
  reg.register(fakeFunction("trade"), { category: "trade", keywords: ["buy", "Sell"] });

  assert.deepEqual(names(reg.query(intent("shop", { action: "sell the sword" }))), ["trade"]);
  assert.deepEqual(names(reg.query(intent("shop", { action: "look", target: "buy" }))), ["trade"]);
  // Substrings do not count.
  assert.deepEqual(names(reg.query(intent("shop", { action: "buyer" }))), []);
});

test("[contract] ordering is priority desc, then registration order", () => {
  const reg = new FunctionRegistry({ defaultPriority: 5 });
  reg.register(fakeFunction("low", { priority: 1 }), { category: "act" });
  reg.register(fakeFunction("first_default"), { category: "act" });
  reg.register(fakeFunction("high"), { category: "act", priority: 9 });
  reg.register(fakeFunction("second_default"), { category: "act" });

  assert.deepEqual(names(reg.query(intent("act"))), ["high", "first_default", "second_default", "low"]);
  assert.deepEqual(names(reg.list()), ["high", "first_default", "second_default", "low"]);
});

test("[contract] registration priority overrides the function's own", () => {
  const reg = new FunctionRegistry({ defaultPriority: 5 });
  const meta = reg.register(fakeFunction("f", { priority: 2 }), { category: "x", priority: 7 });
  assert.equal(meta.priority, 7);
  assert.equal(reg.register(fakeFunction("g", { priority: 2 }), { category: "x" }).priority, 2);
  assert.equal(reg.register(fakeFunction("h"), { category: "x" }).priority, 5);
});

test("[contract] duplicate names and instances are rejected", () => {
  const reg = new FunctionRegistry({ defaultPriority: 5 });
  const fn = fakeFunction("attack");
  reg.register(fn, { category: "attack" });

  assert.throws(() => reg.register(fakeFunction("attack"), { category: "other" }), DuplicateRegistrationError);
  assert.throws(() => reg.register(fn, { category: "attack" }), DuplicateRegistrationError);
  assert.equal(reg.size, 1);
});

test("[contract] unregister removes and is a no-op for unknown names", () => {
  const reg = new FunctionRegistry({ defaultPriority: 5 });
  reg.register(fakeFunction("rest"), { category: "rest" });

  assert.equal(reg.unregister("rest"), true);
  assert.equal(reg.unregister("rest"), false);
  assert.deepEqual(reg.query(intent("rest")), []);
  // The name is free again.
  reg.register(fakeFunction("rest"), { category: "rest" });
  assert.equal(reg.size, 1);
});

test("[contract] metadata and categories reflect registrations", () => {
  const reg = new FunctionRegistry({ defaultPriority: 5 });
  reg.register(fakeFunction("a"), { category: " Move ", keywords: [" Go ", "", "walk"] });
  reg.register(fakeFunction("b"), { category: "rest" });

  const meta = reg.metadataOf("a");
  assert.ok(meta);
  assert.equal(meta.category, "move");
  assert.deepEqual([...meta.keywords], ["go", "walk"]);
  assert.equal(meta.sequence, 0);
  assert.deepEqual([...reg.categories()].sort(), ["move", "rest"]);
  assert.equal(reg.get("b")?.name, "b");
  assert.equal(reg.get("zzz"), undefined);
});

test("[contract] absorb appends after existing entries and is all-or-nothing", () => {
  const main = new FunctionRegistry({ defaultPriority: 5 });
  main.register(fakeFunction("m1"), { category: "act" });

  const plugin = new FunctionRegistry({ defaultPriority: 5 });
  plugin.register(fakeFunction("p1"), { category: "act" });
  plugin.register(fakeFunction("p2"), { category: "act" });

  main.absorb(plugin);
  assert.deepEqual(names(main.query(intent("act"))), ["m1", "p1", "p2"]);
  assert.equal(main.metadataOf("p1")?.sequence, 1);
  assert.equal(main.metadataOf("p2")?.sequence, 2);

  const clash = new FunctionRegistry({ defaultPriority: 5 });
  clash.register(fakeFunction("fresh"), { category: "act" });
  clash.register(fakeFunction("m1"), { category: "act" });

  assert.throws(() => main.absorb(clash), DuplicateRegistrationError);
  assert.equal(main.get("fresh"), undefined);
  assert.equal(main.size, 3);
});
