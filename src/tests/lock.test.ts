import assert from "node:assert/strict";
import test from "node:test";

import { KeyedMutex } from "../core/store/lock";
import { sleep } from "../utils/timeout";

test("serializes work on one key in call order", async () => {
  const mutex = new KeyedMutex();
  const events: string[] = [];
  const job = (name: string, delay: number) =>
    mutex.run("s1", async () => {
      events.push(`${name}:start`);
      await sleep(delay);
      events.push(`${name}:end`);
    });

  await Promise.all([job("a", 20), job("b", 1), job("c", 5)]);
  assert.deepEqual(events, ["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  assert.equal(mutex.isLocked("s1"), false);
});

test("different keys run concurrently", async () => {
  const mutex = new KeyedMutex();
  const events: string[] = [];
  await Promise.all([
    mutex.run("x", async () => {
      events.push("x:start");
      await sleep(20);
      events.push("x:end");
    }),
    mutex.run("y", async () => {
      events.push("y:start");
      await sleep(1);
      events.push("y:end");
    })
  ]);
  assert.deepEqual(events, ["x:start", "y:start", "y:end", "x:end"]);
});

test("a failing holder releases the lock for the next waiter", async () => {
  const mutex = new KeyedMutex();
  const failed = mutex.run("k", async () => {
    throw new Error("boom");
  });
  const next = mutex.run("k", async () => "ran");
  await assert.rejects(failed, /boom/);
  assert.equal(await next, "ran");
});
