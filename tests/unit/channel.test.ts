/**
 * Unit tests for the async event channel.
 */

import { describe, it, expect } from "vitest";
import { Channel } from "../../src/tui/channel";

async function drain<T>(ch: Channel<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const v of ch) out.push(v);
  return out;
}

describe("Channel", () => {
  it("delivers values sent before the consumer starts, in order", async () => {
    const ch = new Channel<number>();
    ch.send(1);
    ch.send(2);
    ch.close();
    expect(await drain(ch)).toEqual([1, 2]);
  });

  it("wakes a waiting consumer", async () => {
    const ch = new Channel<string>();
    const next = ch.next();
    ch.send("key");
    expect(await next).toEqual({ value: "key", done: false });
  });

  it("ends waiting consumers on close", async () => {
    const ch = new Channel<string>();
    const next = ch.next();
    ch.close();
    expect(await next).toEqual({ value: undefined, done: true });
  });

  it("drops values sent after close", () => {
    const ch = new Channel<number>();
    ch.close();
    expect(ch.send(1)).toBe(false);
    expect(ch.isClosed).toBe(true);
  });

  it("interleaves producers through one consumer", async () => {
    const ch = new Channel<string>();
    const consumed = drain(ch);
    ch.send("key:down");
    await Promise.resolve();
    ch.send("fetch:done");
    ch.send("key:up");
    ch.close();
    expect(await consumed).toEqual(["key:down", "fetch:done", "key:up"]);
  });
});
