import { describe, expect, it } from "vitest";
import { Channel, ChannelClosedError } from "./channel";

async function collect<T>(channel: Channel<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of channel) values.push(value);
  return values;
}

describe("Channel", () => {
  it("delivers values in send order and ends after close", async () => {
    const channel = new Channel<number>(2);
    const consumed = collect(channel);

    for (const n of [1, 2, 3, 4, 5]) {
      await channel.send(n);
    }
    channel.close();

    expect(await consumed).toEqual([1, 2, 3, 4, 5]);
  });

  it("holds an unbuffered send until the value is received", async () => {
    const channel = new Channel<string>();
    let delivered = false;
    const sending = channel.send("a").then(() => {
      delivered = true;
    });

    await Promise.resolve();
    expect(delivered).toBe(false);

    expect(await channel.receive()).toEqual({ value: "a", done: false });
    await sending;
    expect(delivered).toBe(true);
  });

  it("waits on send once the buffer is full", async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);

    let second = false;
    const sending = channel.send(2).then(() => {
      second = true;
    });
    await Promise.resolve();
    expect(second).toBe(false);

    expect((await channel.receive()).value).toBe(1);
    await sending;
    expect(second).toBe(true);
    expect((await channel.receive()).value).toBe(2);
  });

  it("drains buffered values after close before reporting done", async () => {
    const channel = new Channel<number>(3);
    await channel.send(7);
    await channel.send(8);
    channel.close();

    expect(await channel.receive()).toEqual({ value: 7, done: false });
    expect(await channel.receive()).toEqual({ value: 8, done: false });
    expect(await channel.receive()).toEqual({ value: undefined, done: true });
  });

  it("wakes a waiting receiver on close", async () => {
    const channel = new Channel<number>();
    const pending = channel.receive();
    channel.close();

    expect(await pending).toEqual({ value: undefined, done: true });
    expect(channel.isClosed).toBe(true);
  });

  it("rejects sends after close", async () => {
    const channel = new Channel<number>();
    channel.close();

    await expect(channel.send(1)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it("drain releases a blocked producer and counts what it discards", async () => {
    const channel = new Channel<number>();
    const producing = (async () => {
      for (const n of [1, 2, 3]) await channel.send(n);
      channel.close();
    })();

    expect(await channel.drain()).toBe(3);
    await producing;
  });

  it("rejects a negative capacity", () => {
    expect(() => new Channel<number>(-1)).toThrow(RangeError);
  });
});
