import { describe, expect, it } from "vitest";

import { BoundedChannel } from "./channel.js";

describe("BoundedChannel", () => {
  it("delivers messages in order", async () => {
    const channel = new BoundedChannel<number>(4);
    await channel.send(1);
    await channel.send(2);
    channel.close();

    const received: number[] = [];
    for await (const value of channel) {
      received.push(value);
    }
    expect(received).toEqual([1, 2]);
  });

  it("blocks the producer while the buffer is full", async () => {
    const channel = new BoundedChannel<string>(1);
    expect(await channel.send("a")).toBe(true);

    let settled = false;
    const blocked = channel.send("b").then((accepted) => {
      settled = true;
      return accepted;
    });
    await Promise.resolve();
    expect(settled).toBe(false);
    expect(channel.waitingSenders).toBe(1);

    expect(await channel.receive()).toEqual({ value: "a", done: false });
    expect(await blocked).toBe(true);
    expect(channel.buffered).toBe(1);
  });

  it("hands a message straight to a waiting receiver", async () => {
    const channel = new BoundedChannel<number>(1);
    const pending = channel.receive();
    await channel.send(7);
    expect(await pending).toEqual({ value: 7, done: false });
    expect(channel.buffered).toBe(0);
  });

  it("releases a blocked producer with false when the consumer cancels", async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);

    channel.cancel();

    expect(await blocked).toBe(false);
    expect(await channel.send(3)).toBe(false);
    expect(await channel.receive()).toEqual({ value: undefined, done: true });
  });

  it("lets buffered messages drain after close", async () => {
    const channel = new BoundedChannel<number>(2);
    await channel.send(1);
    channel.close();

    expect(await channel.send(2)).toBe(false);
    expect(await channel.receive()).toEqual({ value: 1, done: false });
    expect(await channel.receive()).toEqual({ value: undefined, done: true });
  });
});
