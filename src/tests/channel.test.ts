import { Channel } from "../channel.js";

describe("Channel", () => {
  test("delivers values in send order", async () => {
    const ch = new Channel<number>(4);
    await ch.send(1);
    await ch.send(2);
    await ch.send(3);
    expect(await ch.receive()).toBe(1);
    expect(await ch.receive()).toBe(2);
    expect(await ch.receive()).toBe(3);
  });

  test("receive waits for a later send", async () => {
    const ch = new Channel<string>(1);
    const pending = ch.receive();
    await ch.send("hello");
    await expect(pending).resolves.toBe("hello");
    expect(ch.size).toBe(0);
  });

  test("send blocks while the buffer is full", async () => {
    const ch = new Channel<number>(1);
    await ch.send(1);
    let admitted = false;
    const blocked = ch.send(2).then(() => {
      admitted = true;
    });
    await Promise.resolve();
    expect(admitted).toBe(false);
    expect(await ch.receive()).toBe(1);
    await blocked;
    expect(admitted).toBe(true);
    expect(await ch.receive()).toBe(2);
  });

  test("blocked senders are not stranded when receivers outpace them", async () => {
    const ch = new Channel<number>(1);
    await ch.send(0);
    const sends = [ch.send(1), ch.send(2), ch.send(3)];
    const got: number[] = [];
    for (let i = 0; i < 4; i++) got.push(await ch.receive());
    await Promise.all(sends);
    expect(got).toEqual([0, 1, 2, 3]);
  });

  test("each value reaches exactly one of many receivers", async () => {
    const ch = new Channel<number>(2);
    const receivers = Array.from({ length: 5 }, () => ch.receive());
    for (let i = 0; i < 5; i++) await ch.send(i);
    const got = await Promise.all(receivers);
    expect([...got].sort()).toEqual([0, 1, 2, 3, 4]);
  });

  test("rejects a capacity below one", () => {
    expect(() => new Channel(0)).toThrow(/at least 1/);
  });
});
