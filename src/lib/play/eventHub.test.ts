import { describe, expect, it } from "vitest";
import { EventHub } from "./eventHub";

type Message = { n: number };

describe("EventHub", () => {
  it("hands every message to every subscriber", async () => {
    const hub = new EventHub<Message>();
    const first = hub.subscribe();
    const second = hub.subscribe();

    expect(hub.publish({ n: 1 })).toBe(2);

    await expect(first.next()).resolves.toEqual({ n: 1 });
    await expect(second.next()).resolves.toEqual({ n: 1 });
  });

  it("delivers to a reader that is already waiting", async () => {
    const hub = new EventHub<Message>();
    const subscription = hub.subscribe();

    const pending = subscription.next();
    hub.publish({ n: 7 });

    await expect(pending).resolves.toEqual({ n: 7 });
  });

  it("drops the oldest unread message when a backlog is full", async () => {
    const hub = new EventHub<Message>(2);
    const slow = hub.subscribe();
    const fast = hub.subscribe();

    hub.publish({ n: 1 });
    await expect(fast.next()).resolves.toEqual({ n: 1 });
    hub.publish({ n: 2 });
    hub.publish({ n: 3 });

    expect(slow.dropped).toBe(1);
    expect(fast.dropped).toBe(0);
    await expect(slow.next()).resolves.toEqual({ n: 2 });
    await expect(slow.next()).resolves.toEqual({ n: 3 });
    await expect(fast.next()).resolves.toEqual({ n: 2 });
  });

  it("only sees messages published after subscribing", async () => {
    const hub = new EventHub<Message>();
    hub.publish({ n: 1 });

    const late = hub.subscribe();
    hub.publish({ n: 2 });

    await expect(late.next()).resolves.toEqual({ n: 2 });
  });

  it("resolves pending reads with null on close", async () => {
    const hub = new EventHub<Message>();
    const subscription = hub.subscribe();
    const pending = subscription.next();

    subscription.close();

    await expect(pending).resolves.toBeNull();
    expect(subscription.closed).toBe(true);
    expect(hub.subscriberCount).toBe(0);
    expect(hub.publish({ n: 1 })).toBe(0);
  });

  it("ends async iteration when the hub closes", async () => {
    const hub = new EventHub<Message>();
    const subscription = hub.subscribe();
    hub.publish({ n: 1 });
    hub.publish({ n: 2 });

    const seen: number[] = [];
    const reading = (async () => {
      for await (const message of subscription) {
        seen.push(message.n);
        if (message.n === 2) {
          hub.close();
        }
      }
    })();

    await reading;
    expect(seen).toEqual([1, 2]);
    expect(hub.subscriberCount).toBe(0);
  });

  it("rejects a capacity below one", () => {
    expect(() => new EventHub<Message>(0)).toThrow(RangeError);
  });
});
