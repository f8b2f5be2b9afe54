import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Signal } from "./Signal";

describe("Signal", () => {
  describe("publish", () => {
    it("should invoke listeners in registration order", () => {
      const signal = new Signal<number>();
      const calls: string[] = [];

      signal.subscribe((value) => calls.push(`first:${value}`));
      signal.subscribe((value) => calls.push(`second:${value}`));

      const result = signal.publish(7);

      assert.deepEqual(calls, ["first:7", "second:7"]);
      assert.equal(result.handlerCount, 2);
      assert.equal(result.successCount, 2);
      assert.deepEqual(result.errors, []);
    });

    it("should isolate a throwing listener", () => {
      const signal = new Signal<string>();
      let reached = false;

      signal.subscribe(() => {
        throw new Error("listener failed");
      });
      signal.subscribe(() => {
        reached = true;
      });

      const result = signal.publish("x");

      assert.equal(reached, true);
      assert.equal(result.handlerCount, 2);
      assert.equal(result.successCount, 1);
      assert.equal(result.errors.length, 1);
      assert.equal(result.errors[0].message, "listener failed");
    });

    it("should wrap non-Error throws", () => {
      const signal = new Signal();
      signal.subscribe(() => {
        throw "plain string";
      });

      const result = signal.publish();

      assert.equal(result.errors[0].message, "plain string");
    });

    it("should not invoke listeners added during the same publish", () => {
      const signal = new Signal();
      let lateCalls = 0;

      signal.subscribe(() => {
        signal.subscribe(() => {
          lateCalls++;
        });
      });

      signal.publish();
      assert.equal(lateCalls, 0);
      assert.equal(signal.getSubscriberCount(), 2);
    });

    it("should skip a listener unsubscribed by an earlier one", () => {
      const signal = new Signal();
      let secondCalls = 0;

      signal.subscribe(() => second.unsubscribe());
      const second = signal.subscribe(() => {
        secondCalls++;
      });

      signal.publish();
      assert.equal(secondCalls, 0);
    });
  });

  describe("subscriptions", () => {
    it("should stop delivering after unsubscribe", () => {
      const signal = new Signal<number>();
      const seen: number[] = [];
      const subscription = signal.subscribe((value) => seen.push(value));

      signal.publish(1);
      assert.equal(subscription.isConnected(), true);

      subscription.unsubscribe();
      subscription.unsubscribe();
      signal.publish(2);

      assert.deepEqual(seen, [1]);
      assert.equal(subscription.isConnected(), false);
      assert.equal(signal.hasSubscribers(), false);
    });

    it("should remove once listeners after the first publish", () => {
      const signal = new Signal<number>();
      const seen: number[] = [];
      signal.once((value) => seen.push(value));

      signal.publish(1);
      signal.publish(2);

      assert.deepEqual(seen, [1]);
    });

    it("should invoke a once listener a single time on re-entrant publish", () => {
      const signal = new Signal<number>();
      const seen: number[] = [];

      signal.subscribe((value) => {
        if (value === 1) {
          signal.publish(2);
        }
      });
      signal.once((value) => seen.push(value));

      signal.publish(1);

      assert.deepEqual(seen, [2]);
    });

    it("should invoke each of many once listeners a single time", () => {
      const signal = new Signal<number>();
      const counts = new Array<number>(200).fill(0);
      const subscriptions = counts.map((_, i) => signal.once(() => counts[i]++));

      signal.publish(1);
      signal.publish(2);

      assert.ok(counts.every((count) => count === 1));
      assert.equal(signal.getSubscriberCount(), 0);
      assert.ok(subscriptions.every((subscription) => !subscription.isConnected()));
    });

    it("should drop every listener on clear", () => {
      const signal = new Signal();
      signal.subscribe(() => undefined);
      signal.subscribe(() => undefined);

      signal.clear();

      assert.equal(signal.getSubscriberCount(), 0);
    });
  });

  describe("wait", () => {
    it("should resolve with the next published value only", async () => {
      const signal = new Signal<number>();

      signal.publish(1);
      const waiting = signal.wait();
      signal.publish(2);
      signal.publish(3);

      assert.equal(await waiting, 2);
    });

    it("should register the waiter before returning", () => {
      const signal = new Signal();

      void signal.wait();

      assert.equal(signal.getSubscriberCount(), 1);
    });

    it("should reject with the abort reason and remove the waiter", async () => {
      const signal = new Signal();
      const controller = new AbortController();
      const waiting = signal.wait({ signal: controller.signal });

      controller.abort(new Error("stopped"));

      await assert.rejects(waiting, { message: "stopped" });
      assert.equal(signal.getSubscriberCount(), 0);
    });

    it("should reject immediately when already aborted", async () => {
      const signal = new Signal();
      const controller = new AbortController();
      controller.abort(new Error("too late"));

      await assert.rejects(signal.wait({ signal: controller.signal }), { message: "too late" });
      assert.equal(signal.getSubscriberCount(), 0);
    });
  });
});
