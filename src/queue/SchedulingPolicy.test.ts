import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { SchedulingPolicy, isSchedulingPolicy, parsePolicy, selectIndex } from "./SchedulingPolicy";
import { TaskQueueError } from "./errors";

describe("SchedulingPolicy", () => {
  describe("selectIndex", () => {
    it("should pick the oldest task under FIFO", () => {
      assert.equal(selectIndex(3, SchedulingPolicy.FIFO), 0);
    });

    it("should pick the newest task under LIFO", () => {
      assert.equal(selectIndex(3, SchedulingPolicy.LIFO), 2);
    });

    it("should pick the only task under either policy", () => {
      assert.equal(selectIndex(1, SchedulingPolicy.FIFO), 0);
      assert.equal(selectIndex(1, SchedulingPolicy.LIFO), 0);
    });

    it("should return undefined for an empty queue", () => {
      assert.equal(selectIndex(0, SchedulingPolicy.FIFO), undefined);
      assert.equal(selectIndex(0, SchedulingPolicy.LIFO), undefined);
    });
  });

  describe("isSchedulingPolicy", () => {
    it("should accept FIFO and LIFO", () => {
      assert.equal(isSchedulingPolicy("FIFO"), true);
      assert.equal(isSchedulingPolicy("LIFO"), true);
    });

    it("should reject anything else", () => {
      assert.equal(isSchedulingPolicy("fifo"), false);
      assert.equal(isSchedulingPolicy("PRIORITY"), false);
      assert.equal(isSchedulingPolicy(undefined), false);
      assert.equal(isSchedulingPolicy(1), false);
    });
  });

  describe("parsePolicy", () => {
    it("should return a known policy unchanged", () => {
      assert.equal(parsePolicy("LIFO"), SchedulingPolicy.LIFO);
    });

    it("should throw INVALID_POLICY for unknown values", () => {
      assert.throws(
        () => parsePolicy("RANDOM"),
        (error: unknown) =>
          error instanceof TaskQueueError &&
          error.code === "INVALID_POLICY" &&
          error.message === "Unexpected scheduling policy: RANDOM (expected FIFO or LIFO)"
      );
    });
  });
});
