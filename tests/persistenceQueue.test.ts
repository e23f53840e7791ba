import { describe, it, expect } from "vitest";

import { PersistenceQueue, type PersistenceQueueOptions } from "@app/persistence/PersistenceQueue";
import { InvalidInputError } from "@domain/errors";

import { deferred, noSleep } from "./helpers";

const FAILED_AT = "2026-06-01T00:00:00.000Z";

function createQueue(options: Partial<PersistenceQueueOptions> = {}) {
  const sleeps: number[] = [];
  const queue = new PersistenceQueue({
    maxAttempts: 3,
    backoffMs: [0, 200, 500],
    maxPending: 100,
    deadLetterCapacity: 10,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    now: () => new Date(FAILED_AT),
    ...options,
  });
  return { queue, sleeps };
}

describe("PersistenceQueue", () => {
  describe("ordering", () => {
    it("should run tasks for one key in submission order", async () => {
      const { queue } = createQueue();
      const log: string[] = [];

      for (let i = 1; i <= 3; i++) {
        queue.submit("a", async () => {
          await Promise.resolve();
          log.push(`a${i}`);
        });
        queue.submit("b", async () => {
          log.push(`b${i}`);
        });
      }
      await queue.onIdle();

      expect(log.filter((entry) => entry.startsWith("a"))).toEqual(["a1", "a2", "a3"]);
      expect(log.filter((entry) => entry.startsWith("b"))).toEqual(["b1", "b2", "b3"]);
      expect(queue.stats().completed).toBe(6);
    });

    it("should not hold one key behind another", async () => {
      const { queue } = createQueue();
      const gate = deferred();
      const otherDone = deferred();
      const log: string[] = [];

      queue.submit("a", async () => {
        await gate.promise;
        log.push("a");
      });
      queue.submit("b", async () => {
        log.push("b");
        otherDone.resolve();
      });

      await otherDone.promise;
      expect(log).toEqual(["b"]);

      gate.resolve();
      await queue.onIdle();
      expect(log).toEqual(["b", "a"]);
    });

    it("should resolve onIdle at once when nothing is queued", async () => {
      const { queue } = createQueue();

      await expect(queue.onIdle()).resolves.toBeUndefined();
    });
  });

  describe("retries", () => {
    it("should retry a failing task with backoff", async () => {
      const { queue, sleeps } = createQueue();
      let calls = 0;

      queue.submit("k", async () => {
        calls++;
        if (calls < 3) {
          throw new Error("transient");
        }
      });
      await queue.onIdle();

      expect(calls).toBe(3);
      expect(sleeps).toEqual([200, 500]);
      expect(queue.stats()).toEqual({
        pending: 0,
        running: 0,
        completed: 1,
        failed: 0,
        retried: 2,
        cancelled: 0,
        deadLettered: 0,
      });
    });

    it("should dead-letter a task that keeps failing", async () => {
      const { queue } = createQueue();

      queue.submit(
        "k",
        async () => {
          throw new Error("boom");
        },
        "turn.commit"
      );
      await queue.onIdle();

      expect(queue.deadLetters()).toEqual([
        {
          id: 1,
          key: "k",
          label: "turn.commit",
          reason: "failed",
          attempts: 3,
          error: "boom",
          at: FAILED_AT,
        },
      ]);
      expect(queue.stats().failed).toBe(1);
      expect(queue.stats().retried).toBe(2);
    });

    it("should not retry invalid input", async () => {
      const { queue, sleeps } = createQueue();
      let calls = 0;

      queue.submit("k", async () => {
        calls++;
        throw new InvalidInputError("bad turn");
      });
      await queue.onIdle();

      expect(calls).toBe(1);
      expect(sleeps).toEqual([]);
      expect(queue.deadLetters()[0]?.attempts).toBe(1);
    });

    it("should keep running later tasks after a failure", async () => {
      const { queue } = createQueue({ maxAttempts: 1 });
      const log: string[] = [];

      queue.submit("k", async () => {
        throw new Error("boom");
      });
      queue.submit("k", async () => {
        log.push("after");
      });
      await queue.onIdle();

      expect(log).toEqual(["after"]);
    });
  });

  describe("bounds", () => {
    it("should dead-letter submissions beyond maxPending", async () => {
      const { queue } = createQueue({ maxPending: 1 });
      const gate = deferred();

      queue.submit("a", () => gate.promise);
      queue.submit("a", async () => undefined);
      queue.submit("a", async () => undefined, "overflow");

      expect(queue.deadLetters()).toEqual([
        {
          id: 3,
          key: "a",
          label: "overflow",
          reason: "queue_full",
          attempts: 0,
          error: null,
          at: FAILED_AT,
        },
      ]);

      gate.resolve();
      await queue.onIdle();
      expect(queue.stats().completed).toBe(2);
    });

    it("should keep only the most recent dead letters", async () => {
      const { queue } = createQueue({ deadLetterCapacity: 2 });
      await queue.shutdown();

      for (let i = 0; i < 3; i++) {
        queue.submit("k", async () => undefined);
      }

      expect(queue.deadLetters().map((d) => d.id)).toEqual([2, 3]);
      expect(queue.stats().deadLettered).toBe(3);
    });
  });

  describe("cancel", () => {
    it("should drop queued tasks and let the running one finish", async () => {
      const { queue } = createQueue();
      const gate = deferred();
      const log: string[] = [];

      queue.submit("a", async () => {
        await gate.promise;
        log.push("running");
      });
      queue.submit("a", async () => {
        log.push("queued-1");
      });
      queue.submit("a", async () => {
        log.push("queued-2");
      });

      expect(queue.cancel("a")).toBe(2);

      gate.resolve();
      await queue.onIdle();

      expect(log).toEqual(["running"]);
      expect(queue.stats()).toMatchObject({ completed: 1, cancelled: 2, pending: 0 });
    });

    it("should stop retrying a cancelled task", async () => {
      const { queue } = createQueue();
      let calls = 0;

      queue.submit("a", async () => {
        calls++;
        queue.cancel("a");
        throw new Error("transient");
      });
      await queue.onIdle();

      expect(calls).toBe(1);
      expect(queue.stats()).toMatchObject({
        completed: 0,
        failed: 0,
        retried: 1,
        cancelled: 1,
        deadLettered: 0,
      });
    });

    it("should return 0 for a key with nothing queued", () => {
      const { queue } = createQueue();

      expect(queue.cancel("nothing")).toBe(0);
    });
  });

  describe("shutdown", () => {
    it("should finish queued work before resolving", async () => {
      const { queue } = createQueue({ sleep: noSleep });
      const gate = deferred();
      const log: string[] = [];

      queue.submit("a", async () => {
        await gate.promise;
        log.push("first");
      });
      queue.submit("a", async () => {
        log.push("second");
      });

      const stopping = queue.shutdown();
      gate.resolve();
      await stopping;

      expect(log).toEqual(["first", "second"]);
    });

    it("should cancel queued work when not draining", async () => {
      const { queue } = createQueue();
      const gate = deferred();
      const log: string[] = [];

      queue.submit("a", async () => {
        await gate.promise;
        log.push("first");
      });
      queue.submit("a", async () => {
        log.push("second");
      });

      const stopping = queue.shutdown({ drain: false });
      gate.resolve();
      await stopping;

      expect(log).toEqual(["first"]);
      expect(queue.stats().cancelled).toBe(1);
    });

    it("should dead-letter work submitted after shutdown", async () => {
      const { queue } = createQueue();
      await queue.shutdown();

      queue.submit("a", async () => undefined, "late");

      expect(queue.deadLetters()).toEqual([
        {
          id: 1,
          key: "a",
          label: "late",
          reason: "shutdown",
          attempts: 0,
          error: null,
          at: FAILED_AT,
        },
      ]);
    });
  });
});
