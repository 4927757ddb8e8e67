import { describe, expect, it } from "vitest";

import { QueueClosedError, createExecutionQueue } from "./queue";

const deferred = () => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};

// Lets p-queue start whatever it has scheduled.
const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("createExecutionQueue", () => {
  it("should run one job at a time in FIFO order", async () => {
    const queue = createExecutionQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run("first", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = queue.run("second", async () => {
      order.push("second");
      return 2;
    });

    await tick();
    expect(order).toEqual(["first:start"]);
    expect(queue.getStatus("first")).toBe("running");
    expect(queue.getStatus("second")).toBe("pending");
    expect(queue.getPendingCount()).toBe(2);

    gate.resolve();

    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("should forget jobs once they finish", async () => {
    const queue = createExecutionQueue();

    await queue.run("done", async () => "ok");

    expect(queue.getStatus("done")).toBeNull();
    expect(queue.getPendingCount()).toBe(0);
  });

  it("should propagate a failing job and keep going", async () => {
    const queue = createExecutionQueue();

    const failing = queue.run("failing", async () => {
      throw new Error("boom");
    });
    const next = queue.run("next", async () => "after");

    await expect(failing).rejects.toThrow("boom");
    expect(await next).toBe("after");
  });

  it("should drain queued jobs on close and refuse new ones", async () => {
    const queue = createExecutionQueue();
    const gate = deferred();
    let finished = false;

    const job = queue.run("slow", async () => {
      await gate.promise;
      finished = true;
    });
    const closing = queue.close();

    expect(queue.isClosed()).toBe(true);
    await expect(queue.run("late", async () => "never")).rejects.toThrow(QueueClosedError);

    gate.resolve();
    await closing;
    await job;

    expect(finished).toBe(true);
  });
});
