import { describe, expect, it } from "vitest";
import { TaskQueue } from "./task-queue";

describe("TaskQueue", () => {
  it("hands out items in FIFO order", async () => {
    const queue = new TaskQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBe(2);
    expect(queue.size).toBe(0);
  });

  it("wakes a waiting consumer when an item arrives", async () => {
    const queue = new TaskQueue<string>();
    const pending = queue.take();

    queue.push("late");

    expect(await pending).toBe("late");
  });

  it("drains remaining items after close, then returns undefined", async () => {
    const queue = new TaskQueue<number>();
    queue.push(7);
    queue.close();

    expect(queue.push(8)).toBe(false);
    expect(await queue.take()).toBe(7);
    expect(await queue.take()).toBeUndefined();
  });

  it("releases every waiter on close", async () => {
    const queue = new TaskQueue<number>();
    const waiters = [queue.take(), queue.take(), queue.take()];

    queue.close();

    expect(await Promise.all(waiters)).toEqual([undefined, undefined, undefined]);
  });

  it("abandon discards undelivered items", async () => {
    const queue = new TaskQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.abandon()).toEqual([1, 2]);
    expect(await queue.take()).toBeUndefined();
    expect(queue.isClosed).toBe(true);
  });
});
