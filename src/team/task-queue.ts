import type { Task } from "./types.js";

/** Anything that can say whether it takes a given task. */
export type TaskFilter = { accepts(task: Pick<Task, "assignTo">): boolean };

/**
 * FIFO backlog of pending tasks. Never blocks: `next` returns undefined
 * when nothing (eligible) is left.
 */
export class TaskQueue {
  private items: Task[] = [];

  enqueue(task: Task): void {
    this.items.push(task);
  }

  /** Oldest task, or with a worker, the oldest task that worker accepts. */
  next(worker?: TaskFilter): Task | undefined {
    const idx = worker ? this.items.findIndex((t) => worker.accepts(t)) : 0;
    if (idx < 0 || idx >= this.items.length) return undefined;
    const [task] = this.items.splice(idx, 1);
    return task;
  }

  peek(): Task | undefined {
    return this.items[0];
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Remove and return everything, oldest first. */
  drain(): Task[] {
    const all = this.items;
    this.items = [];
    return all;
  }

  pending(): Task[] {
    return [...this.items];
  }
}
