import type { AudioCommand, DrawCommand } from "@kinetica/contracts";

/**
 * Append-only per-frame command list.
 *
 * Readers get frozen copies, so handing commands to a consumer never shares
 * the buffer's own storage. A bounded buffer drops its oldest entries once
 * `capacity` is reached.
 */
export class CommandBuffer<T> {
  private items: T[] = [];
  readonly capacity: number;

  constructor(capacity = Number.POSITIVE_INFINITY) {
    this.capacity = capacity >= 1 ? Math.floor(capacity) : 1;
  }

  append(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  clear(): void {
    this.items.length = 0;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  get count(): number {
    return this.items.length;
  }

  /** Snapshot of the current contents. */
  get commands(): readonly T[] {
    return Object.freeze([...this.items]);
  }

  /** Returns the contents and empties the buffer. */
  drain(): readonly T[] {
    const drained = this.items;
    this.items = [];
    return Object.freeze(drained);
  }
}

export type DrawCommandBuffer = CommandBuffer<DrawCommand>;
export type AudioCommandBuffer = CommandBuffer<AudioCommand>;
