/**
 * Input inbox
 *
 * Single-producer/single-consumer FIFO between input adapters and the poll.
 * Adapters (keypress handlers, sensor callbacks) only ever push; the poll
 * drains everything at the start of a cycle, so controller state is only
 * mutated from inside the poll.
 */

import type { RawInput } from './types';

export interface InputInbox {
  /**
   * Queue a raw input
   * @returns false if the inbox was full and the input was dropped
   */
  push(input: RawInput): boolean;
  /** Remove and return all queued inputs in arrival order */
  drain(): RawInput[];
  /** Number of queued inputs */
  size(): number;
}

/**
 * Create an input inbox
 * @param capacity - Maximum number of queued inputs before new ones are dropped
 */
export function createInputInbox(capacity: number): InputInbox {
  let queue: RawInput[] = [];

  return {
    push: function(input: RawInput): boolean {
      if (queue.length >= capacity) {
        return false;
      }
      queue.push(input);
      return true;
    },
    drain: function(): RawInput[] {
      const drained = queue;
      queue = [];
      return drained;
    },
    size: function(): number {
      return queue.length;
    },
  };
}
