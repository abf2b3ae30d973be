/**
 * Reentrant mutex over a SharedArrayBuffer.
 *
 * The state lives in three Int32 slots so that any worker thread holding the
 * same buffer takes part in the protocol:
 *
 * | slot  | meaning                                      |
 * |-------|----------------------------------------------|
 * | LOCK  | 0 = free, 1 = held                           |
 * | OWNER | `threadId + 1` of the holder, 0 when free    |
 * | DEPTH | how many times the holder has entered        |
 *
 * Contenders spin on `Atomics.compareExchange` and park in `Atomics.wait`
 * between attempts. Releasing wakes one waiter.
 */

import { threadId } from "node:worker_threads";
import { DEV_MODE } from "../core/constants";
import type { CriticalSection } from "../core/grid/types";

export const LOCK_SLOT = 0;
const OWNER_SLOT = 1;
const DEPTH_SLOT = 2;
const STATE_SLOTS = 3;

const FREE = 0;
const HELD = 1;

export class Mutex implements CriticalSection {
  private readonly state: Int32Array;
  private readonly self = threadId + 1;

  /**
   * @param buffer - State of an existing mutex, to share it with this thread
   */
  constructor(
    readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(
      STATE_SLOTS * Int32Array.BYTES_PER_ELEMENT,
    ),
  ) {
    this.state = new Int32Array(buffer, 0, STATE_SLOTS);
  }

  get locked(): boolean {
    return Atomics.load(this.state, LOCK_SLOT) === HELD;
  }

  /** Whether the calling thread holds the lock */
  get heldByCurrentThread(): boolean {
    return (
      this.locked && Atomics.load(this.state, OWNER_SLOT) === this.self
    );
  }

  lock(): void {
    if (this.heldByCurrentThread) {
      Atomics.add(this.state, DEPTH_SLOT, 1);
      return;
    }

    while (
      Atomics.compareExchange(this.state, LOCK_SLOT, FREE, HELD) !== FREE
    ) {
      Atomics.wait(this.state, LOCK_SLOT, HELD);
    }
    Atomics.store(this.state, OWNER_SLOT, this.self);
    Atomics.store(this.state, DEPTH_SLOT, 1);
  }

  /**
   * Take the lock only if it is free or already held by this thread.
   */
  tryLock(): boolean {
    if (this.heldByCurrentThread) {
      Atomics.add(this.state, DEPTH_SLOT, 1);
      return true;
    }
    if (Atomics.compareExchange(this.state, LOCK_SLOT, FREE, HELD) !== FREE) {
      return false;
    }
    Atomics.store(this.state, OWNER_SLOT, this.self);
    Atomics.store(this.state, DEPTH_SLOT, 1);
    return true;
  }

  unlock(): void {
    if (!this.heldByCurrentThread) {
      if (DEV_MODE) {
        console.warn(
          `Mutex.unlock: thread ${threadId} does not hold the lock, ignoring`,
        );
      }
      return;
    }

    if (Atomics.sub(this.state, DEPTH_SLOT, 1) > 1) return;

    Atomics.store(this.state, OWNER_SLOT, 0);
    Atomics.store(this.state, LOCK_SLOT, FREE);
    Atomics.notify(this.state, LOCK_SLOT, 1);
  }

  run<R>(fn: () => R): R {
    this.lock();
    try {
      return fn();
    } finally {
      this.unlock();
    }
  }

  fork(): Mutex {
    return new Mutex();
  }
}
