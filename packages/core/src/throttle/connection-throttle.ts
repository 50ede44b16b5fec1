import { availableParallelism } from 'node:os';
import { RequestCancelledError } from '../errors/http-requestor-error.js';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

let sharedThrottle: ConnectionThrottle | undefined;

/**
 * Counting gate bounding how many request attempts are in flight at once.
 *
 * One instance is meant to be shared by every requestor in the process (see
 * {@link ConnectionThrottle.shared}) so that the total fan-out towards the
 * server stays bounded no matter how many clients exist.
 */
export class ConnectionThrottle {
  readonly capacity: number;
  private available: number;
  private readonly waiters: Array<Waiter> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Connection throttle capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.capacity = capacity;
    this.available = capacity;
  }

  /**
   * The process-wide throttle, sized to the machine's available parallelism.
   * Created on first use.
   */
  static shared(): ConnectionThrottle {
    if (!sharedThrottle) {
      sharedThrottle = new ConnectionThrottle(availableParallelism());
    }
    return sharedThrottle;
  }

  get availableCount(): number {
    return this.available;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  /**
   * Take a slot, waiting in FIFO order when none is free.
   *
   * Rejects with a `RequestCancelledError` if `signal` is aborted before a
   * slot is granted; a cancelled waiter never holds a slot.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError());
    }

    if (this.available > 0 && this.waiters.length === 0) {
      this.available--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new RequestCancelledError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiters.push(waiter);
    });
  }

  /**
   * Return a slot. The slot goes straight to the oldest waiter, if any.
   * Never throws; releasing more than was acquired is ignored.
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      next.resolve();
      return;
    }

    if (this.available < this.capacity) {
      this.available++;
    }
  }
}
