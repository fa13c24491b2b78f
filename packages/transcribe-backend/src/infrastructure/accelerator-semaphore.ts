// packages/transcribe-backend/src/infrastructure/accelerator-semaphore.ts
// In-process semaphore guarding the speech-recognition accelerator.
// - Fixed number of slots (one GPU by default).
// - Blocking acquire is FIFO; tryAcquire never waits.
// - Slots are keyed by operation id so a double release is harmless.
import type { ComputeDevice, DevicePreference } from '../domain/media-tools.js';
import { logger } from './logger.js';

interface Waiter {
  operationId: string;
  resolve: () => void;
}

export class AcceleratorSemaphore {
  private readonly maxConcurrent: number;
  private readonly holders = new Set<string>();
  private readonly waiters: Waiter[] = [];

  constructor(maxConcurrent = 1) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer (got ${maxConcurrent})`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  /**
   * Take a slot only if one is free right now.
   */
  tryAcquire(operationId: string): boolean {
    if (this.holders.has(operationId)) return true;
    if (this.holders.size >= this.maxConcurrent) return false;
    this.holders.add(operationId);
    logger.debug('Accelerator slot acquired', {
      operationId,
      active: this.holders.size,
      max: this.maxConcurrent,
    });
    return true;
  }

  /**
   * Acquire a slot, waiting behind earlier callers until one is free.
   */
  async acquire(operationId: string): Promise<void> {
    if (this.waiters.length === 0 && this.tryAcquire(operationId)) return;

    const startTime = Date.now();
    await new Promise<void>((resolve) => {
      this.waiters.push({ operationId, resolve });
    });
    logger.debug('Accelerator slot acquired after wait', {
      operationId,
      waitMs: Date.now() - startTime,
    });
  }

  /**
   * Release a slot and hand it to the oldest waiter, if any.
   */
  release(operationId: string): void {
    if (!this.holders.delete(operationId)) return;

    const next = this.waiters.shift();
    if (next) {
      this.holders.add(next.operationId);
      next.resolve();
    }

    logger.debug('Accelerator slot released', {
      operationId,
      notified: next?.operationId ?? null,
    });
  }

  getStats(): { active: number; queued: number; max: number } {
    return {
      active: this.holders.size,
      queued: this.waiters.length,
      max: this.maxConcurrent,
    };
  }
}

export interface ComputeDeviceLease {
  device: ComputeDevice;
  release(): void;
}

/**
 * Resolve the device for one recognition run.
 * - `cpu` never touches the accelerator.
 * - `gpu` waits for the accelerator.
 * - `auto` takes it only when free, otherwise falls back to CPU.
 */
export async function acquireComputeDevice(
  semaphore: AcceleratorSemaphore,
  preference: DevicePreference,
  operationId: string,
): Promise<ComputeDeviceLease> {
  const cpuLease: ComputeDeviceLease = { device: 'cpu', release: () => undefined };

  if (preference === 'cpu') return cpuLease;

  if (preference === 'gpu') {
    await semaphore.acquire(operationId);
  } else if (!semaphore.tryAcquire(operationId)) {
    return cpuLease;
  }

  let released = false;
  return {
    device: 'gpu',
    release: () => {
      if (released) return;
      released = true;
      semaphore.release(operationId);
    },
  };
}
