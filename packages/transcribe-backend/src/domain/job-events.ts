// packages/transcribe-backend/src/domain/job-events.ts
//
// In-memory broadcast hub for job lifecycle updates.
// Every job mutation is published here and fanned out to the live observers
// (WebSocket clients, SSE streams). A failing observer is dropped; it never
// affects the publisher or the other observers.

import type { JobRecord } from './job-model.js';
import type { JobEventType } from '@media-scribe/contracts';
import type { Logger } from '../infrastructure/logger.js';

export type { JobEventType };

export interface JobEvent {
  type: JobEventType;
  job: JobRecord;
}

export interface JobEventObserver {
  /** Stable identifier used in logs. */
  readonly id: string;
  deliver(event: JobEvent): void | Promise<void>;
}

export type JobSubscriptionOptions = {
  /**
   * One or more job IDs to listen for. If omitted or empty, all jobs are delivered.
   */
  jobIds?: string[];
};

interface Registration {
  observer: JobEventObserver;
  jobIds: Set<string> | null;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export class JobEventHub {
  private readonly registrations = new Map<JobEventObserver, Registration>();
  private readonly logger: Logger;

  constructor(options: { logger: Logger }) {
    this.logger = options.logger.child({ component: 'job-event-hub' });
  }

  get size(): number {
    return this.registrations.size;
  }

  /**
   * Add an observer. Registering the same observer again replaces its filter.
   * Returns a disposer equivalent to `unregister(observer)`.
   */
  register(observer: JobEventObserver, options?: JobSubscriptionOptions): () => void {
    const jobIds =
      options?.jobIds && options.jobIds.length > 0 ? new Set(options.jobIds) : null;
    this.registrations.set(observer, { observer, jobIds });
    return () => {
      this.unregister(observer);
    };
  }

  /** Idempotent: returns false when the observer was not registered. */
  unregister(observer: JobEventObserver): boolean {
    return this.registrations.delete(observer);
  }

  // publish.declaration()
  publish(event: JobEvent): void {
    const snapshot = [...this.registrations.values()];

    for (const registration of snapshot) {
      // Removed by an earlier delivery in this same publish.
      if (this.registrations.get(registration.observer) !== registration) continue;
      if (registration.jobIds && !registration.jobIds.has(event.job.id)) continue;

      this.deliverTo(registration, event);
    }
  }

  private deliverTo(registration: Registration, event: JobEvent): void {
    let result: void | Promise<void>;
    try {
      result = registration.observer.deliver(event);
    } catch (error) {
      this.dropObserver(registration, event, error);
      return;
    }

    if (isPromiseLike(result)) {
      void result.then(undefined, (error: unknown) => {
        this.dropObserver(registration, event, error);
      });
    }
  }

  // Only the registration that failed is removed; a newer one for the same observer stays.
  private dropObserver(registration: Registration, event: JobEvent, error: unknown): void {
    const { observer } = registration;
    const removed = this.registrations.get(observer) === registration;
    if (removed) this.registrations.delete(observer);
    this.logger.warn('Dropping live update observer after failed delivery', {
      event: 'observer_delivery_failed',
      observerId: observer.id,
      jobId: event.job.id,
      eventType: event.type,
      removed,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
