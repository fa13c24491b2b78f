// packages/transcribe-backend/src/transport/live-updates.ts
//
// Live job updates pushed to clients:
// - GET /ws           duplex WebSocket; snapshot on connect, then every mutation.
// - GET /jobs/events  Server-Sent Events, optionally filtered by job id.
// Both channels are plain hub observers; a failed send drops the observer.
import type { FastifyInstance } from 'fastify';
import type { RawData } from 'ws';
import { z } from 'zod';

import { HEARTBEAT_ECHO, HEARTBEAT_TOKEN, type JobEventMessage } from '@media-scribe/contracts';

import { jobRecordToEventMessage } from '../application/job-dto.js';
import type { JobEvent, JobEventHub, JobEventObserver } from '../domain/job-events.js';
import type { JobRepository } from '../domain/job-repository.js';
import { createComponentLogger, type Logger } from '../infrastructure/logger.js';
import { resolveRoutePath } from './route-helpers.js';

const SOCKET_OPEN = 1;
const CLOSE_NORMAL = 1000;
const CLOSE_INTERNAL_ERROR = 1011;

/** The part of a WebSocket a live session needs. */
export interface LiveChannel {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export interface LiveSessionDeps {
  hub: JobEventHub;
  repository: Pick<JobRepository, 'listJobs'>;
  logger?: Logger;
  now?: () => number;
}

let sessionCounter = 0;

export class LiveSocketSession implements JobEventObserver {
  readonly id: string;
  private readonly channel: LiveChannel;
  private readonly deps: LiveSessionDeps;
  private readonly log: Logger;
  private readonly now: () => number;
  private lastActivityAt: number;
  private idleReported = false;
  private closed = false;

  constructor(channel: LiveChannel, deps: LiveSessionDeps) {
    sessionCounter += 1;
    this.id = `ws-${sessionCounter}`;
    this.channel = channel;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.log = createComponentLogger('live-updates', deps.logger).child({
      observerId: this.id,
    });
    this.lastActivityAt = this.now();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Send the current snapshot of every job, then subscribe to mutations. */
  open(): void {
    for (const job of this.deps.repository.listJobs()) {
      void this.sendMessage(jobRecordToEventMessage('job_state_changed', job)).catch(
        (error: unknown) => {
          this.close('snapshot_send_failed', error);
        },
      );
    }
    this.deps.hub.register(this);
    this.log.info('Live client connected', { event: 'live_ws_connected' });
  }

  /** A failed send closes the session and the socket; the rejection reaches the hub. */
  async deliver(event: JobEvent): Promise<void> {
    try {
      await this.sendMessage(jobRecordToEventMessage(event.type, event.job));
    } catch (error) {
      this.close('delivery_failed', error);
      throw error;
    }
  }

  /**
   * Handle one inbound frame. `null` stands for a binary frame.
   * Only the heartbeat token is answered; everything else is ignored.
   */
  handleMessage(text: string | null): void {
    if (this.closed) return;
    this.lastActivityAt = this.now();
    this.idleReported = false;

    if (text !== null && text.trim() === HEARTBEAT_TOKEN) {
      void this.sendRaw(HEARTBEAT_ECHO).catch((error: unknown) => {
        this.close('heartbeat_send_failed', error);
      });
      return;
    }

    this.log.debug('Ignoring inbound live message', {
      event: 'live_ws_message_ignored',
      binary: text === null,
    });
  }

  /** Reports idleness once per silent period; never closes the session. */
  checkIdle(idleTimeoutMs: number): boolean {
    const silentFor = this.now() - this.lastActivityAt;
    if (silentFor <= idleTimeoutMs) return false;
    if (!this.idleReported) {
      this.idleReported = true;
      this.log.info('Live client idle', { event: 'live_ws_idle', silentForMs: silentFor });
    }
    return true;
  }

  close(reason: string, error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.deps.hub.unregister(this);
    if (this.channel.readyState === SOCKET_OPEN) {
      this.channel.close(error === undefined ? CLOSE_NORMAL : CLOSE_INTERNAL_ERROR, reason);
    }
    this.log.info('Live client disconnected', {
      event: 'live_ws_disconnected',
      reason,
      error: error === undefined ? undefined : error instanceof Error ? error.message : String(error),
    });
  }

  private sendMessage(message: JobEventMessage): Promise<void> {
    return this.sendRaw(JSON.stringify(message));
  }

  private sendRaw(data: string): Promise<void> {
    if (this.closed || this.channel.readyState !== SOCKET_OPEN) {
      return Promise.reject(new Error(`Live channel ${this.id} is not open`));
    }
    return new Promise<void>((resolve, reject) => {
      this.channel.send(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

export function rawDataToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function formatSseEvent(message: JobEventMessage): string {
  return `event: ${message.type}\ndata: ${JSON.stringify(message)}\n\n`;
}

let sseCounter = 0;

export function createSseObserver(write: (chunk: string) => void): JobEventObserver {
  sseCounter += 1;
  return {
    id: `sse-${sseCounter}`,
    deliver(event) {
      write(formatSseEvent(jobRecordToEventMessage(event.type, event.job)));
    },
  };
}

const sseQuerySchema = z.object({
  jobId: z.string().optional(),
});

/**
 * `jobId=<id>[,id2]` selects jobs, `jobId=*` (or `all`) selects every job.
 * Returns null when no usable selector was given.
 */
export function parseSseJobFilter(
  raw: string | undefined,
): { all: boolean; jobIds: string[] } | null {
  const ids =
    raw
      ?.split(',')
      .map((id) => id.trim())
      .filter(Boolean) ?? [];
  if (ids.length === 0) return null;
  const all = ids.includes('*') || ids.includes('all');
  return { all, jobIds: all ? [] : ids };
}

export interface LiveUpdateRouteOptions {
  hub: JobEventHub;
  repository: Pick<JobRepository, 'listJobs'>;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
}

// registerLiveUpdateRoutes.declaration()
export function registerLiveUpdateRoutes(
  app: FastifyInstance,
  options: LiveUpdateRouteOptions,
): void {
  const { hub, repository, heartbeatIntervalMs, idleTimeoutMs } = options;
  const sessions = new Set<LiveSocketSession>();
  const sseStreams = new Set<() => void>();
  const sseLog = createComponentLogger('live-updates');

  const idleSweep = setInterval(() => {
    for (const session of sessions) session.checkIdle(idleTimeoutMs);
  }, Math.max(Math.min(heartbeatIntervalMs, idleTimeoutMs), 1_000));
  idleSweep.unref();

  app.addHook('onClose', async () => {
    clearInterval(idleSweep);
    for (const session of sessions) session.close('server_closing');
    sessions.clear();
    for (const endStream of [...sseStreams]) endStream();
  });

  app.get('/ws', { websocket: true }, (socket) => {
    const session = new LiveSocketSession(socket, { hub, repository });
    sessions.add(session);

    const end = (reason: string, error?: unknown) => {
      sessions.delete(session);
      session.close(reason, error);
    };

    socket.on('message', (data: RawData, isBinary: boolean) => {
      session.handleMessage(isBinary ? null : rawDataToText(data));
    });
    socket.on('close', () => end('closed'));
    socket.on('error', (error: Error) => end('error', error));

    session.open();
  });

  app.get('/jobs/events', (request, reply) => {
    const routePath = resolveRoutePath(request, 'GET /jobs/events');
    const { jobId } = sseQuerySchema.parse(request.query);
    const filter = parseSseJobFilter(jobId);

    if (!filter) {
      return reply.code(400).send({
        error: 'jobId query param is required (use jobId=<id>[,id2] or jobId=* for all events)',
      });
    }

    reply.raw.setHeader('Content-Type', 'text/event-stream');
    reply.raw.setHeader('Cache-Control', 'no-cache');
    reply.raw.setHeader('Connection', 'keep-alive');
    reply.raw.setHeader('X-Accel-Buffering', 'no');

    reply.raw.flushHeaders?.();
    reply.hijack();

    reply.raw.write(': connected\n\n');

    const observer = createSseObserver((chunk) => {
      reply.raw.write(chunk);
    });

    sseLog.info('SSE client connected', {
      event: 'job_events_sse_connected',
      route: routePath,
      client: request.ip,
      observerId: observer.id,
    });

    let closed = false;
    const heartbeat = setInterval(() => {
      if (closed) return;
      try {
        reply.raw.write(':\n\n');
      } catch (error) {
        sseLog.warn('Failed to write SSE heartbeat', {
          event: 'job_events_sse_heartbeat_failed',
          route: routePath,
          error: error instanceof Error ? error.message : String(error),
        });
        cleanup();
      }
    }, heartbeatIntervalMs);

    const unsubscribe = hub.register(observer, filter.all ? {} : { jobIds: filter.jobIds });

    const cleanup = () => {
      if (closed) return;
      closed = true;
      clearInterval(heartbeat);
      unsubscribe();
      sseStreams.delete(endStream);
      sseLog.info('SSE client disconnected', {
        event: 'job_events_sse_disconnected',
        route: routePath,
        client: request.ip,
      });
    };

    const endStream = () => {
      cleanup();
      reply.raw.end();
    };
    sseStreams.add(endStream);

    request.raw.on('close', cleanup);
    request.raw.on('error', cleanup);
  });
}
