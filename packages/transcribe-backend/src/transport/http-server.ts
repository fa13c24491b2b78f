// packages/transcribe-backend/src/transport/http-server.ts
//
// Fastify HTTP server exposing the transcription API:
// - POST /jobs                    -> upload a media file and queue a job
// - GET  /jobs, /jobs/:id         -> job status
// - GET  /jobs/:id/transcript     -> download the finished transcript
// - GET  /ws, /jobs/events        -> live updates (WebSocket, SSE)
// - GET  /status, /health         -> service status
// Workers run in-process next to the HTTP server.
import { fileURLToPath } from 'node:url';

import multipart from '@fastify/multipart';
import websocket from '@fastify/websocket';
import Fastify, { type FastifyInstance } from 'fastify';

import { loadEnvFiles } from '@media-scribe/shared-infrastructure';

import { type TranscribeBackendConfig, loadConfig } from '../config/env.js';
import { logger } from '../infrastructure/logger.js';
import { type PipelineRuntime, createPipelineRuntime } from '../infrastructure/pipeline-runtime.js';
import { registerCoreRoutes } from './core-routes.js';
import { registerErrorHandler } from './error-handler.js';
import { registerLiveUpdateRoutes } from './live-updates.js';

let requestCounter = 0;

export async function createHttpServer(
  runtime: PipelineRuntime,
  config: TranscribeBackendConfig,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    genReqId: () => {
      requestCounter += 1;
      return `req_${Date.now()}_${requestCounter}`;
    },
  });

  registerErrorHandler(app);

  await app.register(multipart, {
    limits: {
      fileSize: config.upload.maxFileSize,
      files: 1,
    },
  });
  await app.register(websocket);

  registerCoreRoutes(app, { config, runtime });
  registerLiveUpdateRoutes(app, {
    hub: runtime.hub,
    repository: runtime.repository,
    heartbeatIntervalMs: config.liveUpdates.heartbeatIntervalMs,
    idleTimeoutMs: config.liveUpdates.idleTimeoutMs,
  });

  return app;
}

// startHttpServer.declaration()
export async function startHttpServer(): Promise<void> {
  const env = loadEnvFiles();
  if (env.loadedFiles.length > 0) {
    logger.info('Loaded environment files', { files: env.loadedFiles });
  }

  const config = loadConfig();
  const runtime = createPipelineRuntime(config);
  await runtime.start();
  const app = await createHttpServer(runtime, config);

  try {
    await app.listen({
      port: config.httpPort,
      host: config.httpHost,
    });
    logger.info('HTTP server listening', {
      event: 'http_server_started',
      host: config.httpHost,
      port: config.httpPort,
      workers: config.worker.concurrency,
      storageRoot: config.storage.root,
    });
  } catch (error: unknown) {
    logger.error(error instanceof Error ? error : String(error), {
      event: 'http_server_start_failed',
    });
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    logger.info(`Shutting down (${signal})`, { event: 'http_server_stopping' });
    try {
      await app.close();
      await runtime.shutdown();
      logger.info('Server stopped cleanly', { event: 'http_server_stopped' });
      process.exit(0);
    } catch (error) {
      logger.error(error instanceof Error ? error : String(error), {
        event: 'http_server_stop_failed',
      });
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  void startHttpServer().catch((error: unknown) => {
    logger.error(error instanceof Error ? error : String(error), {
      event: 'http_server_start_failed',
    });
    process.exit(1);
  });
}
