// packages/transcribe-backend/src/transport/core-routes.ts
//
// Job submission, status and transcript download routes.
import { randomUUID } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { rm, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { pipeline } from 'node:stream/promises';

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { ValidationError } from '@media-scribe/contracts';

import { getJobStatus, listJobStatuses } from '../application/get-job-status.js';
import { getResultArtifact } from '../application/get-transcript.js';
import { type SubmitJobResponse, submitJob } from '../application/submit-job.js';
import type { TranscribeBackendConfig } from '../config/env.js';
import { logger } from '../infrastructure/logger.js';
import type { PipelineRuntime } from '../infrastructure/pipeline-runtime.js';
import { attachmentDisposition, errorResponse, resolveRoutePath } from './route-helpers.js';

export interface CoreRouteOptions {
  config: TranscribeBackendConfig;
  runtime: PipelineRuntime;
}

const jobParamsSchema = z.object({
  jobId: z.string().min(1, 'jobId is required'),
});

export const UPLOAD_FIELD_NAME = 'file';

export function registerCoreRoutes(app: FastifyInstance, options: CoreRouteOptions): void {
  const { config, runtime } = options;
  const allowedExtensions = new Set(config.upload.allowedExtensions);

  app.post('/jobs', async (request, reply) => {
    const file = await request.file();
    if (!file) {
      throw new ValidationError(`Multipart field "${UPLOAD_FIELD_NAME}" is required`, 'file_required');
    }
    if (file.fieldname !== UPLOAD_FIELD_NAME) {
      file.file.resume();
      throw new ValidationError(
        `Unexpected multipart field "${file.fieldname}"; expected "${UPLOAD_FIELD_NAME}"`,
        'file_required',
      );
    }

    const originalName = file.filename.trim();
    const extension = extname(originalName).toLowerCase();
    if (!originalName || !allowedExtensions.has(extension)) {
      file.file.resume();
      throw new ValidationError(
        `Unsupported file type "${extension || originalName}". Allowed: ${[...allowedExtensions].join(', ')}`,
        'unsupported_file_type',
      );
    }

    const sourcePath = join(config.storage.uploadDir, `${randomUUID()}${extension}`);
    let fileSize: number;
    try {
      await pipeline(file.file, createWriteStream(sourcePath));
      fileSize = (await stat(sourcePath)).size;
    } catch (error) {
      await rm(sourcePath, { force: true });
      throw error;
    }

    let result: SubmitJobResponse;
    try {
      result = submitJob(runtime, { sourcePath, originalName, fileSize });
    } catch (error) {
      await rm(sourcePath, { force: true });
      throw error;
    }

    logger.info('HTTP request handled', {
      event: 'http_request',
      route: 'POST /jobs',
      statusCode: 202,
      jobId: result.jobId,
    });

    return reply.code(202).send(result);
  });

  app.get('/jobs', async (_request, reply) => {
    return reply.send(listJobStatuses(runtime));
  });

  async function handleJobStatusRequest(request: FastifyRequest, reply: FastifyReply) {
    const { jobId } = jobParamsSchema.parse(request.params);
    const routePath = resolveRoutePath(request, 'GET /jobs/:jobId');

    const status = getJobStatus(runtime, jobId);
    if (!status) {
      logger.info('HTTP request handled', {
        event: 'http_request',
        route: routePath,
        statusCode: 404,
        jobId,
      });

      return errorResponse(reply, 'not_found');
    }

    logger.debug('HTTP request handled', {
      event: 'http_request',
      route: routePath,
      statusCode: 200,
      jobId,
      jobState: status.state,
    });

    return reply.send(status);
  }

  app.get('/jobs/:jobId', handleJobStatusRequest);
  app.get('/jobs/:jobId/status', handleJobStatusRequest);

  app.get('/jobs/:jobId/transcript', async (request, reply) => {
    const { jobId } = jobParamsSchema.parse(request.params);
    const artifact = await getResultArtifact(runtime, jobId);

    if (artifact.status === 'not_found') {
      return errorResponse(reply, 'not_found');
    }
    if (artifact.status === 'not_ready') {
      return errorResponse(reply, 'not_ready', { state: artifact.state });
    }

    logger.info('HTTP request handled', {
      event: 'http_request',
      route: 'GET /jobs/:jobId/transcript',
      statusCode: 200,
      jobId,
    });

    return reply
      .header('Content-Type', 'text/plain; charset=utf-8')
      .header('Content-Disposition', attachmentDisposition(artifact.fileName))
      .send(artifact.content);
  });

  app.get('/status', async (_request, reply) => {
    return reply.send(runtime.status());
  });

  app.get('/health', async (_request, reply) => {
    return reply.send({ ok: true });
  });
}
