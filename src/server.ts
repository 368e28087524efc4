import Fastify, { FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { ulid } from 'ulid';
import { ZodError } from 'zod';
import { AppConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { AppError, errorResponse } from './errors.js';
import { msg } from './lib/error-messages.js';
import { JobBackend, InMemoryJobStore, createJobBackend } from './repositories/index.js';
import { AllowlistValidator, HostResolver, dnsResolver } from './security/allowlist.js';
import { FilterCache } from './cache/filter-cache.js';
import { FilterValues, FilterValuesService } from './filters/service.js';
import { ResultFileManager } from './results/file-manager.js';
import { UpstreamClient } from './upstream/client.js';
import { BatchWorker } from './worker/index.js';
import { BatchOrchestrator } from './orchestrator/index.js';
import { PeriodicTask } from './lib/periodic.js';
import { FilterValuesSchema, JobParamsSchema, SubmitBatchSchema } from './schemas/batch.js';
import type { FilterValuesRequest, JobParams, SubmitBatchRequest } from './schemas/batch.js';
import { validateBody, validateParams } from './middleware/validation.js';
import { RateLimiter, createRateLimitHandler } from './middleware/rate-limit.js';

export interface ServerDeps {
  logger: Logger;
  backend: JobBackend;
  resolveHost: HostResolver;
}

export async function createServer(config: AppConfig, deps: Partial<ServerDeps> = {}) {
  const logger = deps.logger ?? createLogger(config.logLevel);
  const { store, queue } = deps.backend ?? createJobBackend(config);

  const allowlist = new AllowlistValidator({
    baseUrl: config.upstream.baseUrl,
    defaultUrl: config.upstream.defaultUrl,
    entries: config.upstream.allowlist,
    resolveHost: deps.resolveHost ?? dnsResolver,
  });
  const upstream = new UpstreamClient({ timeoutMs: config.upstream.timeoutMs, logger: logger.child({ component: 'upstream' }) });
  const results = new ResultFileManager({ dir: config.batch.resultsDir, ttlSeconds: config.batch.resultsTtlSeconds });
  await results.init();

  const worker = new BatchWorker(
    { store, queue, upstream, results, logger },
    {
      workers: config.batch.workers,
      itemConcurrency: config.batch.itemConcurrency,
      pollIntervalMs: config.batch.pollIntervalMs,
      maxInlineBytes: config.batch.maxInlineBytes,
    },
  );
  const orchestrator = new BatchOrchestrator(
    { store, queue, allowlist, results, worker, logger },
    {
      maxItems: config.batch.maxItems,
      queueMaxSize: config.batch.queueMaxSize,
      maxRecords: config.batch.maxRecords,
    },
  );

  const filterCache = new FilterCache<FilterValues>({
    maxEntries: config.filters.cacheMaxEntries,
    ttlMs: config.filters.cacheTtlMs,
  });
  const filters = new FilterValuesService({ allowlist, upstream, cache: filterCache, logger }, config.filters.maxValuesPerField);

  const sweepLog = logger.child({ component: 'sweeper' });
  const tasks = [
    new PeriodicTask({
      name: 'result-sweep',
      intervalMs: config.batch.sweepIntervalMs,
      logger: sweepLog,
      run: async () => {
        const report = await results.sweep();
        if (report.removed > 0) sweepLog.info(report, 'expired result files removed');
      },
    }),
    new PeriodicTask({
      name: 'filter-cache-purge',
      intervalMs: config.batch.sweepIntervalMs,
      logger: sweepLog,
      run: () => filterCache.purgeExpired(),
    }),
  ];
  if (store instanceof InMemoryJobStore) {
    tasks.push(new PeriodicTask({
      name: 'job-purge',
      intervalMs: config.batch.sweepIntervalMs,
      logger: sweepLog,
      run: () => store.purgeExpired(),
    }));
  }

  const rateLimit = createRateLimitHandler(
    new RateLimiter({ burst: config.rateLimit.burst, sustainedPerMin: config.rateLimit.sustainedPerMin }),
    config.rateLimit.enabled,
  );

  const app = Fastify({
    logger,
    genReqId: () => ulid(),
  });

  // Security
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // CORS (dev-friendly)
  if (config.corsDev) {
    await app.register(cors, {
      origin: ['http://localhost:3000', 'http://localhost:5173'],
      credentials: true,
    });
  }

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler((error: FastifyError | AppError | ZodError, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'request failed');
      }
      reply.code(error.statusCode).send(error.toResponse());
      return;
    }

    if (error instanceof ZodError) {
      reply.code(400).send(errorResponse('BAD_INPUT', 'VALIDATION_ERROR', msg('BAD_INPUT_SCHEMA'), undefined, {
        issues: error.errors.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      }));
      return;
    }

    // Fastify's own 4xx errors (malformed JSON, unsupported media type, body too large)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      reply.code(error.statusCode).send(errorResponse('BAD_INPUT', error.code, error.message));
      return;
    }

    request.log.error({ err: error }, 'unhandled error');
    reply.code(500).send(errorResponse('INTERNAL', 'INTERNAL_ERROR', msg('INTERNAL_UNEXPECTED')));
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send(errorResponse('NOT_FOUND', 'ROUTE_NOT_FOUND', `Route ${request.method} ${request.url} not found`));
  });

  // Health endpoint with queue, worker and cache stats
  app.get('/health', async () => {
    return {
      ok: true,
      queueDepth: await orchestrator.queueDepth(),
      worker: worker.getStats(),
      store: { kind: store.kind },
      filterCache: filterCache.getStats(),
    };
  });

  // POST /batch - Submit a batch job
  app.post<{ Body: SubmitBatchRequest }>('/batch', {
    preHandler: [rateLimit, validateBody(SubmitBatchSchema)],
  }, async (request, reply) => {
    const accepted = await orchestrator.submit(request.body);
    reply.code(202).send(accepted);
  });

  // GET /batch/:jobId - Job status
  app.get<{ Params: JobParams }>('/batch/:jobId', {
    preHandler: [validateParams(JobParamsSchema)],
  }, async (request) => {
    return orchestrator.getStatus(request.params.jobId);
  });

  // GET /batch/:jobId/results - Items of a finished job
  app.get<{ Params: JobParams }>('/batch/:jobId/results', {
    preHandler: [validateParams(JobParamsSchema)],
  }, async (request) => {
    return orchestrator.getResults(request.params.jobId);
  });

  // POST /batch/:jobId/cancel - Cancel a job
  app.post<{ Params: JobParams }>('/batch/:jobId/cancel', {
    preHandler: [validateParams(JobParamsSchema)],
  }, async (request, reply) => {
    const outcome = await orchestrator.cancel(request.params.jobId);
    reply.code(202).send(outcome);
  });

  // DELETE /batch/:jobId - Remove a finished job and its result file
  app.delete<{ Params: JobParams }>('/batch/:jobId', {
    preHandler: [validateParams(JobParamsSchema)],
  }, async (request) => {
    return orchestrator.remove(request.params.jobId);
  });

  // POST /api/report/filters - Distinct values for filter drop-downs
  app.post<{ Body: FilterValuesRequest }>('/api/report/filters', {
    preHandler: [validateBody(FilterValuesSchema)],
  }, async (request) => {
    return filters.resolve(request.body);
  });

  app.addHook('onReady', async () => {
    await worker.start();
    for (const task of tasks) task.start();
  });

  app.addHook('onClose', async () => {
    await worker.stop();
    await Promise.all(tasks.map(task => task.stop()));
  });

  return app;
}
