// src/app.ts
import Fastify from 'fastify';
import type { FastifyError, FastifyInstance, FastifyServerOptions } from 'fastify';
import fastifyHelmet from '@fastify/helmet';
import fastifyCors from '@fastify/cors';
import fastifyRateLimit from '@fastify/rate-limit';
import { Ajv } from 'ajv';
import type { SchemaObject } from 'ajv';
import { config } from './utils/config.js';
import { logger } from './utils/logger.js';
import { AppError, ValidationError } from './utils/errors.js';
import type { DatabaseManager } from './data/database/postgres.js';
import { TaskRepository } from './data/repositories/taskRepository.js';
import { healthSchema } from './schema/tasks.js';
import taskRoutes from './routes/taskRoutes.js';
import type { AppConfig, ErrorDetail, ErrorResponse } from './types/index.js';

// Declare types for decorators
declare module 'fastify' {
  interface FastifyInstance {
    database: DatabaseManager;
    taskRepository: TaskRepository;
  }
}

export interface BuildAppOptions {
  database: DatabaseManager;
  taskRepository?: TaskRepository;
  config?: AppConfig;
  logger?: FastifyServerOptions['logger'];
}

const defaultLoggerOptions = (appConfig: AppConfig): FastifyServerOptions['logger'] =>
  appConfig.node_env === 'development' ? {
    level: appConfig.logging.level,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      }
    }
  } : {
    level: appConfig.logging.level
  };

// Same options as Fastify's default validator. Bodies are not coerced, so a
// numeric or array title reaches validation as what the client sent.
const ajvOptions = { useDefaults: true, removeAdditional: true, allErrors: false } as const;
const bodyValidator = new Ajv({ ...ajvOptions, coerceTypes: false });
const requestValidator = new Ajv({ ...ajvOptions, coerceTypes: 'array' });

const errorBody = (statusCode: number, message: string, details?: ErrorDetail[]): ErrorResponse => ({
  error: {
    message,
    statusCode,
    timestamp: new Date().toISOString(),
    ...(details && { details })
  }
});

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const appConfig = options.config ?? config;

  const fastify = Fastify({
    logger: options.logger ?? defaultLoggerOptions(appConfig),
    ignoreTrailingSlash: true
  });

  fastify.setValidatorCompiler<SchemaObject>(({ schema, httpPart }) =>
    (httpPart === 'body' ? bodyValidator : requestValidator).compile(schema)
  );

  await fastify.register(fastifyHelmet);
  await fastify.register(fastifyCors, {
    origin: appConfig.node_env === 'development' ? true : appConfig.cors.origins,
    credentials: true
  });
  await fastify.register(fastifyRateLimit, {
    max: appConfig.rateLimit.max,
    timeWindow: appConfig.rateLimit.window
  });

  fastify.decorate('database', options.database);
  fastify.decorate('taskRepository', options.taskRepository ?? new TaskRepository());

  // Liveness only: never touches the database
  fastify.get('/health', { schema: healthSchema, config: { rateLimit: false } }, async () => ({ status: 'healthy' }));

  fastify.get('/health/database', { config: { rateLimit: false } }, async (request, reply) => {
    const health = await fastify.database.healthCheck();
    reply.code(health.status === 'connected' ? 200 : 503);
    return health;
  });

  await fastify.register(taskRoutes);

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.status(error.statusCode).send(errorBody(error.statusCode, error.message, error.details));
    }

    if (error.validation) {
      const context = error.validationContext ?? 'request';
      const details = error.validation.map(issue => {
        const missing = issue.params.missingProperty;
        return {
          field: issue.instancePath.replace(/^\//, '') || (typeof missing === 'string' ? missing : context),
          message: issue.message ?? 'is invalid'
        };
      });
      return reply.status(422).send(errorBody(422, error.message, details));
    }

    const statusCode = error instanceof AppError ? error.statusCode : (error.statusCode ?? 500);

    if (statusCode >= 500) {
      logger.error('Request error:', error);
      // AppError messages are written for clients; anything else may carry driver internals
      const message = error instanceof AppError ? error.message : 'Internal Server Error';
      return reply.status(statusCode).send(errorBody(statusCode, message));
    }

    return reply.status(statusCode).send(errorBody(statusCode, error.message));
  });

  return fastify;
}

export default buildApp;
