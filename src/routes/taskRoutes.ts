// routes/taskRoutes.ts

import type { FastifyInstance } from 'fastify';
import { TaskController } from '../handler/taskHandlers.js';
import {
    createTaskSchema,
    deleteTaskSchema,
    getTaskSchema,
    listTasksSchema,
    updateTaskSchema
} from '../schema/tasks.js';
import type { ListTasksQuery, TaskParams } from '../types/index.js';

async function taskRoutes(fastify: FastifyInstance) {
    const taskController = new TaskController(fastify.database, fastify.taskRepository);

    // Bind methods to maintain proper 'this' context
    const createTask = taskController.createTask.bind(taskController);
    const listTasks = taskController.listTasks.bind(taskController);
    const getTask = taskController.getTask.bind(taskController);
    const updateTask = taskController.updateTask.bind(taskController);
    const deleteTask = taskController.deleteTask.bind(taskController);

    fastify.post<{ Body: unknown }>('/tasks/', { schema: createTaskSchema }, createTask);

    fastify.get<{ Querystring: ListTasksQuery }>('/tasks/', { schema: listTasksSchema }, listTasks);

    fastify.get<{ Params: TaskParams }>('/tasks/:task_id', { schema: getTaskSchema }, getTask);

    fastify.put<{ Params: TaskParams; Body: unknown }>('/tasks/:task_id', { schema: updateTaskSchema }, updateTask);

    fastify.delete<{ Params: TaskParams }>('/tasks/:task_id', { schema: deleteTaskSchema }, deleteTask);
}

export default taskRoutes;
