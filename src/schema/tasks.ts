// src/schema/tasks.ts
import { TASK_STATUSES } from '../types/index.js';

const taskResponse = {
  type: 'object',
  properties: {
    task_id: { type: 'integer' },
    title: { type: 'string' },
    description: { type: ['string', 'null'] },
    status: { type: 'string', enum: TASK_STATUSES },
    due_date: { type: ['string', 'null'] },
    created_at: { type: 'string' },
    updated_at: { type: 'string' }
  }
};

const taskParams = {
  type: 'object',
  properties: {
    task_id: { type: 'integer' }
  },
  required: ['task_id']
};

// Shape and type checks only; trimming and calendar checks live in the model
const taskFields = {
  title: { type: 'string' },
  description: { type: ['string', 'null'] },
  status: { type: 'string', enum: TASK_STATUSES },
  due_date: { type: ['string', 'null'] }
};

export const createTaskSchema = {
  body: {
    type: 'object',
    properties: taskFields,
    required: ['title']
  },
  response: {
    201: taskResponse
  }
};

export const listTasksSchema = {
  querystring: {
    type: 'object',
    properties: {
      skip: { type: 'integer', minimum: 0, default: 0 },
      limit: { type: 'integer', minimum: 1, maximum: 200, default: 100 }
    }
  },
  response: {
    200: {
      type: 'array',
      items: taskResponse
    }
  }
};

export const getTaskSchema = {
  params: taskParams,
  response: {
    200: taskResponse
  }
};

export const updateTaskSchema = {
  params: taskParams,
  body: {
    type: 'object',
    properties: taskFields
  },
  response: {
    200: taskResponse
  }
};

export const deleteTaskSchema = {
  params: taskParams
};

export const healthSchema = {
  response: {
    200: {
      type: 'object',
      properties: {
        status: { type: 'string' }
      }
    }
  }
};
