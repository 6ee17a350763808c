// src/types/index.ts

// Task Types
export const TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];

export interface Task {
    task_id: number;
    title: string;
    description: string | null;
    status: TaskStatus;
    due_date: string | null; // 'YYYY-MM-DD'
    created_at: string;
    updated_at: string;
}

export interface TaskCreate {
    title: string;
    description: string | null;
    status: TaskStatus;
    due_date: string | null;
}

// A field of an update request: either supplied (possibly with null) or left out entirely
export type Field<T> =
    | { present: true; value: T }
    | { present: false };

export interface TaskUpdate {
    title: Field<string>;
    description: Field<string | null>;
    status: Field<TaskStatus>;
    due_date: Field<string | null>;
}

export type UpdatableColumn = keyof TaskUpdate;

export interface ListTasksOptions {
    skip: number;
    limit: number;
}

// Request Types
export interface TaskParams {
    task_id: number;
}

export interface ListTasksQuery {
    skip?: number;
    limit?: number;
}

// Database Types
export interface DatabaseHealth {
    status: 'connected' | 'disconnected' | 'error';
    database: string;
    host: string;
    port: number;
    totalCount?: number;
    idleCount?: number;
    waitingCount?: number;
}

// Config Types
export interface DatabaseConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    pool: {
        min: number;
        max: number;
    };
    statementTimeoutMs: number;
    connectionTimeoutMs: number;
    idleTimeoutMs: number;
}

export interface AppConfig {
    node_env: string;
    port: number;
    host: string;
    database: DatabaseConfig;
    logging: {
        level: string;
    };
    rateLimit: {
        max: number;
        window: number;
    };
    cors: {
        origins: string[];
    };
}

// API Types
export interface ErrorDetail {
    field: string;
    message: string;
}

export interface ErrorResponse {
    error: {
        message: string;
        statusCode: number;
        timestamp: string;
        details?: ErrorDetail[];
    };
}
