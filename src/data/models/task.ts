// src/data/models/task.ts
import { TASK_STATUSES } from '../../types/index.js';
import type { Field, Task, TaskCreate, TaskStatus, TaskUpdate } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { isCalendarDate, isRecord } from '../../utils/helpers.js';

export const TITLE_MAX_LENGTH = 255;

const absent = { present: false } as const;

const present = <T>(value: T): Field<T> => ({ present: true, value });

const isTaskStatus = (value: unknown): value is TaskStatus =>
    typeof value === 'string' && TASK_STATUSES.some(status => status === value);

// Field parsers

const parseTitle = (value: unknown): string => {
    if (typeof value !== 'string') {
        throw new ValidationError('title', 'must be a string');
    }
    const title = value.trim();
    // characters, not UTF-16 code units, as VARCHAR(255) counts them
    const length = [...title].length;
    if (length < 1) {
        throw new ValidationError('title', 'must not be empty');
    }
    if (length > TITLE_MAX_LENGTH) {
        throw new ValidationError('title', `must be at most ${TITLE_MAX_LENGTH} characters`);
    }
    return title;
};

const parseDescription = (value: unknown): string | null => {
    if (value === null || typeof value === 'string') return value;
    throw new ValidationError('description', 'must be a string or null');
};

const parseStatus = (value: unknown): TaskStatus => {
    if (isTaskStatus(value)) return value;
    throw new ValidationError('status', `must be one of ${TASK_STATUSES.join(', ')}`);
};

const parseDueDate = (value: unknown): string | null => {
    if (value === null) return null;
    if (typeof value === 'string' && isCalendarDate(value)) return value;
    throw new ValidationError('due_date', 'must be a calendar date (YYYY-MM-DD) or null');
};

const readField = <T>(
    body: Record<string, unknown>,
    key: string,
    parse: (value: unknown) => T
): Field<T> => (Object.prototype.hasOwnProperty.call(body, key) ? present(parse(body[key])) : absent);

/** Validates and normalizes a creation payload, applying defaults. */
export const parseTaskCreate = (input: unknown): TaskCreate => {
    if (!isRecord(input)) {
        throw new ValidationError('body', 'must be a JSON object');
    }
    if (input.title === undefined) {
        throw new ValidationError('title', 'is required');
    }

    return {
        title: parseTitle(input.title),
        description: input.description === undefined ? null : parseDescription(input.description),
        status: input.status === undefined ? 'pending' : parseStatus(input.status),
        due_date: input.due_date === undefined ? null : parseDueDate(input.due_date)
    };
};

/**
 * Validates an update payload. Keys left out of the body stay absent;
 * an explicit null on `description` or `due_date` clears the column.
 */
export const parseTaskUpdate = (input: unknown): TaskUpdate => {
    if (!isRecord(input)) {
        throw new ValidationError('body', 'must be a JSON object');
    }

    return {
        title: readField(input, 'title', parseTitle),
        description: readField(input, 'description', parseDescription),
        status: readField(input, 'status', parseStatus),
        due_date: readField(input, 'due_date', parseDueDate)
    };
};

export const hasChanges = (update: TaskUpdate): boolean =>
    update.title.present || update.description.present || update.status.present || update.due_date.present;

// Row mapping

const toTimestamp = (value: unknown, column: string): string => {
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'string') return new Date(value).toISOString();
    throw new Error(`Unexpected value in column ${column}`);
};

const toDateOnly = (value: unknown): string | null => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') return value.slice(0, 10);
    throw new Error('Unexpected value in column due_date');
};

/** Maps a `tasks` row to its JSON shape. Throws on a row that breaks the table's invariants. */
export const toTask = (row: Record<string, unknown>): Task => {
    const taskId = typeof row.task_id === 'string' ? Number(row.task_id) : row.task_id;
    if (typeof taskId !== 'number' || !Number.isInteger(taskId)) {
        throw new Error('Unexpected value in column task_id');
    }
    if (typeof row.title !== 'string') {
        throw new Error('Unexpected value in column title');
    }
    if (!isTaskStatus(row.status)) {
        throw new Error(`Unexpected value in column status: ${String(row.status)}`);
    }
    const description = row.description;
    if (description !== null && description !== undefined && typeof description !== 'string') {
        throw new Error('Unexpected value in column description');
    }

    return {
        task_id: taskId,
        title: row.title,
        description: description ?? null,
        status: row.status,
        due_date: toDateOnly(row.due_date),
        created_at: toTimestamp(row.created_at, 'created_at'),
        updated_at: toTimestamp(row.updated_at, 'updated_at')
    };
};
