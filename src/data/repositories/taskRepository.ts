// src/data/repositories/taskRepository.ts
import { hasChanges, toTask } from '../models/task.js';
import type { DatabaseConnection } from '../database/postgres.js';
import { logger } from '../../utils/logger.js';
import { PersistenceError } from '../../utils/errors.js';
import type {
  ListTasksOptions,
  Task,
  TaskCreate,
  TaskUpdate,
  UpdatableColumn
} from '../../types/index.js';

export type Found<T> = { status: 'ok'; value: T };
export type Missing = { status: 'not_found' };
export type Failed = { status: 'failed'; error: PersistenceError };

export type Outcome<T> = Found<T> | Missing | Failed;

const ok = <T>(value: T): Found<T> => ({ status: 'ok', value });
const missing: Missing = { status: 'not_found' };
const failed = (message: string, cause: unknown): Failed => ({
  status: 'failed',
  error: new PersistenceError(message, cause)
});

// task_id is SERIAL (int4); ids outside it were never created
const INT4_MIN = -2147483648;
const INT4_MAX = 2147483647;

export const isStorableId = (taskId: number): boolean =>
  Number.isInteger(taskId) && taskId >= INT4_MIN && taskId <= INT4_MAX;

const TASK_COLUMNS = 'task_id, title, description, status, due_date, created_at, updated_at';

// Order matters: it fixes the placeholder numbering of generated UPDATEs
export const UPDATABLE_COLUMNS: readonly UpdatableColumn[] = ['title', 'description', 'status', 'due_date'];

export interface SqlStatement {
  text: string;
  values: unknown[];
}

/**
 * Builds an UPDATE touching only the fields present in `update`, plus `updated_at`.
 * Returns null when nothing is present.
 */
export const buildUpdateStatement = (taskId: number, update: TaskUpdate): SqlStatement | null => {
  const assignments: string[] = [];
  const values: unknown[] = [];

  for (const column of UPDATABLE_COLUMNS) {
    const field = update[column];
    if (!field.present) continue;
    values.push(field.value);
    assignments.push(`${column} = $${values.length}`);
  }

  if (assignments.length === 0) return null;

  values.push(taskId);
  return {
    text: `UPDATE tasks SET ${assignments.join(', ')}, updated_at = NOW() WHERE task_id = $${values.length}`,
    values
  };
};

/**
 * Persistence for the `tasks` table. Holds no state: every call works on the
 * connection it is handed. Storage exceptions stop here and come back as
 * `failed` outcomes with the driver error kept as the cause.
 */
export class TaskRepository {

  async create(connection: DatabaseConnection, payload: TaskCreate): Promise<Found<Task> | Failed> {
    let taskId: number;
    try {
      const result = await connection.query(
        `INSERT INTO tasks (title, description, status, due_date)
         VALUES ($1, $2, $3, $4)
         RETURNING task_id`,
        [payload.title, payload.description, payload.status, payload.due_date]
      );
      taskId = Number(result.rows[0]?.task_id);
    } catch (error) {
      logger.error('Error creating task:', error);
      return failed('Could not create task', error);
    }

    if (!Number.isInteger(taskId)) {
      logger.error('Task insert returned no task_id');
      return failed('Could not create task', new Error('INSERT returned no task_id'));
    }
    logger.info(`Task created with ID: ${taskId}`);

    const stored = await this.getOne(connection, taskId);
    if (stored.status === 'not_found') {
      logger.error(`Task ${taskId} missing right after insert`);
      return failed('Could not create task', new Error(`task ${taskId} not readable after insert`));
    }
    return stored;
  }

  async getOne(connection: DatabaseConnection, taskId: number): Promise<Outcome<Task>> {
    if (!isStorableId(taskId)) return missing;

    try {
      const result = await connection.query(
        `SELECT ${TASK_COLUMNS} FROM tasks WHERE task_id = $1`,
        [taskId]
      );
      const row = result.rows[0];
      return row ? ok(toTask(row)) : missing;
    } catch (error) {
      logger.error(`Error retrieving task ${taskId}:`, error);
      return failed(`Could not retrieve task ${taskId}`, error);
    }
  }

  async list(connection: DatabaseConnection, { skip, limit }: ListTasksOptions): Promise<Found<Task[]> | Failed> {
    try {
      const result = await connection.query(
        `SELECT ${TASK_COLUMNS} FROM tasks
         ORDER BY created_at DESC, task_id DESC
         LIMIT $1 OFFSET $2`,
        [limit, skip]
      );
      return ok(result.rows.map(toTask));
    } catch (error) {
      logger.error('Error retrieving tasks:', error);
      return failed('Could not retrieve tasks', error);
    }
  }

  /**
   * Changes only the supplied fields. The existence check and the write are
   * separate statements: if the row disappears in between, whatever is stored
   * afterwards is returned (last write wins).
   */
  async updatePartial(connection: DatabaseConnection, taskId: number, update: TaskUpdate): Promise<Outcome<Task>> {
    const existing = await this.getOne(connection, taskId);
    if (existing.status !== 'ok') return existing;

    const statement = hasChanges(update) ? buildUpdateStatement(taskId, update) : null;
    if (!statement) return existing;

    try {
      const result = await connection.query(statement.text, statement.values);
      if (result.rowCount === 0) {
        logger.warn(`Update attempted but no rows affected for task_id: ${taskId}`);
      } else {
        logger.info(`Task ${taskId} updated successfully.`);
      }
    } catch (error) {
      logger.error(`Error updating task ${taskId}:`, error);
      return failed(`Could not update task ${taskId}`, error);
    }

    return this.getOne(connection, taskId);
  }

  async delete(connection: DatabaseConnection, taskId: number): Promise<Outcome<number>> {
    if (!isStorableId(taskId)) return missing;

    try {
      const result = await connection.query('DELETE FROM tasks WHERE task_id = $1', [taskId]);
      if (result.rowCount === 1) {
        logger.info(`Task ${taskId} deleted successfully.`);
        return ok(taskId);
      }
      return missing;
    } catch (error) {
      logger.error(`Error deleting task ${taskId}:`, error);
      return failed(`Could not delete task ${taskId}`, error);
    }
  }
}
