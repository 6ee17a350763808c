import { describe, it, expect } from 'vitest';
import { hasChanges, parseTaskCreate, parseTaskUpdate, toTask } from '../../../src/data/models/task.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('parseTaskCreate', () => {
  it('applies defaults to the optional fields', () => {
    expect(parseTaskCreate({ title: 'Write report' })).toEqual({
      title: 'Write report',
      description: null,
      status: 'pending',
      due_date: null,
    });
  });

  it('keeps supplied values', () => {
    expect(parseTaskCreate({
      title: 'Book flights',
      description: 'Window seat',
      status: 'in_progress',
      due_date: '2026-12-24',
    })).toEqual({
      title: 'Book flights',
      description: 'Window seat',
      status: 'in_progress',
      due_date: '2026-12-24',
    });
  });

  it('trims the title', () => {
    expect(parseTaskCreate({ title: '  Plan trip  ' }).title).toBe('Plan trip');
  });

  it('accepts titles of length 1 and 255', () => {
    expect(parseTaskCreate({ title: 'a' }).title).toBe('a');
    expect(parseTaskCreate({ title: 'b'.repeat(255) }).title).toHaveLength(255);
  });

  it('rejects titles of length 0 and 256', () => {
    expect(() => parseTaskCreate({ title: '' })).toThrow(ValidationError);
    expect(() => parseTaskCreate({ title: 'b'.repeat(256) })).toThrow('Invalid title: must be at most 255 characters');
  });

  it('counts title length in characters rather than UTF-16 units', () => {
    expect(parseTaskCreate({ title: '😀'.repeat(255) }).title).toBe('😀'.repeat(255));
    expect(() => parseTaskCreate({ title: '😀'.repeat(256) })).toThrow('Invalid title: must be at most 255 characters');
  });

  it('rejects a title made only of whitespace', () => {
    expect(() => parseTaskCreate({ title: '   ' })).toThrow('Invalid title: must not be empty');
  });

  it('requires a title', () => {
    let caught: unknown;
    try {
      parseTaskCreate({ description: 'no title' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.statusCode).toBe(422);
      expect(caught.details).toEqual([{ field: 'title', message: 'is required' }]);
    }
  });

  it('rejects an unknown status', () => {
    expect(() => parseTaskCreate({ title: 'x', status: 'done' }))
      .toThrow('Invalid status: must be one of pending, in_progress, completed');
  });

  it('rejects dates that are not on the calendar', () => {
    expect(() => parseTaskCreate({ title: 'x', due_date: '2026-02-30' })).toThrow(ValidationError);
    expect(() => parseTaskCreate({ title: 'x', due_date: '24/12/2026' })).toThrow(ValidationError);
    expect(parseTaskCreate({ title: 'x', due_date: '2028-02-29' }).due_date).toBe('2028-02-29');
  });

  it('accepts dates in the first century and rejects year zero', () => {
    expect(parseTaskCreate({ title: 'x', due_date: '0099-05-01' }).due_date).toBe('0099-05-01');
    expect(parseTaskCreate({ title: 'x', due_date: '0004-02-29' }).due_date).toBe('0004-02-29');
    expect(() => parseTaskCreate({ title: 'x', due_date: '0000-01-01' })).toThrow(ValidationError);
  });

  it('rejects a body that is not an object', () => {
    expect(() => parseTaskCreate(['title'])).toThrow('Invalid body: must be a JSON object');
    expect(() => parseTaskCreate(null)).toThrow(ValidationError);
  });
});

describe('parseTaskUpdate', () => {
  it('marks every field absent for an empty body', () => {
    const update = parseTaskUpdate({});

    expect(update).toEqual({
      title: { present: false },
      description: { present: false },
      status: { present: false },
      due_date: { present: false },
    });
    expect(hasChanges(update)).toBe(false);
  });

  it('tells an explicit null apart from an omitted key', () => {
    const update = parseTaskUpdate({ description: null });

    expect(update.description).toEqual({ present: true, value: null });
    expect(update.due_date).toEqual({ present: false });
    expect(hasChanges(update)).toBe(true);
  });

  it('validates supplied fields with the creation rules', () => {
    expect(parseTaskUpdate({ title: ' Renamed ', status: 'completed' })).toMatchObject({
      title: { present: true, value: 'Renamed' },
      status: { present: true, value: 'completed' },
    });
    expect(() => parseTaskUpdate({ title: '' })).toThrow(ValidationError);
    expect(() => parseTaskUpdate({ status: 'archived' })).toThrow(ValidationError);
    expect(() => parseTaskUpdate({ due_date: '2026-13-01' })).toThrow(ValidationError);
  });

  it('refuses to clear title or status', () => {
    expect(() => parseTaskUpdate({ title: null })).toThrow('Invalid title: must be a string');
    expect(() => parseTaskUpdate({ status: null })).toThrow(ValidationError);
  });
});

describe('toTask', () => {
  const row = {
    task_id: 7,
    title: 'Water plants',
    description: null,
    status: 'pending',
    due_date: '2026-11-02',
    created_at: new Date('2026-03-01T08:30:00.000Z'),
    updated_at: new Date('2026-03-02T09:00:00.000Z'),
  };

  it('maps a stored row to the JSON shape', () => {
    expect(toTask(row)).toEqual({
      task_id: 7,
      title: 'Water plants',
      description: null,
      status: 'pending',
      due_date: '2026-11-02',
      created_at: '2026-03-01T08:30:00.000Z',
      updated_at: '2026-03-02T09:00:00.000Z',
    });
  });

  it('accepts numeric ids and timestamps delivered as strings', () => {
    const task = toTask({ ...row, task_id: '12', created_at: '2026-03-01T08:30:00Z' });

    expect(task.task_id).toBe(12);
    expect(task.created_at).toBe('2026-03-01T08:30:00.000Z');
  });

  it('rejects a row with a status outside the enumeration', () => {
    expect(() => toTask({ ...row, status: 'archived' })).toThrow('Unexpected value in column status: archived');
  });

  it('takes due_date only as the text the date parser hands back', () => {
    expect(toTask({ ...row, due_date: null }).due_date).toBeNull();
    expect(() => toTask({ ...row, due_date: new Date('2026-11-02T00:00:00.000Z') }))
      .toThrow('Unexpected value in column due_date');
  });
});
