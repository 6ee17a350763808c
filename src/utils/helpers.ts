// src/utils/helpers.ts
// 'YYYY-MM-DD' that names a real calendar day (rejects 2025-02-30)
export const isCalendarDate = (value: string): boolean => {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;

  const [, year, month, day] = match.map(Number);
  if (year < 1) return false;

  // setUTCFullYear keeps years 1-99 as written; Date.UTC would shift them to 19xx
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
