import { ValidationError } from '../core/errors.js';
import type { NoteChanges } from '../types/index.js';

export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

export function requireText(field: 'title' | 'content', value: string): void {
  if (typeof value !== 'string' || isBlank(value)) {
    throw new ValidationError(`Note ${field} must not be empty`);
  }
}

export function requireDate(field: string, value: Date): void {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new ValidationError(`Note ${field} must be a valid date`);
  }
}

export function requireLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Limit must be a positive integer, got ${limit}`);
  }
}

export function requireHours(hours: number): void {
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new ValidationError(`Reminder window must be a positive number of hours, got ${hours}`);
  }
}

/**
 * Validate an update payload and drop absent keys.
 * Returns null when nothing would change.
 */
export function normalizeChanges(changes: NoteChanges): NoteChanges | null {
  const normalized: NoteChanges = {};
  if (changes.title !== undefined) {
    requireText('title', changes.title);
    normalized.title = changes.title;
  }
  if (changes.content !== undefined) {
    requireText('content', changes.content);
    normalized.content = changes.content;
  }
  if (changes.dueAt !== undefined) {
    if (changes.dueAt !== null) {
      requireDate('dueAt', changes.dueAt);
    }
    normalized.dueAt = changes.dueAt;
  }
  return Object.keys(normalized).length > 0 ? normalized : null;
}

/**
 * Quote a user query for use inside a regular expression.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
