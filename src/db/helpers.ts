/**
 * Database Helpers
 *
 * ID generation, timestamps and the IN-list placeholder helper.
 */

import { uuidv7 } from 'uuidv7';

/**
 * Generate a time-sortable unique ID (UUIDv7)
 */
export function generateId(): string {
  return uuidv7();
}

/**
 * Get current ISO8601 timestamp for SQLite
 */
export function nowISO(): string {
  return new Date().toISOString();
}

/**
 * "?, ?, ?" for an IN (...) clause of `count` items
 */
export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}
