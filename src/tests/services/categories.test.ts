import { describe, expect, it } from 'vitest';
import { DEFAULT_CATEGORIES } from '../../0_types.js';
import {
  formatCategoriesForPrompt,
  normalizeCategory,
} from '../../services/categories.js';

describe('normalizeCategory', () => {
  it('matches names case-insensitively', () => {
    expect(normalizeCategory('work', DEFAULT_CATEGORIES)).toBe('Work');
    expect(normalizeCategory(' Distraction ', DEFAULT_CATEGORIES)).toBe('Distraction');
  });

  it('recognises idle labels', () => {
    expect(normalizeCategory('Idle Time', DEFAULT_CATEGORIES)).toBe('Idle');
  });

  it('falls back to the first category', () => {
    expect(normalizeCategory('Coding', DEFAULT_CATEGORIES)).toBe('Work');
    expect(normalizeCategory('', DEFAULT_CATEGORIES)).toBe('Work');
  });

  it('does not invent an idle category', () => {
    const focusOnly = [{ name: 'Focus', description: '', isIdle: false }];
    expect(normalizeCategory('idle', focusOnly)).toBe('Focus');
  });
});

describe('formatCategoriesForPrompt', () => {
  it('lists one category per line', () => {
    expect(
      formatCategoriesForPrompt([
        { name: 'Work', description: 'Deep work', isIdle: false },
        { name: 'Idle', description: '', isIdle: true },
      ])
    ).toBe('- Work: Deep work\n- Idle');
  });
});
