import type { Category } from '../0_types.js';

const IDLE_LABELS = ['idle', 'idle time'];

/**
 * Map a model-produced category label onto the configured taxonomy.
 * Unknown labels fall back to the first category.
 */
export function normalizeCategory(raw: string, categories: Category[]): string {
  const cleaned = raw.trim();
  const fallback = categories[0]?.name ?? cleaned;
  if (!cleaned) return fallback;

  const wanted = cleaned.toLowerCase();
  const exact = categories.find((c) => c.name.trim().toLowerCase() === wanted);
  if (exact) return exact.name;

  const idle = categories.find((c) => c.isIdle);
  if (idle && [...IDLE_LABELS, idle.name.trim().toLowerCase()].includes(wanted)) {
    return idle.name;
  }
  return fallback;
}

export function formatCategoriesForPrompt(categories: Category[]): string {
  return categories
    .map((c) => `- ${c.name}${c.description ? `: ${c.description}` : ''}`)
    .join('\n');
}
