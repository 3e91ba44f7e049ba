/**
 * Prompt templates
 *
 * Markdown files under prompts/ with {{PLACEHOLDER}} slots.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const PROMPTS_DIR =
  process.env.TIMEWEAVE_PROMPTS_DIR || path.join(__dirname, '..', '..', 'prompts');

export type PromptName =
  | 'gemini-transcribe'
  | 'gemini-cards'
  | 'ollama-describe-frame'
  | 'ollama-segment'
  | 'ollama-title-summary'
  | 'ollama-evaluate-merge'
  | 'ollama-merge-cards';

const cache = new Map<PromptName, string>();

export function readPromptTemplate(name: PromptName): string {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;
  const template = readFileSync(path.join(PROMPTS_DIR, `${name}.md`), 'utf-8');
  cache.set(name, template);
  return template;
}

/**
 * Replace every {{KEY}} with vars[KEY]. Unknown placeholders are left as is.
 */
export function renderPrompt(
  template: string,
  vars: Record<string, string | number>
): string {
  return template.replace(/\{\{([A-Z0-9_]+)\}\}/g, (match, key: string) =>
    key in vars ? String(vars[key]) : match
  );
}

export function loadPrompt(
  name: PromptName,
  vars: Record<string, string | number> = {}
): string {
  return renderPrompt(readPromptTemplate(name), vars);
}
