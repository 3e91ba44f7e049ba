import { describe, expect, it } from 'vitest';
import { loadPrompt, renderPrompt } from '../../adapters/prompts.js';

describe('renderPrompt', () => {
  it('fills known placeholders and leaves unknown ones', () => {
    expect(renderPrompt('Frames: {{FRAME_COUNT}} of {{DURATION}}', { FRAME_COUNT: 3 })).toBe(
      'Frames: 3 of {{DURATION}}'
    );
  });

  it('replaces every occurrence', () => {
    expect(renderPrompt('{{A}}-{{A}}', { A: 'x' })).toBe('x-x');
  });
});

describe('loadPrompt', () => {
  it('reads the template from the prompts directory', () => {
    const prompt = loadPrompt('ollama-describe-frame', { TIMESTAMP: '04:00' });

    expect(prompt).toContain('taken 04:00 into a screen recording');
    expect(prompt).not.toContain('{{TIMESTAMP}}');
  });
});
