import { beforeEach, describe, expect, it, vi } from 'vitest';

const { create, groqCtor } = vi.hoisted(() => {
  const create = vi.fn();
  const groqCtor = vi.fn(function groqClient() {
    return { chat: { completions: { create } } };
  });
  return { create, groqCtor };
});

vi.mock('groq-sdk', () => ({ default: groqCtor }));

import { GroqNarrativeModel } from '../../src/services/narrative-model.js';

describe('GroqNarrativeModel', () => {
  beforeEach(() => {
    create.mockReset();
    groqCtor.mockClear();
  });

  it('is not ready without an API key', async () => {
    const model = new GroqNarrativeModel('   ');

    expect(model.isReady()).toBe(false);
    expect(groqCtor).not.toHaveBeenCalled();
    await expect(model.complete({ system: 's', user: 'u' }, 64)).rejects.toThrow('[GroqNarrativeModel] No API key configured.');
  });

  it('sends the prompt to the configured model', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: 'Your lunch did it.' } }] });
    const model = new GroqNarrativeModel('test-key', 'test-model');

    await expect(model.complete({ system: 'be kind', user: 'why tired' }, 64)).resolves.toBe('Your lunch did it.');
    expect(model.isReady()).toBe(true);
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'be kind' },
        { role: 'user', content: 'why tired' },
      ],
      max_tokens: 64,
    });
  });

  it('returns an empty string when no choice comes back', async () => {
    create.mockResolvedValue({ choices: [] });
    await expect(new GroqNarrativeModel('test-key').complete({ system: 's', user: 'u' }, 10)).resolves.toBe('');
  });

  it('propagates request failures', async () => {
    create.mockRejectedValue(new Error('rate limited'));
    await expect(new GroqNarrativeModel('test-key').complete({ system: 's', user: 'u' }, 10)).rejects.toThrow('rate limited');
  });
});
