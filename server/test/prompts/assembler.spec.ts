import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { TemplateUnavailableError } from '../../src/errors';
import { FALLBACK_TEMPLATE, PromptAssembler, renderPrompt } from '../../src/prompts';
import { DEFAULT_TEMPLATE_NAME, FileTemplateProvider } from '../../src/prompts/templates';
import type { Message } from '../../src/sessions/types';
import { TEST_TEMPLATE, createSpyLogger, staticTemplates } from '../helpers';

const message = (role: Message['role'], content: string): Message => ({
  role,
  content,
  timestamp: '2025-01-01T00:00:00.000Z'
});

describe('renderPrompt', () => {
  it('orders the system prompt, prior turns and the new query', () => {
    const messages = renderPrompt({
      template: TEST_TEMPLATE,
      query: 'And CSRD?',
      history: [message('human', 'What is GDPR?'), message('assistant', 'A regulation.')],
      context: 'Source: GDPR Article 5\nLawful processing.',
      maxHistoryMessages: 6
    });

    expect(messages).toEqual([
      {
        role: 'system',
        content: 'Test assistant.\nReference material:\nSource: GDPR Article 5\nLawful processing.'
      },
      { role: 'user', content: 'What is GDPR?' },
      { role: 'assistant', content: 'A regulation.' },
      { role: 'user', content: 'And CSRD?' }
    ]);
  });

  it('renders an empty context when retrieval was skipped', () => {
    const [system] = renderPrompt({
      template: TEST_TEMPLATE,
      query: 'Hi',
      history: [],
      context: '',
      maxHistoryMessages: 6
    });

    expect(system.content).toBe('Test assistant.\nReference material:\n');
  });

  it('keeps only the most recent history messages', () => {
    const history = ['one', 'two', 'three', 'four'].map((content, index) =>
      message(index % 2 === 0 ? 'human' : 'assistant', content)
    );

    const messages = renderPrompt({ template: TEST_TEMPLATE, query: 'five', history, context: '', maxHistoryMessages: 2 });

    expect(messages.map((entry) => entry.content).slice(1)).toEqual(['three', 'four', 'five']);
  });

  it('is deterministic for equal inputs', () => {
    const input = {
      template: TEST_TEMPLATE,
      query: 'What is Article 17?',
      history: [message('human', 'Hello')],
      context: 'ctx',
      maxHistoryMessages: 6
    };

    expect(renderPrompt(input)).toEqual(renderPrompt(input));
  });
});

describe('PromptAssembler', () => {
  it('uses the provider template when it is available', async () => {
    const assembler = new PromptAssembler({ provider: staticTemplates() });

    const prompt = await assembler.build('Hi', [], 'ctx');

    expect(prompt.templateName).toBe(DEFAULT_TEMPLATE_NAME);
    expect(prompt.templateSource).toBe('provider');
    expect(prompt.messages[0].content).toBe('Test assistant.\nReference material:\nctx');
  });

  it('falls back to the built-in template and logs once the provider fails', async () => {
    const { logger, warn } = createSpyLogger();
    const assembler = new PromptAssembler({
      provider: {
        fetch: async () => {
          throw new TemplateUnavailableError('Template store offline.');
        }
      },
      logger
    });

    const prompt = await assembler.build('Hi', [], 'ctx');

    expect(prompt.templateSource).toBe('fallback');
    expect(prompt.messages[0].content).toBe(FALLBACK_TEMPLATE.replace('{{CONTEXT}}', 'ctx'));
    expect(warn).toHaveBeenCalledWith('prompt.template_fallback', {
      template_name: 'compliance',
      reason: 'Template store offline.'
    });
  });
});

describe('FileTemplateProvider', () => {
  it('loads the bundled compliance template', async () => {
    const template = await new FileTemplateProvider().fetch('compliance');

    expect(template.name).toBe('compliance');
    expect(template.text.endsWith('Reference material:\n{{CONTEXT}}')).toBe(true);
  });

  it('rejects names that could escape the template directory', async () => {
    await expect(new FileTemplateProvider().fetch('../secrets')).rejects.toThrow('Invalid template name: ../secrets');
  });

  it('treats missing and empty templates as unavailable', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'templates-'));
    try {
      await writeFile(join(directory, 'blank.md'), '  \n', 'utf8');
      const provider = new FileTemplateProvider(directory);

      await expect(provider.fetch('blank')).rejects.toThrow('Template "blank" is empty.');
      await expect(provider.fetch('absent')).rejects.toBeInstanceOf(TemplateUnavailableError);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
