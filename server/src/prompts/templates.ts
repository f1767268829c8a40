import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { TemplateUnavailableError, errorReason } from '../errors';

export const CONTEXT_PLACEHOLDER = '{{CONTEXT}}';

export const DEFAULT_TEMPLATE_NAME = 'compliance';

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('.', import.meta.url));

export const FALLBACK_TEMPLATE = [
  'You are a helpful assistant answering questions about regulations and compliance.',
  'Use the reference material below when it is relevant and cite its source.',
  'If you are unsure, say so.',
  '',
  'Reference material:',
  CONTEXT_PLACEHOLDER
].join('\n');

const TEMPLATE_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]{0,63}$/i;

export interface Template {
  name: string;
  text: string;
}

export interface TemplateProvider {
  fetch: (name: string) => Promise<Template>;
}

export class FileTemplateProvider implements TemplateProvider {
  private readonly cache = new Map<string, Template>();

  constructor(private readonly directory: string = DEFAULT_TEMPLATE_DIR) {}

  async fetch(name: string): Promise<Template> {
    if (!TEMPLATE_NAME_PATTERN.test(name)) {
      throw new TemplateUnavailableError(`Invalid template name: ${name}`);
    }

    const cached = this.cache.get(name);
    if (cached) return cached;

    let text: string;
    try {
      text = await readFile(join(this.directory, `${name}.md`), 'utf8');
    } catch (error) {
      throw new TemplateUnavailableError(`Template "${name}" could not be read: ${errorReason(error)}`);
    }

    if (!text.trim()) {
      throw new TemplateUnavailableError(`Template "${name}" is empty.`);
    }

    const template = { name, text: text.trim() };
    this.cache.set(name, template);
    return template;
  }
}
