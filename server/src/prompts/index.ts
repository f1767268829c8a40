import { errorReason } from '../errors';
import type { Logger } from '../logger';
import type { Message } from '../sessions/types';
import {
  CONTEXT_PLACEHOLDER,
  DEFAULT_TEMPLATE_NAME,
  FALLBACK_TEMPLATE,
  type TemplateProvider
} from './templates';

export const DEFAULT_MAX_HISTORY_MESSAGES = 6;

export type PromptRole = 'system' | 'user' | 'assistant';

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface Prompt {
  messages: PromptMessage[];
  templateName: string;
  templateSource: 'provider' | 'fallback';
}

export interface PromptAssemblerOptions {
  provider: TemplateProvider;
  templateName?: string;
  maxHistoryMessages?: number;
  logger?: Logger;
}

const renderSystemPrompt = (template: string, context: string): string => {
  return template.split(CONTEXT_PLACEHOLDER).join(context);
};

/** Pure: same template, history, context and query always produce the same prompt. */
export const renderPrompt = (options: {
  template: string;
  query: string;
  history: readonly Message[];
  context: string;
  maxHistoryMessages: number;
}): PromptMessage[] => {
  const recent = options.maxHistoryMessages > 0 ? options.history.slice(-options.maxHistoryMessages) : [];

  return [
    { role: 'system', content: renderSystemPrompt(options.template, options.context) },
    ...recent.map((message): PromptMessage => ({
      role: message.role === 'human' ? 'user' : 'assistant',
      content: message.content
    })),
    { role: 'user', content: options.query }
  ];
};

export class PromptAssembler {
  private readonly provider: TemplateProvider;
  private readonly templateName: string;
  private readonly maxHistoryMessages: number;
  private readonly logger?: Logger;

  constructor(options: PromptAssemblerOptions) {
    this.provider = options.provider;
    this.templateName = options.templateName ?? DEFAULT_TEMPLATE_NAME;
    this.maxHistoryMessages = Math.max(0, options.maxHistoryMessages ?? DEFAULT_MAX_HISTORY_MESSAGES);
    this.logger = options.logger;
  }

  async build(query: string, history: readonly Message[], context: string, logger = this.logger): Promise<Prompt> {
    let template = FALLBACK_TEMPLATE;
    let templateSource: Prompt['templateSource'] = 'fallback';

    try {
      const fetched = await this.provider.fetch(this.templateName);
      template = fetched.text;
      templateSource = 'provider';
    } catch (error) {
      logger?.warn('prompt.template_fallback', {
        template_name: this.templateName,
        reason: errorReason(error)
      });
    }

    return {
      messages: renderPrompt({
        template,
        query,
        history,
        context,
        maxHistoryMessages: this.maxHistoryMessages
      }),
      templateName: this.templateName,
      templateSource
    };
  }
}

export { FileTemplateProvider, FALLBACK_TEMPLATE, CONTEXT_PLACEHOLDER, type TemplateProvider } from './templates';
