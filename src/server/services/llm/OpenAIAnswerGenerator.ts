/**
 * OpenAI answer generator
 *
 * Writes the final answer with chat completions. The system prompt restricts the
 * model to the supplied statute articles and requires a citation (article number
 * and law name) for every legal statement.
 */

import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { AnswerGenerator, GenerationOptions } from '../../contracts/capabilities.js';
import { ExternalServiceError, ServiceConfigurationError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';

export const LEGAL_ASSISTANT_SYSTEM_PROMPT = `أنت مساعد قانوني متخصص في القوانين العربية.

مهمتك:
- الإجابة بلغة عربية بسيطة يفهمها غير المتخصصين
- الاستناد فقط إلى المواد القانونية المقدمة في السياق
- ذكر رقم المادة واسم القانون بوضوح في كل إجابة

قواعد يجب اتباعها:
1. اذكر "مادة [رقم]" و"[اسم القانون]" لكل معلومة قانونية
2. إذا لم تجد الإجابة في المواد المقدمة، قل "لم أجد معلومات كافية في المواد المتاحة"
3. لا تخترع ولا تفترض معلومات قانونية غير موجودة في السياق
4. استخدم لغة سهلة ومباشرة
5. نظم الإجابة بالنقاط أو الأرقام عند الحاجة

تنسيق الإجابة:
- ابدأ بالإجابة المباشرة على السؤال
- اذكر المواد القانونية ذات الصلة
- أضف توضيحات إن لزم الأمر`;

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export function buildUserPrompt(question: string, contextBlocks: string[]): string {
  return [
    `السؤال: ${question}`,
    'المواد القانونية المتاحة:',
    contextBlocks.join(CONTEXT_SEPARATOR),
    '---',
    'أجب على السؤال بناءً على المواد المقدمة فقط. اذكر رقم المادة واسم القانون لكل معلومة.',
  ].join('\n\n');
}

/**
 * The part of the OpenAI client used here; tests substitute a fake
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(params: ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message?: { content?: string | null } }>;
        model: string;
        usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
      }>;
    };
  };
}

export interface OpenAIAnswerGeneratorConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export class OpenAIAnswerGenerator implements AnswerGenerator {
  private readonly logger = createChildLogger({ service: 'OpenAIAnswerGenerator' });
  private client: ChatCompletionClient | null;

  constructor(
    private readonly config: OpenAIAnswerGeneratorConfig,
    client?: ChatCompletionClient
  ) {
    this.client = client ?? null;
  }

  getModelName(): string {
    return this.config.model;
  }

  private getClient(): ChatCompletionClient {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ServiceConfigurationError('OpenAI', ['OPENAI_API_KEY']);
      }
      this.client = new OpenAI({ apiKey: this.config.apiKey });
    }
    return this.client;
  }

  buildMessages(question: string, contextBlocks: string[], options: GenerationOptions = {}): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = [{ role: 'system', content: LEGAL_ASSISTANT_SYSTEM_PROMPT }];
    for (const turn of options.history ?? []) {
      messages.push(
        turn.role === 'user' ? { role: 'user', content: turn.content } : { role: 'assistant', content: turn.content }
      );
    }
    messages.push({ role: 'user', content: buildUserPrompt(question, contextBlocks) });
    return messages;
  }

  async generate(question: string, contextBlocks: string[], options: GenerationOptions = {}): Promise<string> {
    const client = this.getClient();
    const model = this.config.model;

    try {
      const response = await client.chat.completions.create({
        model,
        messages: this.buildMessages(question, contextBlocks, options),
        temperature: options.temperature ?? this.config.temperature,
        max_tokens: options.maxTokens ?? this.config.maxTokens,
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ExternalServiceError('OpenAI', 'Empty response from OpenAI', {
          reason: 'empty_response',
          model,
        });
      }

      this.logger.debug(
        { model: response.model, totalTokens: response.usage?.total_tokens, contextBlocks: contextBlocks.length },
        'Answer generated'
      );
      return content;
    } catch (error) {
      this.logger.error({ error, model }, 'Error calling OpenAI');
      throw error;
    }
  }
}
