/**
 * DeepSeek chat client (OpenAI-compatible API)
 * Implements the Summarizer and Translator capabilities used by the
 * summarize and slides commands.
 */

import OpenAI from 'openai';
import { errorMessage } from '../errors';
import { TokenCounter, type TokenBudgeter } from '../tokens';
import { extractJsonObject } from './json';
import {
  summaryContentSchema,
  type Summarizer,
  type SummaryContent,
  type TargetLanguage,
  type Translator,
} from './types';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatRequestOptions {
  json: boolean;
}

/**
 * Minimal chat-completion seam so tests can stub the model
 */
export interface ChatCompletionClient {
  complete(messages: ChatMessage[], options: ChatRequestOptions): Promise<string>;
}

export class OpenAIChatClient implements ChatCompletionClient {
  private client: OpenAI;

  constructor(
    options: { apiKey: string; baseURL: string },
    private model: string
  ) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async complete(messages: ChatMessage[], options: ChatRequestOptions): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages,
      stream: false,
      response_format: options.json ? { type: 'json_object' } : undefined,
    });
    return response.choices[0]?.message?.content ?? '';
  }
}

// Leaves room for the prompt and the reply below DeepSeek's 64k context
export const TOKEN_BUDGET = 55_000;
export const MIN_RETRY_BUDGET = 1_000;

export const SUMMARY_PROMPT = [
  '请根据以下论文内容，用中文总结要点，缩写需给出中文全称（英文全称，英文缩写）：',
  '  (1) phenomenon：涉及的现象；',
  '  (2) problem：由该现象产生的问题（与机制一一对应，逐条列出）；',
  '  (3) mechanism：论文提出的机制（与问题一一对应，逐条列出）；',
  '  (4) result：论文实验结果（需说明具体数据集 / 环境名称及对应的性能数值）；',
  '  (5) summary：一段话概括全文。',
  '另给出 title：论文英文标题。',
  '仅输出 JSON，字段为 title / summary / phenomenon / problem / mechanism / result，其中 phenomenon / problem / mechanism / result 为字符串数组。',
  '',
].join('\n');

const LANGUAGE_NAMES: Record<TargetLanguage, string> = {
  zh: 'Simplified Chinese',
  en: 'English',
};

export function isContextLengthError(error: unknown): boolean {
  return /maximum context length|context length|too many tokens/i.test(errorMessage(error));
}

export interface DeepSeekClientOptions {
  chat: ChatCompletionClient;
  /** Defaults to a cl100k counter created on first summarize() */
  tokens?: TokenBudgeter;
  tokenBudget?: number;
  minRetryBudget?: number;
}

export class DeepSeekClient implements Summarizer, Translator {
  private readonly tokenBudget: number;
  private readonly minRetryBudget: number;
  private ownCounter: TokenCounter | null = null;

  constructor(private readonly options: DeepSeekClientOptions) {
    this.tokenBudget = options.tokenBudget ?? TOKEN_BUDGET;
    this.minRetryBudget = options.minRetryBudget ?? MIN_RETRY_BUDGET;
  }

  /**
   * Summarize paper text. When the API rejects the prompt as too long the
   * text budget shrinks by 10% and the request is repeated.
   */
  async summarize(text: string): Promise<SummaryContent> {
    let budget = this.tokenBudget;

    for (;;) {
      const clipped = this.tokenBudgeter().clip(text, budget);
      try {
        const reply = await this.options.chat.complete(
          [
            { role: 'system', content: 'You are a helpful assistant' },
            { role: 'user', content: `${SUMMARY_PROMPT}${clipped}\n` },
          ],
          { json: true }
        );
        return parseSummaryReply(reply);
      } catch (error) {
        if (isContextLengthError(error) && budget > this.minRetryBudget) {
          budget = Math.floor(budget * 0.9);
          continue;
        }
        throw error;
      }
    }
  }

  async translate(text: string, targetLang: TargetLanguage): Promise<string> {
    const reply = await this.options.chat.complete(
      [
        {
          role: 'system',
          content: `You are a professional translator. Translate the user's text into ${LANGUAGE_NAMES[targetLang]}. Keep technical terms, numbers and dataset names. Output only the translation.`,
        },
        { role: 'user', content: text },
      ],
      { json: false }
    );
    const translated = reply.trim();
    return translated || text;
  }

  close(): void {
    this.ownCounter?.free();
    this.ownCounter = null;
  }

  private tokenBudgeter(): TokenBudgeter {
    if (this.options.tokens) return this.options.tokens;
    if (!this.ownCounter) {
      this.ownCounter = new TokenCounter();
    }
    return this.ownCounter;
  }
}

/**
 * Normalize a model reply; anything that is not a JSON object is kept
 * verbatim as the summary text.
 */
export function parseSummaryReply(reply: string): SummaryContent {
  const data = extractJsonObject(reply);
  const parsed = data ? summaryContentSchema.safeParse(data) : null;
  if (!parsed || !parsed.success) {
    return {
      summary: reply.trim(),
      phenomenon: [],
      problem: [],
      mechanism: [],
      result: [],
    };
  }

  const { title, summary, phenomenon, problem, mechanism, result } = parsed.data;
  const fallbackSummary = [...phenomenon, ...mechanism].join(' ');
  return {
    ...(title ? { title } : {}),
    summary: summary ?? fallbackSummary,
    phenomenon,
    problem,
    mechanism,
    result,
  };
}
