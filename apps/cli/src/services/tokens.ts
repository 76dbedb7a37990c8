import { get_encoding, type Tiktoken } from 'tiktoken';

/**
 * Token budgeting for prompts sent to OpenAI-compatible chat APIs
 */
export interface TokenBudgeter {
  count(text: string): number;
  clip(text: string, budget: number): string;
}

/**
 * cl100k_base counter. DeepSeek's tokenizer differs slightly, so budgets
 * leave headroom below the model limit.
 */
export class TokenCounter implements TokenBudgeter {
  private encoder: Tiktoken;
  private decoder = new TextDecoder();

  constructor() {
    this.encoder = get_encoding('cl100k_base');
  }

  count(text: string): number {
    return this.encoder.encode(text).length;
  }

  /**
   * Keep the first `budget` tokens of text
   */
  clip(text: string, budget: number): string {
    const tokens = this.encoder.encode(text);
    if (tokens.length <= budget) return text;
    return this.decoder.decode(this.encoder.decode(tokens.slice(0, Math.max(0, budget))));
  }

  free(): void {
    this.encoder.free();
  }
}
