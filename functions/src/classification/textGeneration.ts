import type { FetchFn } from '../connectors/types';
import { isRecord } from '../models/event';

export const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';

export interface TextGenerator {
  generate(prompt: string, options?: { system?: string }): Promise<string>;
}

export class OpenAIChatTextGenerator implements TextGenerator {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly fetchImpl: FetchFn;

  constructor(options: { apiKey: string; model?: string; fetchImpl?: FetchFn }) {
    if (!options.apiKey) {
      throw new Error('OPENAI_API_KEY is not set');
    }
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_CHAT_MODEL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generate(prompt: string, options: { system?: string } = {}): Promise<string> {
    const messages = options.system
      ? [{ role: 'system', content: options.system }, { role: 'user', content: prompt }]
      : [{ role: 'user', content: prompt }];

    const response = await this.fetchImpl('https://api.openai.com/v1/chat/completions', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({ model: this.model, messages, temperature: 0.3 }),
    });

    if (!response.ok) {
      const err = await response.text();
      throw new Error(`Text generation failed: ${response.status} ${err}`);
    }

    return readFirstChoice(await response.json());
  }
}

function readFirstChoice(payload: unknown): string {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) {
    return '';
  }
  const [choice] = payload.choices;
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return '';
  }
  const content = choice.message.content;
  return typeof content === 'string' ? content.trim() : '';
}
