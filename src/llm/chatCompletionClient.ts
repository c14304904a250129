import fetch, { RequestInit, Response } from 'node-fetch';
import { ChatMessage, TextGenerator } from '../types';
import { ChatCompletionError } from '../errors';
import { isRecord } from '../utils/guards';
import { DEFAULT_API_URL, DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from '../config/config';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type ChatCompletionClientOptions = {
  apiKey: string;
  model?: string;
  apiUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

// Pulls choices[0].message.content out of an OpenAI-style response body.
function extractContent(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices)) return '';
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return '';
  const content = first.message.content;
  return typeof content === 'string' ? content : '';
}

/**
 * Client for an OpenAI-compatible `/chat/completions` endpoint.
 * One request per call; errors are thrown to the caller.
 */
export class ChatCompletionClient implements TextGenerator {
  readonly model: string;
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ChatCompletionClientOptions) {
    if (!options.apiKey) {
      throw new ChatCompletionError('An API key is required.');
    }
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generate(messages: ChatMessage[], temperature: number): Promise<string> {
    const res = await this.fetchImpl(this.apiUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        messages,
        temperature,
      }),
      timeout: this.timeoutMs,
    });

    if (!res.ok) {
      const text = await res.text();
      throw new ChatCompletionError(
        `Chat completion API error: ${res.status} ${text}`,
        res.status,
      );
    }

    const data: unknown = await res.json();
    const content = extractContent(data);
    if (!content) {
      throw new ChatCompletionError('Chat completion API returned empty content.');
    }
    return content;
  }
}
