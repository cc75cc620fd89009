import type { FollowUpChatConfig } from '../config/appConfig.js';
import { OutputValidationError, ThrottledError } from '../errors/index.js';
import type { LlmClient, LlmCompletionOptions, LlmMessage } from './types.js';

export interface AzureOpenAiClientOptions {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  defaultOptions?: LlmCompletionOptions;
  fetcher?: typeof fetch;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  error?: { message?: string; code?: string };
}

const normalizeEndpoint = (endpoint: string): string => endpoint.replace(/\/+$/, '');

/** Chat completions against an Azure OpenAI deployment. */
export class AzureOpenAiClient implements LlmClient {
  private readonly url: string;
  private readonly apiKey: string;
  private readonly defaultOptions: LlmCompletionOptions;
  private readonly fetcher: typeof fetch;

  constructor(options: AzureOpenAiClientOptions) {
    const deployment = encodeURIComponent(options.deployment);
    this.url =
      `${normalizeEndpoint(options.endpoint)}/openai/deployments/${deployment}` +
      `/chat/completions?api-version=${encodeURIComponent(options.apiVersion)}`;
    this.apiKey = options.apiKey;
    this.defaultOptions = options.defaultOptions ?? {};
    this.fetcher = options.fetcher ?? fetch;
  }

  static fromConfig(config: FollowUpChatConfig, fetcher?: typeof fetch): AzureOpenAiClient {
    return new AzureOpenAiClient({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      deployment: config.deployment,
      apiVersion: config.apiVersion,
      defaultOptions: { maxTokens: config.maxTokens, temperature: config.temperature },
      fetcher
    });
  }

  async complete(messages: LlmMessage[], options?: LlmCompletionOptions): Promise<string> {
    const response = await this.fetcher(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'api-key': this.apiKey
      },
      body: JSON.stringify({
        messages,
        temperature: options?.temperature ?? this.defaultOptions.temperature,
        max_tokens: options?.maxTokens ?? this.defaultOptions.maxTokens,
        user: options?.user ?? this.defaultOptions.user
      })
    });

    const text = await response.text();
    if (response.status === 429) {
      throw new ThrottledError('Azure OpenAI rate limit reached.');
    }
    if (!response.ok) {
      throw new Error(`Azure OpenAI request failed (${response.status}): ${text}`.trim());
    }

    let data: ChatCompletionResponse;
    try {
      data = JSON.parse(text) as ChatCompletionResponse;
    } catch {
      throw new OutputValidationError('Azure OpenAI response was not valid JSON.');
    }

    if (data.error?.message) {
      const code = data.error.code ? ` (${data.error.code})` : '';
      throw new Error(`Azure OpenAI error${code}: ${data.error.message}`);
    }

    const content = data.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new OutputValidationError('Azure OpenAI response missing message content.');
    }
    return content;
  }
}
