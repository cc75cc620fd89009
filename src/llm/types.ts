export type ChatRole = 'system' | 'user' | 'assistant';

export interface LlmMessage {
  role: ChatRole;
  content: string;
}

/** One remembered exchange line in a follow-up conversation. */
export interface ChatTurn {
  role: Exclude<ChatRole, 'system'>;
  content: string;
}

export interface LlmCompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** End-user id forwarded to the service for abuse monitoring. */
  user?: string;
}

export interface LlmClient {
  complete(messages: LlmMessage[], options?: LlmCompletionOptions): Promise<string>;
}
