import { OutputValidationError, errorMessage } from '../errors/index.js';
import { hashId, type Logger } from '../logging/logger.js';
import type { SettingsStorageManager } from '../storage/settingsStorageManager.js';
import type { ChatTurn, LlmClient, LlmMessage } from './types.js';

export const NOT_PROCESSED_REPLY = "I'm sorry, I couldn't process your message. Please try again.";
export const UNAVAILABLE_REPLY = "I apologize, but I'm having trouble responding right now. Please try again later.";

const END_TERMS = [
  'thank',
  'thanks',
  'got it',
  'ok',
  'okay',
  'understood',
  'bye',
  'goodbye',
  'cheers',
  'perfect',
  'great',
  'awesome'
];
const END_PATTERN = new RegExp(`\\b(?:${END_TERMS.join('|')})\\b`, 'i');
const MAX_CLOSING_MESSAGE_LENGTH = 50;

export const defaultFollowUpSystemPrompt = (botName: string): string =>
  [
    `You are the assistant behind ${botName}, a Microsoft Teams bot that sends people short tips, reminders and announcements.`,
    'People may reply to one of those messages with a question or feedback.',
    'Answer questions about the message, add detail when asked and keep a friendly, professional tone.',
    'Replies are read in a Teams chat: keep them brief and use markdown sparingly.'
  ].join('\n');

export interface FollowUpReply {
  response: string;
  shouldEndConversation: boolean;
}

export interface FollowUpChatServiceOptions {
  llmClient: LlmClient;
  logger: Logger;
  /** Used when no settings store is given or the store cannot be read. */
  systemPrompt: string;
  /** Runtime settings; read on every chat so prompt edits apply immediately. */
  settings?: Pick<SettingsStorageManager, 'getEffectiveFollowUpChatSystemPrompt'>;
  maxTokens?: number;
  temperature?: number;
}

/** A short message that reads as a closing remark ("thanks!", "ok, got it"). */
export const shouldEndConversation = (message: string): boolean =>
  message.length < MAX_CLOSING_MESSAGE_LENGTH && END_PATTERN.test(message);

export class FollowUpChatService {
  private readonly llmClient: LlmClient;
  private readonly logger: Logger;
  private readonly systemPrompt: string;
  private readonly settings?: FollowUpChatServiceOptions['settings'];
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: FollowUpChatServiceOptions) {
    this.llmClient = options.llmClient;
    this.logger = options.logger;
    this.systemPrompt = options.systemPrompt;
    this.settings = options.settings;
    this.maxTokens = options.maxTokens ?? 500;
    this.temperature = options.temperature ?? 0.7;
  }

  async resolveSystemPrompt(): Promise<string> {
    if (!this.settings) {
      return this.systemPrompt;
    }
    try {
      return await this.settings.getEffectiveFollowUpChatSystemPrompt();
    } catch (error) {
      this.logger.warn('Could not read follow-up prompt from settings; using default', { error: errorMessage(error) });
      return this.systemPrompt;
    }
  }

  buildMessages(
    message: string,
    nudgeContext?: string,
    history: ChatTurn[] = [],
    basePrompt: string = this.systemPrompt
  ): LlmMessage[] {
    const systemPrompt = nudgeContext
      ? `${basePrompt}\n\nThe original nudge message context was about: ${nudgeContext}`
      : basePrompt;
    return [
      { role: 'system', content: systemPrompt },
      ...history.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: message }
    ];
  }

  async handleFollowUpChat(
    userId: string,
    message: string,
    nudgeContext?: string,
    history?: ChatTurn[]
  ): Promise<FollowUpReply> {
    const userHash = hashId(userId);
    this.logger.info('Handling follow-up chat', { userHash, historyLength: history?.length ?? 0 });
    const systemPrompt = await this.resolveSystemPrompt();
    try {
      const response = await this.llmClient.complete(this.buildMessages(message, nudgeContext, history, systemPrompt), {
        maxTokens: this.maxTokens,
        temperature: this.temperature,
        user: userHash
      });
      return { response, shouldEndConversation: shouldEndConversation(message) };
    } catch (error) {
      if (error instanceof OutputValidationError) {
        this.logger.warn('Follow-up chat returned no usable reply', { userHash, error: errorMessage(error) });
        return { response: NOT_PROCESSED_REPLY, shouldEndConversation: false };
      }
      this.logger.error('Follow-up chat failed', { userHash, error: errorMessage(error) });
      return { response: UNAVAILABLE_REPLY, shouldEndConversation: true };
    }
  }
}
