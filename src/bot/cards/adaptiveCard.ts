import fs from 'node:fs/promises';
import path from 'node:path';
import type { Attachment } from 'botframework-schema';
import { ADAPTIVE_CARD_CONTENT_TYPE } from '../../services/pendingCardLookupService.js';

export const FIELD_NAME_BOT_NAME = '${BotName}';
export const BOT_FIRST_INTRO_FILE = 'bot-first-intro.json';

export abstract class BaseAdaptiveCard {
  abstract getCardContent(): Promise<string>;

  async getCardAttachment(): Promise<Attachment> {
    const json = await this.getCardContent();
    const content: unknown = json.trim() ? JSON.parse(json) : {};
    return { contentType: ADAPTIVE_CARD_CONTENT_TYPE, content };
  }
}

/** A card read from the templates directory with the bot's name filled in. */
export class BotIntroductionCard extends BaseAdaptiveCard {
  private readonly filePath: string;
  private readonly botName: string;

  constructor(filePath: string, botName: string) {
    super();
    this.filePath = filePath;
    this.botName = botName;
  }

  async getCardContent(): Promise<string> {
    const raw = await fs.readFile(this.filePath, 'utf8');
    return raw.split(FIELD_NAME_BOT_NAME).join(this.botName);
  }
}

export const botFirstIntroCard = (templatesDir: string, botName: string): BotIntroductionCard =>
  new BotIntroductionCard(path.join(templatesDir, 'cards', BOT_FIRST_INTRO_FILE), botName);
