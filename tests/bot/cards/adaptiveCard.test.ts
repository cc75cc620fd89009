import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { BaseAdaptiveCard, BotIntroductionCard, botFirstIntroCard } from '../../../src/bot/cards/adaptiveCard.js';

class StaticCard extends BaseAdaptiveCard {
  private readonly json: string;

  constructor(json: string) {
    super();
    this.json = json;
  }

  async getCardContent(): Promise<string> {
    return this.json;
  }
}

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe('adaptive cards', () => {
  it('wraps card JSON in an adaptive card attachment', async () => {
    expect(await new StaticCard('{"type":"AdaptiveCard"}').getCardAttachment()).toEqual({
      contentType: 'application/vnd.microsoft.card.adaptive',
      content: { type: 'AdaptiveCard' }
    });
    expect((await new StaticCard('  ').getCardAttachment()).content).toEqual({});
  });

  it('fills in every bot name placeholder', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'nudge-card-'));
    tempDirs.push(dir);
    const file = path.join(dir, 'card.json');
    await fs.writeFile(file, '{"title":"${BotName}","text":"Ask ${BotName} anything"}');

    const content = await new BotIntroductionCard(file, 'Tips Bot').getCardContent();

    expect(JSON.parse(content)).toEqual({ title: 'Tips Bot', text: 'Ask Tips Bot anything' });
  });

  it('loads the bundled first-intro card', async () => {
    const card = botFirstIntroCard(path.resolve(process.cwd(), 'templates'), 'Tips Bot');

    const attachment = await card.getCardAttachment();

    expect(attachment.content).toMatchObject({
      type: 'AdaptiveCard',
      body: [{ type: 'TextBlock', text: "Hi, I'm Tips Bot" }, { type: 'TextBlock' }]
    });
  });
});
