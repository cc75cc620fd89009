import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { errorMessage } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { MessageTemplateService } from './messageTemplateService.js';

export const SYSTEM_TEMPLATE_CREATOR = 'system@initialization';

const DefaultTemplateIndexSchema = z.array(
  z.object({
    name: z.string().min(1),
    file: z.string().min(1)
  })
);

export type DefaultTemplateIndex = z.infer<typeof DefaultTemplateIndexSchema>;

export interface DefaultTemplateInitializerOptions {
  templateService: Pick<MessageTemplateService, 'getAllTemplates' | 'createTemplate'>;
  templatesDir: string;
  logger: Logger;
}

/**
 * Seeds the bundled nudge templates into an empty store.
 */
export class DefaultTemplateInitializer {
  private readonly templateService: DefaultTemplateInitializerOptions['templateService'];
  private readonly nudgesDir: string;
  private readonly logger: Logger;

  constructor(options: DefaultTemplateInitializerOptions) {
    this.templateService = options.templateService;
    this.nudgesDir = path.join(options.templatesDir, 'nudges');
    this.logger = options.logger;
  }

  /** Returns the number of templates created. Never throws. */
  async initialize(): Promise<number> {
    try {
      const existing = await this.templateService.getAllTemplates();
      if (existing.length > 0) {
        this.logger.info('Templates already exist; skipping defaults', { count: existing.length });
        return 0;
      }

      const index = await this.readIndex();
      for (const entry of index) {
        const json = await fs.readFile(path.join(this.nudgesDir, entry.file), 'utf8');
        await this.templateService.createTemplate(entry.name, json, SYSTEM_TEMPLATE_CREATOR);
        this.logger.info('Created default template', { templateName: entry.name });
      }
      return index.length;
    } catch (error) {
      this.logger.error('Default template initialization failed', { error: errorMessage(error) });
      return 0;
    }
  }

  private async readIndex(): Promise<DefaultTemplateIndex> {
    const raw = await fs.readFile(path.join(this.nudgesDir, 'index.json'), 'utf8');
    return DefaultTemplateIndexSchema.parse(JSON.parse(raw));
  }
}
