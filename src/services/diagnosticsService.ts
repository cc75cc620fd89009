import { errorMessage } from '../errors/index.js';
import type { GraphUserService } from '../graph/userService.js';
import type { Logger } from '../logging/logger.js';

export interface GraphConnectionResult {
  success: boolean;
  message: string;
  userCount?: number;
  timestamp: string;
}

export interface DiagnosticsServiceOptions {
  userService: Pick<GraphUserService, 'getTotalUserCount'>;
  logger: Logger;
  now?: () => Date;
}

export class DiagnosticsService {
  private readonly userService: DiagnosticsServiceOptions['userService'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: DiagnosticsServiceOptions) {
    this.userService = options.userService;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async testGraphConnection(): Promise<GraphConnectionResult> {
    try {
      const userCount = await this.userService.getTotalUserCount();
      return {
        success: true,
        message: 'Graph API connection successful',
        userCount,
        timestamp: this.now().toISOString()
      };
    } catch (error) {
      this.logger.error('Graph connection test failed', { error: errorMessage(error) });
      return {
        success: false,
        message: `Graph API connection failed: ${errorMessage(error)}`,
        timestamp: this.now().toISOString()
      };
    }
  }
}
