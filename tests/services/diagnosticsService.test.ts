import { describe, expect, it } from 'vitest';
import { DiagnosticsService } from '../../src/services/diagnosticsService.js';
import { createTestLogger } from '../helpers/testLogger.js';

const now = () => new Date('2024-05-01T09:00:00.000Z');

describe('DiagnosticsService', () => {
  it('reports the tenant user count on success', async () => {
    const service = new DiagnosticsService({
      userService: { getTotalUserCount: async () => 12 },
      logger: createTestLogger(),
      now
    });

    expect(await service.testGraphConnection()).toEqual({
      success: true,
      message: 'Graph API connection successful',
      userCount: 12,
      timestamp: '2024-05-01T09:00:00.000Z'
    });
  });

  it('reports the failure message', async () => {
    const service = new DiagnosticsService({
      userService: {
        getTotalUserCount: async () => {
          throw new Error('Insufficient privileges');
        }
      },
      logger: createTestLogger(),
      now
    });

    expect(await service.testGraphConnection()).toEqual({
      success: false,
      message: 'Graph API connection failed: Insufficient privileges',
      timestamp: '2024-05-01T09:00:00.000Z'
    });
  });
});
