import type { GraphClient } from './graphClient.js';

export interface GraphUserServiceOptions {
  graphClient: GraphClient;
}

interface GraphUser {
  id?: string;
  userPrincipalName?: string;
}

interface GraphUserPage {
  '@odata.count'?: number;
  value?: GraphUser[];
}

export class GraphUserService {
  private readonly graphClient: GraphClient;

  constructor(options: GraphUserServiceOptions) {
    this.graphClient = options.graphClient;
  }

  /**
   * Returns the directory object id for a UPN, or undefined when Graph
   * returns a user without one. Graph errors propagate.
   */
  async getUserIdByUpn(upn: string): Promise<string | undefined> {
    const user = await this.graphClient.get<GraphUser>(`/users/${encodeURIComponent(upn)}`, { $select: 'id' });
    return user.id || undefined;
  }

  async getTotalUserCount(): Promise<number> {
    const page = await this.graphClient.get<GraphUserPage>(
      '/users',
      { $count: 'true', $top: '1', $select: 'id' },
      { ConsistencyLevel: 'eventual' }
    );
    return page['@odata.count'] ?? 0;
  }
}
