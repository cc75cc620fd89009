import { TableClient } from '@azure/data-tables';
import { NotFoundError } from '../errors/index.js';

type StringFieldOf<T> = {
  [K in keyof T]-?: T[K] extends string | undefined ? K : never;
}[keyof T];

/** Equality filter on string fields, combined with AND. */
export type EntityFilter<T> = Partial<Record<StringFieldOf<T> & string, string>>;

export interface EntityTable<T extends { rowKey: string }> {
  create(entity: T): Promise<void>;
  get(rowKey: string): Promise<T | undefined>;
  replace(entity: T): Promise<void>;
  upsert(entity: T): Promise<void>;
  delete(rowKey: string): Promise<void>;
  list(filter?: EntityFilter<T>): Promise<T[]>;
}

const filterEntries = (filter?: object): [string, string][] =>
  Object.entries(filter ?? {}).flatMap(([key, value]): [string, string][] =>
    typeof value === 'string' ? [[key, value]] : []
  );

export class InMemoryEntityTable<T extends { rowKey: string }> implements EntityTable<T> {
  private readonly rows = new Map<string, T>();

  async create(entity: T): Promise<void> {
    if (this.rows.has(entity.rowKey)) {
      throw new Error(`Entity ${entity.rowKey} already exists`);
    }
    this.rows.set(entity.rowKey, { ...entity });
  }

  async get(rowKey: string): Promise<T | undefined> {
    const row = this.rows.get(rowKey);
    return row ? { ...row } : undefined;
  }

  async replace(entity: T): Promise<void> {
    if (!this.rows.has(entity.rowKey)) {
      throw new NotFoundError(`Entity ${entity.rowKey} not found`);
    }
    this.rows.set(entity.rowKey, { ...entity });
  }

  async upsert(entity: T): Promise<void> {
    this.rows.set(entity.rowKey, { ...entity });
  }

  async delete(rowKey: string): Promise<void> {
    this.rows.delete(rowKey);
  }

  async list(filter?: EntityFilter<T>): Promise<T[]> {
    const conditions = filterEntries(filter);
    return [...this.rows.values()]
      .filter((row) => {
        const values = new Map(Object.entries(row));
        return conditions.every(([key, value]) => values.get(key) === value);
      })
      .map((row) => ({ ...row }));
  }
}

const isStatus = (error: unknown, status: number): boolean =>
  typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === status;

const quote = (value: string): string => `'${value.replace(/'/g, "''")}'`;

export const buildODataFilter = (partitionKey: string, filter?: object): string => {
  return [
    `PartitionKey eq ${quote(partitionKey)}`,
    ...filterEntries(filter).map(([key, value]) => `${key} eq ${quote(value)}`)
  ].join(' and ');
};

/**
 * Azure Table Storage backed table holding a single partition.
 */
export class AzureEntityTable<T extends { rowKey: string }> implements EntityTable<T> {
  private readonly client: TableClient;
  private readonly partitionKey: string;
  private ready?: Promise<void>;

  constructor(connectionString: string, tableName: string, partitionKey: string) {
    this.client = TableClient.fromConnectionString(connectionString, tableName);
    this.partitionKey = partitionKey;
  }

  async create(entity: T): Promise<void> {
    await this.ensureTable();
    await this.client.createEntity({ ...entity, partitionKey: this.partitionKey });
  }

  async get(rowKey: string): Promise<T | undefined> {
    await this.ensureTable();
    try {
      return await this.client.getEntity<T>(this.partitionKey, rowKey);
    } catch (error) {
      if (isStatus(error, 404)) {
        return undefined;
      }
      throw error;
    }
  }

  async replace(entity: T): Promise<void> {
    await this.ensureTable();
    try {
      await this.client.updateEntity({ ...entity, partitionKey: this.partitionKey }, 'Replace');
    } catch (error) {
      if (isStatus(error, 404)) {
        throw new NotFoundError(`Entity ${entity.rowKey} not found`, error);
      }
      throw error;
    }
  }

  async upsert(entity: T): Promise<void> {
    await this.ensureTable();
    await this.client.upsertEntity({ ...entity, partitionKey: this.partitionKey }, 'Replace');
  }

  async delete(rowKey: string): Promise<void> {
    await this.ensureTable();
    try {
      await this.client.deleteEntity(this.partitionKey, rowKey);
    } catch (error) {
      if (!isStatus(error, 404)) {
        throw error;
      }
    }
  }

  async list(filter?: EntityFilter<T>): Promise<T[]> {
    await this.ensureTable();
    const rows: T[] = [];
    const entities = this.client.listEntities<T>({
      queryOptions: { filter: buildODataFilter(this.partitionKey, filter) }
    });
    for await (const entity of entities) {
      rows.push(entity);
    }
    return rows;
  }

  private ensureTable(): Promise<void> {
    if (!this.ready) {
      this.ready = this.client.createTable().catch((error: unknown) => {
        this.ready = undefined;
        throw error;
      });
    }
    return this.ready;
  }
}
