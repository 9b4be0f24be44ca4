import { Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { DataSource, getMetadataArgsStorage } from 'typeorm';

import { EntityRegistry } from '../decorators';
import { ResourceError } from '../errors';
import { DbConnection } from '../types/connection';
import { DbContextOptions } from '../types/options';
import { QueryRunnerConnection } from './connection';

/**
 * DbContext class for managing the data source and handing out connections
 */
export class DbContext {
  private readonly logger = new Logger(DbContext.name);
  private dataSource?: DataSource;
  private readonly connectionLock = new Mutex();
  private readonly options: DbContextOptions;

  constructor(options: DbContextOptions) {
    this.options = options;
  }

  get isInitialized(): boolean {
    return this.dataSource?.isInitialized ?? false;
  }

  get database(): string {
    return this.options.database;
  }

  /**
   * Initializes the database connection
   */
  async initialize(): Promise<void> {
    if (this.dataSource) return;

    const dataSource = new DataSource({
      type: this.options.type,
      database: this.options.database,
      entities: this.resolveEntities(),
      synchronize: this.options.synchronize ?? false,
      logging: this.options.enableLogging ?? false
    });
    await dataSource.initialize();
    this.dataSource = dataSource;

    this.logger.log(
      `Initialized '${this.options.database}' with entities: ${dataSource.entityMetadatas.map(m => m.name).join(', ')}`
    );
  }

  /**
   * Combines configured and decorator-registered entities, skipping
   * duplicate classes and duplicate table names
   */
  private resolveEntities(): Function[] {
    const entities = new Set<Function>();
    const tableNames = new Set<string>();

    const addEntity = (entity: Function) => {
      if (entities.has(entity)) return;

      const tableName = this.getEntityTableName(entity);
      if (tableNames.has(tableName)) {
        this.logger.warn(`Duplicate table name '${tableName}' detected for entity '${entity.name}'. Skipping duplicate.`);
        return;
      }

      entities.add(entity);
      tableNames.add(tableName);
    };

    (this.options.entities ?? []).forEach(addEntity);
    EntityRegistry.getRegisteredEntities().forEach(addEntity);

    return Array.from(entities);
  }

  /**
   * Gets the table name for an entity
   */
  private getEntityTableName(entity: Function): string {
    const table = getMetadataArgsStorage().tables.find(args => args.target === entity);
    return table?.name ?? entity.name.toLowerCase();
  }

  /**
   * Creates a new, unopened connection. Each scope gets its own; an opened
   * connection has the database to itself until it is closed, so other
   * connections wait in `open()`.
   */
  createConnection(): DbConnection {
    return new QueryRunnerConnection(this.getDataSource().createQueryRunner(), this.options.database, this.connectionLock);
  }

  /**
   * Gets the underlying DataSource
   */
  getDataSource(): DataSource {
    if (!this.dataSource) {
      throw new ResourceError(`DbContext for '${this.options.database}' has not been initialized`);
    }
    return this.dataSource;
  }

  /**
   * Disposes the database connection
   */
  async dispose(): Promise<void> {
    const dataSource = this.dataSource;
    this.dataSource = undefined;
    if (dataSource?.isInitialized) {
      await dataSource.destroy();
    }
  }
}
