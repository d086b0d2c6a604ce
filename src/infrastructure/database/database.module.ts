import { DataSource } from 'typeorm';
import { RegimeLog } from '../../domain/entities/regime-log.entity';
import { Signal } from '../../domain/entities/signal.entity';
import { Logger } from '../../shared/logger';

const logger = new Logger('DatabaseModule');

/**
 * sql.js keeps the database in memory; with a `location` it is loaded from
 * and saved back to that file after every write.
 */
export function createDataSource(location: string | null): DataSource {
  return new DataSource({
    type: 'sqljs',
    location: location ?? undefined,
    autoSave: location !== null,
    synchronize: true,
    logging: false,
    entities: [RegimeLog, Signal],
    migrations: [],
    subscribers: [],
  });
}

export class DatabaseModule {
  private static dataSource: DataSource | null = null;

  static async initialize(database: string): Promise<DataSource> {
    if (DatabaseModule.dataSource?.isInitialized) return DatabaseModule.dataSource;
    try {
      const dataSource = createDataSource(database);
      await dataSource.initialize();
      DatabaseModule.dataSource = dataSource;
      logger.info(`Database connection established (${database})`);
      return dataSource;
    } catch (error) {
      logger.error('Database connection failed:', error);
      throw error;
    }
  }

  static async close(): Promise<void> {
    if (DatabaseModule.dataSource?.isInitialized) {
      await DatabaseModule.dataSource.destroy();
    }
    DatabaseModule.dataSource = null;
  }
}
