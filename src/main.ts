#!/usr/bin/env node
import 'reflect-metadata';
// Load environment variables before the logger reads LOG_LEVEL
import 'dotenv/config';

import { DIContainer } from './shared/container';
import { DatabaseModule } from './infrastructure/database/database.module';
import { Logger } from './shared/logger';
import { loadConfig, loadSecrets } from './shared/config';
import { registerDependencies } from './app.container';
import { ScreenerApp } from './app';

const logger = new Logger('Main');

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

async function bootstrap(): Promise<number> {
  try {
    const config = loadConfig(process.argv[2]);
    const dataSource = await DatabaseModule.initialize(config.database.path);

    const container = DIContainer.getInstance();
    registerDependencies(container, { config, secrets: loadSecrets(), dataSource });

    const app = container.get(ScreenerApp);
    const result = await app.run();
    logger.info(`Screener run ended with status ${result.status}`);
    return 0;
  } catch (error) {
    logger.error('Screener run failed:', error);
    return 1;
  } finally {
    await DatabaseModule.close();
  }
}

bootstrap().then((code) => process.exit(code));
