import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

/**
 * Validate required environment variables at startup
 */
function validateEnvironment(): void {
  const logger = new Logger('Environment');
  const requiredVars = ['NODE_ENV'];

  const missing = requiredVars.filter((varName) => !process.env[varName]);

  if (missing.length > 0) {
    logger.error(
      `Missing required environment variables: ${missing.join(', ')}`,
    );
    process.exit(1);
  }

  logger.log(
    `Environment variables validated. Running in ${process.env.NODE_ENV} mode.`,
  );
}

async function bootstrap() {
  // No HTTP surface: the process only hosts the scheduler and the ledgers.
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  const logger = new Logger('Bootstrap');
  logger.log('Entitlements worker started');
}

(async () => {
  validateEnvironment();
  await bootstrap();
})();
