import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { LoggerService } from './shared/logger/logger.service';
import { MatchingService } from './modules/matching/services/matching.service';

/**
 * One-shot matching run: boots the application context without HTTP,
 * forms and stores groups for every course, then exits.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const logger = app.get(LoggerService);
  app.useLogger(logger);

  try {
    const result = await app.get(MatchingService).run();

    if (result.size === 0) {
      logger.log('No enrolled students, nothing to match', 'Matching');
    }
    for (const [courseId, groups] of result) {
      logger.log(
        `Course ${courseId}: ${groups.map((g) => `[${g.join(', ')}]`).join(' ')}`,
        'Matching',
      );
    }

    await app.close();
    process.exit(0);
  } catch (error) {
    logger.error('Matching run failed:', error, 'Matching');
    await app.close();
    process.exit(1);
  }
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
