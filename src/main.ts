import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { EMPLOYEE_REPOSITORY, EmployeeRepository } from './domain/repositories';
import { LOGGER_SERVICE } from './domain/services';
import { LoggerService } from './infrastructure/logger';
import { EmployeeCli, ReadlineConsole } from './presentation/cli';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  const logger = await app.resolve<LoggerService>(LOGGER_SERVICE);
  app.useLogger(logger);
  app.enableShutdownHooks();

  await app.get<EmployeeRepository>(EMPLOYEE_REPOSITORY).ensureStore();

  const io = new ReadlineConsole();
  try {
    await app.get(EmployeeCli).run(io);
  } finally {
    io.close();
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  const logger = new LoggerService('Main');
  logger.error('Application failed', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
