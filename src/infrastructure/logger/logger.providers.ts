import { Provider, Scope } from '@nestjs/common';
import { INQUIRER } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { LOGGER_SERVICE } from '@/domain/services';
import { LoggerService, parseLogLevels } from './custom-logger.service';

/**
 * Providers for logger service dependency injection.
 * Maps the LOGGER_SERVICE token to the concrete implementation.
 *
 * Uses Scope.TRANSIENT so every consumer gets its own instance,
 * labelled with the consumer's class name.
 */
export const loggerProviders: Provider[] = [
  {
    provide: LOGGER_SERVICE,
    useFactory: (parent: object | undefined, configService: ConfigService) => {
      const context = parent?.constructor?.name ?? '';
      return new LoggerService(context, parseLogLevels(configService.get<string>('LOG_LEVELS')));
    },
    inject: [INQUIRER, ConfigService],
    scope: Scope.TRANSIENT,
  },
];
