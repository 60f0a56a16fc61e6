export { LoggerService, parseLogLevels } from './custom-logger.service';
export { loggerProviders } from './logger.providers';
