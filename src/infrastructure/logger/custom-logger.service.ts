import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';
import type { ILogger, LogContext } from '@/domain/services';

const KNOWN_LEVELS: readonly LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'];

/**
 * Parses a comma-separated level list such as `log,warn,error`.
 * Unknown names are ignored; an empty result falls back to the default levels.
 */
export function parseLogLevels(value: string | undefined): LogLevel[] {
  const levels = (value ?? '')
    .split(',')
    .map((level) => level.trim().toLowerCase())
    .filter((level): level is LogLevel => KNOWN_LEVELS.some((known) => known === level));

  return levels.length > 0 ? levels : ['warn', 'error'];
}

function isLogContext(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Console logger that accepts a metadata object as second argument.
 * Metadata is JSON-appended to the message and prefixed with the calling method name.
 * Plain string arguments keep Nest's `(message, context)` semantics for framework logs.
 */
@Injectable()
export class LoggerService extends ConsoleLogger implements ILogger {
  constructor(context: string = '', logLevels?: LogLevel[]) {
    super(context, logLevels ? { logLevels } : {});
  }

  log(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.context) {
      super.log(formatted.message, formatted.context);
    } else {
      super.log(formatted.message);
    }
  }

  error(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.stack) {
      super.error(formatted.message, formatted.stack, formatted.context ?? this.context);
    } else if (formatted.context) {
      super.error(formatted.message, formatted.context);
    } else {
      super.error(formatted.message);
    }
  }

  warn(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.context) {
      super.warn(formatted.message, formatted.context);
    } else {
      super.warn(formatted.message);
    }
  }

  debug(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.context) {
      super.debug(formatted.message, formatted.context);
    } else {
      super.debug(formatted.message);
    }
  }

  private formatWithMethod(
    message: string,
    optionalParams: unknown[],
  ): { message: string; context?: string; stack?: string } {
    const [first, second, third] = optionalParams;

    if (isLogContext(first)) {
      const parts: string[] = [];
      const methodName = this.getCallerMethodName();
      if (methodName) {
        parts.push(`[${methodName}]`);
      }

      // A `stack` entry is printed by Nest on its own lines instead of inside the JSON.
      const { stack, ...metadata } = first;
      parts.push(String(message));
      if (Object.keys(metadata).length > 0) {
        parts.push(JSON.stringify(metadata));
      }

      return {
        message: parts.join(' '),
        context: typeof second === 'string' ? second : undefined,
        stack: typeof stack === 'string' ? stack : typeof third === 'string' ? third : undefined,
      };
    }

    // Framework logs: (message, context) or (message, stack, context)
    return {
      message: String(message),
      context: typeof first === 'string' ? first : undefined,
      stack: typeof second === 'string' ? second : undefined,
    };
  }

  private getCallerMethodName(): string {
    const stack = new Error().stack;
    if (!stack) return '';

    for (const line of stack.split('\n')) {
      if (line.includes('Logger')) {
        continue;
      }

      // "    at ClassName.methodName (/path/to/file.ts:line:column)"
      const match = line.match(/at\s+(?:(\w+)\.)?(\w+)\s+\(/);
      if (match) {
        return match[2];
      }
    }

    return '';
  }
}
