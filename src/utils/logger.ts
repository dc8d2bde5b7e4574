/**
 * Logger module wrapping pino.
 * Provides child loggers per module with automatic redaction of secrets.
 * Everything goes to stderr: stdout belongs to MCP framing and CLI output.
 */

import pino from 'pino';

const REDACT_PATHS = [
  'apiKey', 'token', 'secret', 'password',
  'api_key', 'api_token', 'access_token', 'refresh_token',
  '*.apiKey', '*.token', '*.secret', '*.password',
  '*.api_key', '*.api_token', '*.access_token', '*.refresh_token',
];

/** Create the root logger instance */
function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL ?? process.env.TOOLWARDEN_LOG_LEVEL ?? 'info';
  const options: pino.LoggerOptions = {
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (process.env.NODE_ENV !== 'production') {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    });
  }

  return pino(options, pino.destination(2));
}

/** Root logger instance */
export const logger = createLogger();

/** Create a child logger for a specific module */
export function createModuleLogger(moduleName: string): pino.Logger {
  return logger.child({ module: moduleName });
}

/** Pre-built module loggers for core subsystems */
export const securityLogger = createModuleLogger('security');
export const executionLogger = createModuleLogger('execution');
export const registryLogger = createModuleLogger('registry');
export const auditEventLogger = createModuleLogger('audit');
export const gatewayLogger = createModuleLogger('gateway');
export const persistenceLogger = createModuleLogger('persistence');
