import { loadConfig } from '@race/config';
import { createPinoLogger, type LoggerPort, type LogLevel, toError } from '@race/domain';

let globalRootLogger: LoggerPort | null = null;

export function initializeRootLogger(config: { logLevel?: LogLevel; traceErrors?: boolean }): LoggerPort {
  globalRootLogger = createPinoLogger({
    ...(config.logLevel ? { level: config.logLevel } : {}),
    traceErrors: config.traceErrors,
  });
  return globalRootLogger;
}

function initializeFromConfigFile(): LoggerPort {
  try {
    const { config } = loadConfig();
    return initializeRootLogger({
      logLevel: config.telemetry.logLevel,
      traceErrors: config.telemetry.traceErrors,
    });
  } catch (error) {
    const root = initializeRootLogger({});
    root.debug(`Logger settings unavailable, using defaults: ${toError(error).message}`);
    return root;
  }
}

export function createChildLogger(name: string): LoggerPort {
  const root = globalRootLogger ?? initializeFromConfigFile();
  return root.child({ name });
}
