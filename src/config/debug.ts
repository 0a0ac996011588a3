export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logParser: boolean;
  logBuilder: boolean;
  logSchema: boolean;
  logServer: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  switch (value.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'json' ? 'json' : defaultValue;
};

export function loadDebugConfig(): DebugConfig {
  const enabled = toBool(process.env.FLOWQ_DEBUG_MODE, false);

  // Level and format apply whether or not debug categories are enabled
  const logLevel = toLogLevel(process.env.FLOWQ_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(process.env.FLOWQ_LOG_FORMAT, 'pretty');

  if (!enabled) {
    return {
      enabled: false,
      logParser: false,
      logBuilder: false,
      logSchema: false,
      logServer: false,
      logLevel,
      logFormat,
    };
  }

  return {
    enabled: true,
    logParser: toBool(process.env.FLOWQ_DEBUG_PARSER, true),
    logBuilder: toBool(process.env.FLOWQ_DEBUG_BUILDER, true),
    logSchema: toBool(process.env.FLOWQ_DEBUG_SCHEMA, true),
    logServer: toBool(process.env.FLOWQ_DEBUG_SERVER, true),
    logLevel,
    logFormat,
  };
}
