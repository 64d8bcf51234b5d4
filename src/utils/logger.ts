import winston from 'winston';

export interface LoggerOptions {
  level?: string | undefined;
  name: string;
  logFile?: string | undefined;
  silent?: boolean | undefined;
}

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export function createLogger(options: LoggerOptions): winston.Logger {
  const {
    level = process.env['PORTSWEEP_LOG_LEVEL'] ?? 'warn',
    name,
    logFile = process.env['PORTSWEEP_LOG_FILE'],
    silent = false,
  } = options;

  // Diagnostics go to stderr; stdout is reserved for the scan report
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
  ];

  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} ${level.toUpperCase()} [${name}] ${String(message)}${metaStr}`;
      })
    ),
    transports,
  });
}

export function createSilentLogger(name = 'test'): winston.Logger {
  return createLogger({ name, silent: true });
}
