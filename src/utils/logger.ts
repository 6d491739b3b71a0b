import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { ConfigLoader } from './configLoader';

const configLoader = ConfigLoader.getInstance();
const loggingConfig = configLoader.getLoggingConfig();

const createFileTransports = (logsDir: string) => {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  return [
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error'
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log')
    }),
  ];
};

// File output only when a log directory is configured
const fileTransports = loggingConfig.directory ? createFileTransports(loggingConfig.directory) : [];

const logger = winston.createLogger({
  level: loggingConfig.level || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  defaultMeta: { service: 'hls-playlist' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp }) => {
          return `${timestamp} ${level}: ${message}`;
        })
      ),
    }),
    ...fileTransports,
  ],
});

export function reloadLoggerConfig(): void {
  const refreshedConfig = configLoader.reloadConfig();
  const logLevel = refreshedConfig.logging.level || 'info';

  logger.level = logLevel;
  logger.info(`Logger configuration reloaded. Log level set to: ${logLevel}`);
}

export default logger;
