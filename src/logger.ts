import winston from 'winston';

const createLogger = () => winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? 'warn',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.splat(),
    winston.format.printf((info) => `${info['timestamp']} ${info.level}: ${info.message}`),
  ),
});

const logger = createLogger();
logger.add(new winston.transports.Console({ stderrLevels: ['error', 'warn'] }));

export default logger;
