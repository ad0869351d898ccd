import winston from 'winston';

const LOG_FILE = process.env.LOG_FILE;

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (LOG_FILE && LOG_FILE.trim() !== '') {
  transports.push(new winston.transports.File({ filename: `${LOG_FILE.trim()}.error.log`, level: 'error' }));
  transports.push(new winston.transports.File({ filename: `${LOG_FILE.trim()}.log` }));
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
