import { Params } from 'nestjs-pino';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'justiq-indexing';
const logDir = process.env.LOG_DIR;

if (logDir) {
  mkdirSync(logDir, { recursive: true });
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    // Console (pretty outside production) and, when LOG_DIR is set, a JSON file
    stream: multistream([
      {
        level: 'info',
        stream:
          process.env.NODE_ENV !== 'production'
            ? pinoPretty({
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
                singleLine: false,
              })
            : process.stdout,
      },
      ...(logDir
        ? [
            {
              level: 'debug' as const,
              stream: createWriteStream(join(logDir, `${serviceName}.log`), {
                flags: 'a',
              }),
            },
          ]
        : []),
    ]),
  },
};
