import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'evidence-rag-service';
const logDir = process.env.LOG_DIR || join(process.cwd(), 'logs');

function buildStreams(): Parameters<typeof multistream>[0] {
  mkdirSync(logDir, { recursive: true });

  return [
    // Console output with pretty formatting
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
    // File output with JSON formatting
    {
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    },
  ];
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        'apiKey',
        'token',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => {
        return {
          id: req.id,
          method: req.method,
          url: req.url,
        };
      },
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = req.url || '';
        return url === '/query/health';
      },
    },

    genReqId: (req: IncomingMessage) => {
      const requestId = req.headers['x-request-id'];
      return typeof requestId === 'string' ? requestId : `req-${uuidv4()}`;
    },

    customProps: (req: IncomingMessage) => {
      const requestId = req.headers['x-request-id'];
      return {
        requestId: typeof requestId === 'string' ? requestId : req.id,
      };
    },

    // Write logs to both console (pretty) and file (JSON)
    stream: multistream(buildStreams()),
  },
};
