import pino from 'pino';
import { config } from '../config/env';

function buildTransport(): pino.TransportMultiOptions | undefined {
  if (config.NODE_ENV === 'test') return undefined;

  const targets: pino.TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level: config.LOG_LEVEL,
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    },
  ];

  if (config.LOG_FILE) {
    targets.push({
      target: 'pino/file',
      level: config.LOG_LEVEL,
      options: { destination: config.LOG_FILE, mkdir: true },
    });
  }

  return { targets };
}

export const logger = pino({
  level: config.LOG_LEVEL,
  base: {
    env: config.NODE_ENV,
    service: 'persona-relay-bot',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.Authorization',
      '*.password',
      '*.token',
      '*.apiKey',
      '*.secret',
      'config.OPENAI_API_KEY',
      'config.DISCORD_BOT_TOKEN',
    ],
    remove: true,
  },
  transport: buildTransport(),
});
