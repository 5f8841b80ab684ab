import pino from 'pino';
import type { EnvConfig } from '../config/env.js';
import { shortAddress } from '../services/format.js';

/** Sender ids and wallet addresses are masked; token addresses are logged as-is. */
export const REDACTED_PATHS = ['sender', 'walletAddress', 'headers.authorization'];

export function maskIdentity(value: unknown): string {
  return typeof value === 'string' && value.length > 12 ? shortAddress(value) : '[REDACTED]';
}

export function createLogger(
  config: Pick<EnvConfig, 'LOG_LEVEL' | 'NODE_ENV'>,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: 'trade-journal',
    level: config.LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    redact: {
      paths: REDACTED_PATHS,
      censor: maskIdentity,
    },
  };

  if (destination) return pino(options, destination);

  return pino(
    config.NODE_ENV === 'development'
      ? { ...options, transport: { target: 'pino/file', options: { destination: 1 } } }
      : options,
  );
}

export type Logger = pino.Logger;
