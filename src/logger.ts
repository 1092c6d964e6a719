'use strict';

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level = 'info'): Logger {
  return pino({
    name: 'repo-steward',
    level,
  });
}

export function createChildLogger(
  logger: Logger,
  context: { deliveryId?: string; eventKind?: string; repo?: string; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
