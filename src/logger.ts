/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Root logger construction
 *
 * @packageDocumentation
 */

import winston, { Logger } from 'winston';

export interface LoggerOptions {
  level?: string;
  production?: boolean;
}

/**
 * Create the process-wide logger. Components receive it, or a child of it,
 * through their constructors.
 */
export function createRootLogger(options: LoggerOptions = {}): Logger {
  const production = options.production ?? process.env.NODE_ENV === 'production';

  const format = production
    ? winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      )
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, service }) => {
          const prefix = service ? `[${String(service)}] ` : '';
          return `${String(timestamp)} ${level} ${prefix}${String(message)}`;
        }),
      );

  return winston.createLogger({
    level: options.level ?? 'info',
    format,
    defaultMeta: { service: 'rag-chatbot' },
    transports: [new winston.transports.Console()],
  });
}
