import pino from 'pino';
import pretty from 'pino-pretty';

import { getConfig } from './config';


export interface ILogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  child(bindings: Record<string, unknown>): ILogger;
}

export const makeLogger = (level: pino.LevelWithSilent = 'info', prettify = false): ILogger =>
  prettify
    ? pino({ level }, pretty({ colorize: true, translateTime: 'HH:MM:ss.l', sync: true }))
    : pino({ level });

let root: ILogger | null = null;

/** child logger of the process wide root logger, tagged with the component name */
export function getLogger(component: string): ILogger {
  if (root === null) {
    const config = getConfig();
    root = makeLogger(config.LOG_LEVEL, config.LOG_PRETTY);
  }
  return root.child({ component });
}
