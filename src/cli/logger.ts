import path from 'node:path';
import pino from 'pino';
import { ui } from './ui.js';
import { isTestEnv } from '../util/env.js';

type Data = Record<string, unknown>;

export type ScopedLogger = {
  info: (msg: string, data?: Data) => void;
  warn: (msg: string, data?: Data) => void;
  error: (msg: string, data?: Data) => void;
  debug: (msg: string, data?: Data) => void;
};

const level = process.env.LOG_LEVEL || 'info';
const file = process.env.LOG_FILE || path.resolve('logs', 'roulette.ndjson');

// Jest runs stay off the filesystem.
const logger = isTestEnv()
  ? pino({ level: 'silent' })
  : pino({ level, base: undefined }, pino.destination({ dest: file, mkdir: true, sync: false }));

function info(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'info');
  logger.info({ ts: Date.now(), scope, data }, msg);
}
function warn(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'warn');
  logger.warn({ ts: Date.now(), scope, data }, msg);
}
function error(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'error');
  logger.error({ ts: Date.now(), scope, data }, msg);
}
function debug(msg: string, scope?: string, data?: Data) {
  if (level === 'debug') ui.say(msg, 'dim');
  logger.debug({ ts: Date.now(), scope, data }, msg);
}

function withScope(scope: string): ScopedLogger {
  return {
    info: (msg, data) => info(msg, scope, data),
    warn: (msg, data) => warn(msg, scope, data),
    error: (msg, data) => error(msg, scope, data),
    debug: (msg, data) => debug(msg, scope, data),
  };
}

export const log = { info, warn, error, debug, withScope };
export default log;
