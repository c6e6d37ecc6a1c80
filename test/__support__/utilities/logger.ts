import { Writable } from 'stream';
import pino, { type Logger } from 'pino';

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

const isCapturedLog = (value: unknown): value is CapturedLog =>
  typeof value === 'object' &&
  value !== null &&
  'level' in value &&
  typeof value.level === 'number' &&
  'msg' in value &&
  typeof value.msg === 'string';

/**
 * pino logger writing parsed lines into an array instead of stdout
 */
export function createCapturingLogger(level = 'debug'): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const parsed: unknown = JSON.parse(chunk.toString());
      if (isCapturedLog(parsed)) {
        lines.push(parsed);
      }
      callback();
    },
  });

  return { logger: pino({ level }, stream), lines };
}

/** pino's numeric level for `warn` */
export const WARN_LEVEL = 40;
