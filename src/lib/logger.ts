import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  file?: string;
}

// fd 2: stdout belongs to command output such as `discover --json`
const STDERR = 2;

export function loggerTargets(level: string, file: string | undefined, pretty: boolean): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [];
  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        destination: STDERR
      }
    });
  } else {
    targets.push({ target: 'pino/file', level, options: { destination: STDERR } });
  }

  if (file) {
    targets.push({ target: 'pino/file', level, options: { destination: file, mkdir: true } });
  }
  return targets;
}

// pretty output outside production, optional copy to a file.
// built once by the cli and handed to every component
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level || process.env.LOG_LEVEL || 'info';
  const pretty = process.env.NODE_ENV !== 'production';

  return pino({
    level,
    transport: { targets: loggerTargets(level, options.file, pretty) }
  });
}
