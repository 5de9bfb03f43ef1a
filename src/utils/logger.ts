export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export const log = (level: LogLevel, msg: string, meta?: unknown): void => {
  const line = `[${new Date().toISOString()}] [${level}] ${msg}`;
  const write = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
  if (meta !== undefined) {
    write(line, meta);
  } else {
    write(line);
  }
};
