import type { Logger } from '../../src/server/logger.js';

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  context: string;
  message: string;
  data?: unknown;
}

export function recordingLogger(): Logger & { entries: LogEntry[]; messages(level: LogEntry['level']): string[] } {
  const entries: LogEntry[] = [];
  const push = (level: LogEntry['level']) => (context: string, message: string, data?: unknown) => {
    entries.push({ level, context, message, data });
  };
  return {
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error')
  };
}
