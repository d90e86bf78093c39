/**
 * Logger that records messages by level.
 */
import type { Logger } from '../../src/logger';

export interface RecordingLogger extends Logger {
  messages: Record<'log' | 'verbose' | 'warn' | 'error' | 'progress', string[]>;
}

export function createRecordingLogger(): RecordingLogger {
  const messages: RecordingLogger['messages'] = {
    log: [],
    verbose: [],
    warn: [],
    error: [],
    progress: [],
  };

  return {
    messages,
    log: (message) => messages.log.push(message),
    verbose: (message) => messages.verbose.push(message),
    warn: (message) => messages.warn.push(message),
    error: (message) => messages.error.push(message),
    progress: (message) => messages.progress.push(message),
  };
}
