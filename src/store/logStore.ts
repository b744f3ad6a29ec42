/**
 * Log Store - recent log entries for a log panel
 *
 * Mirrors the logger's ring buffer and follows new entries through
 * `logger.subscribe`. Call `detach` when the panel goes away.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import { type LogEntry, type LogLevel, type Logger, logger } from '@/services/utils/logger';

interface LogState {
  logs: LogEntry[];
  errorCount: number;
}

interface LogActions {
  setLevel: (level: LogLevel) => void;
  clear: () => void;
  detach: () => void;
}

export type LogStore = LogState & LogActions;

const countErrors = (logs: LogEntry[]) => logs.filter((entry) => entry.level === 'ERROR').length;

export const createLogStore = (source: Logger = logger) => {
  const initialLogs = source.getLogs();

  const store = createStore<LogStore>()(
    subscribeWithSelector((set) => ({
      logs: initialLogs,
      errorCount: countErrors(initialLogs),

      setLevel: (level) => source.setLevel(level),

      clear: () => {
        source.clear();
        set({ logs: [], errorCount: 0 });
      },

      detach: () => unsubscribe(),
    }))
  );

  const unsubscribe = source.subscribe(() => {
    const logs = source.getLogs();
    store.setState({ logs, errorCount: countErrors(logs) });
  });

  return store;
};
