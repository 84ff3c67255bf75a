/**
 * Relay Logger
 *
 * Structured log entries for the relay server and executor.
 *
 * Features:
 * - Structured log entries with categories
 * - In-memory buffer for recent logs
 * - Subscriber pattern for streaming entries elsewhere
 * - Console sink with a minimum level
 */

export type RelayLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type RelayLogCategory =
  | 'CONFIG'
  | 'SERVER'
  | 'POLL'
  | 'DISPATCH'
  | 'ACTION'
  | 'FINALIZE'
  | 'TRANSPORT'
  | 'DECODE';

export interface RelayLogEntry {
  timestamp: string;
  level: RelayLogLevel;
  category: RelayLogCategory;
  message: string;
  details?: Record<string, unknown>;
  commandId?: string;
}

export interface RelayLogSubscriber {
  onLog(entry: RelayLogEntry): void;
}

export interface RelayLoggerOptions {
  /** Max buffered entries (default: 1000) */
  maxEntries?: number;
  /** Write entries to stdout/stderr (default: true) */
  console?: boolean;
  /** Lowest level written to the console (default: info) */
  minLevel?: RelayLogLevel;
}

const LEVEL_ORDER: Record<RelayLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console prefix per category, e.g. "[Dispatcher] ..."
 */
const CATEGORY_LABELS: Record<RelayLogCategory, string> = {
  CONFIG: 'Config',
  SERVER: 'RelayServer',
  POLL: 'Poller',
  DISPATCH: 'Dispatcher',
  ACTION: 'Action',
  FINALIZE: 'Finalize',
  TRANSPORT: 'Network',
  DECODE: 'Decode',
};

export class RelayLogger {
  private entries: RelayLogEntry[] = [];
  private subscribers: Set<RelayLogSubscriber> = new Set();
  private readonly maxEntries: number;
  private readonly consoleEnabled: boolean;
  private readonly minLevel: RelayLogLevel;

  constructor(options: RelayLoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.consoleEnabled = options.console ?? true;
    this.minLevel = options.minLevel ?? 'info';
  }

  log(
    level: RelayLogLevel,
    category: RelayLogCategory,
    message: string,
    options: { details?: Record<string, unknown>; commandId?: string } = {}
  ): RelayLogEntry {
    const entry: RelayLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      commandId: options.commandId,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    if (this.consoleEnabled && LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel]) {
      this.writeConsole(entry);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (error) {
        // Subscriber failures are reported, not rethrown
        // eslint-disable-next-line no-console
        console.error('[RelayLogger] Subscriber failed:', error);
      }
    }

    return entry;
  }

  debug(category: RelayLogCategory, message: string, options?: { details?: Record<string, unknown>; commandId?: string }): RelayLogEntry {
    return this.log('debug', category, message, options);
  }

  info(category: RelayLogCategory, message: string, options?: { details?: Record<string, unknown>; commandId?: string }): RelayLogEntry {
    return this.log('info', category, message, options);
  }

  warn(category: RelayLogCategory, message: string, options?: { details?: Record<string, unknown>; commandId?: string }): RelayLogEntry {
    return this.log('warn', category, message, options);
  }

  error(category: RelayLogCategory, message: string, options?: { details?: Record<string, unknown>; commandId?: string }): RelayLogEntry {
    return this.log('error', category, message, options);
  }

  private writeConsole(entry: RelayLogEntry): void {
    const prefix = `[${CATEGORY_LABELS[entry.category]}]`;
    const line = entry.commandId
      ? `${prefix} ${entry.commandId}: ${entry.message}`
      : `${prefix} ${entry.message}`;

    /* eslint-disable no-console */
    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
    /* eslint-enable no-console */
  }

  subscribe(subscriber: RelayLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  getEntries(): RelayLogEntry[] {
    return [...this.entries];
  }

  getCommandEntries(commandId: string): RelayLogEntry[] {
    return this.entries.filter(e => e.commandId === commandId);
  }

  getEntriesByCategory(category: RelayLogCategory): RelayLogEntry[] {
    return this.entries.filter(e => e.category === category);
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Logger that only buffers (used by tests and embedded callers)
 */
export function createSilentLogger(): RelayLogger {
  return new RelayLogger({ console: false });
}
