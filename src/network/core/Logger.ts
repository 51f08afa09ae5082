/**
 * Logger - Pub/Sub event system for routing diagnostics
 *
 * Topology discovery, LSDB builds and SPF runs publish events
 * (router:discover, lsdb:build, spf:run, ...). Subscribers can listen to
 * all events or filter by source (node ID or component), event prefix or level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface RoutingLog {
  timestamp: number;
  level: LogLevel;
  source: string;        // node ID or component that emitted the event
  event: string;         // namespaced event name (e.g. "router:discover", "spf:run")
  message: string;       // human-readable description
  data?: Record<string, unknown>; // optional structured data
}

export type LogSubscriber = (log: RoutingLog) => void;

interface Subscription {
  id: number;
  subscriber: LogSubscriber;
  filter?: {
    source?: string;
    event?: string;
    level?: LogLevel;
  };
}

class LoggerSingleton {
  private subscriptions: Subscription[] = [];
  private nextId = 1;
  private logs: RoutingLog[] = [];
  private maxLogs = 10000;
  private minLevel: LogLevel = 'debug';

  /**
   * Publish a log event
   */
  log(level: LogLevel, source: string, event: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: RoutingLog = {
      timestamp: Date.now(),
      level,
      source,
      event,
      message,
      data,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs / 2);
    }

    for (const sub of this.subscriptions) {
      if (sub.filter) {
        if (sub.filter.source && sub.filter.source !== source) continue;
        if (sub.filter.event && !event.startsWith(sub.filter.event)) continue;
        if (sub.filter.level && sub.filter.level !== level) continue;
      }
      sub.subscriber(entry);
    }
  }

  debug(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', source, event, message, data);
  }

  info(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', source, event, message, data);
  }

  warn(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', source, event, message, data);
  }

  error(source: string, event: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', source, event, message, data);
  }

  /**
   * Drop events below the given level (neither stored nor published)
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Subscribe to log events with optional filter
   */
  subscribe(subscriber: LogSubscriber, filter?: Subscription['filter']): number {
    const id = this.nextId++;
    this.subscriptions.push({ id, subscriber, filter });
    return id;
  }

  unsubscribe(id: number): void {
    this.subscriptions = this.subscriptions.filter(s => s.id !== id);
  }

  getLogs(): RoutingLog[] {
    return [...this.logs];
  }

  getLogsBySource(source: string): RoutingLog[] {
    return this.logs.filter(l => l.source === source);
  }

  getLogsByEvent(eventPrefix: string): RoutingLog[] {
    return this.logs.filter(l => l.event.startsWith(eventPrefix));
  }

  /**
   * Clear all logs and subscriptions, restore the default level
   */
  reset(): void {
    this.logs = [];
    this.subscriptions = [];
    this.nextId = 1;
    this.minLevel = 'debug';
  }
}

export const Logger = new LoggerSingleton();
