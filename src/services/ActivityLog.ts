import { createHmac, randomBytes } from 'crypto';
import { ActivityEvent, EventDetails, LOG_LEVELS, LogLevel } from '../models/ActivityEvent';

export interface ConsoleSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ActivityLogOptions {
  level?: LogLevel;
  echo?: boolean;
  maxEvents?: number;
  signingKey?: Buffer;
  sink?: ConsoleSink;
}

export interface ActivityEventFilter {
  since?: Date;
  until?: Date;
  level?: LogLevel;
  component?: string;
}

const DEFAULT_MAX_EVENTS = 5000;

/**
 * Activity Log provides level-filtered, tamper-evident structured logging.
 * Events are appended with an HMAC signature and optionally echoed to the console.
 */
export class ActivityLog {
  private events: ActivityEvent[] = [];
  private level: LogLevel;
  private readonly echo: boolean;
  private readonly maxEvents: number;
  private readonly signingKey: Buffer;
  private readonly sink: ConsoleSink;

  constructor(options: ActivityLogOptions = {}) {
    this.level = options.level ?? 'info';
    this.echo = options.echo ?? false;
    this.maxEvents = options.maxEvents ?? DEFAULT_MAX_EVENTS;
    // Per-process key unless one is supplied
    this.signingKey = options.signingKey ?? randomBytes(32);
    this.sink = options.sink ?? console;
  }

  /**
   * Records an event; returns its id, or null when below the configured level
   */
  log(level: LogLevel, eventType: string, component: string, details: EventDetails = {}): string | null {
    if (!this.isEnabled(level)) {
      return null;
    }

    const unsigned: Omit<ActivityEvent, 'signature'> = {
      eventId: randomBytes(16).toString('hex'),
      timestamp: new Date(),
      level,
      eventType,
      component,
      details: { ...details }
    };
    const event: ActivityEvent = { ...unsigned, signature: this.generateSignature(unsigned) };

    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events = this.events.slice(-this.maxEvents);
    }

    if (this.echo) {
      this.echoEvent(event);
    }

    return event.eventId;
  }

  debug(eventType: string, component: string, details?: EventDetails): string | null {
    return this.log('debug', eventType, component, details);
  }

  info(eventType: string, component: string, details?: EventDetails): string | null {
    return this.log('info', eventType, component, details);
  }

  warn(eventType: string, component: string, details?: EventDetails): string | null {
    return this.log('warn', eventType, component, details);
  }

  error(eventType: string, component: string, details?: EventDetails): string | null {
    return this.log('error', eventType, component, details);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Exports copies of matching events, oldest first
   */
  exportEvents(filter: ActivityEventFilter = {}): ActivityEvent[] {
    const minimumRank = filter.level ? LOG_LEVELS.indexOf(filter.level) : 0;

    return this.events
      .filter(event => {
        if (filter.since && event.timestamp < filter.since) return false;
        if (filter.until && event.timestamp > filter.until) return false;
        if (filter.component && event.component !== filter.component) return false;
        return LOG_LEVELS.indexOf(event.level) >= minimumRank;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  /**
   * Verifies every stored event against its signature
   */
  verifyIntegrity(): boolean {
    return this.events.every(event => {
      const { signature, ...unsigned } = event;
      return signature === this.generateSignature(unsigned);
    });
  }

  getEventCount(): number {
    return this.events.length;
  }

  private generateSignature(event: Omit<ActivityEvent, 'signature'>): string {
    const signingData = {
      eventId: event.eventId,
      timestamp: event.timestamp.toISOString(),
      level: event.level,
      eventType: event.eventType,
      component: event.component,
      details: JSON.stringify(event.details, Object.keys(event.details).sort())
    };

    const dataString = JSON.stringify(signingData, Object.keys(signingData).sort());
    return createHmac('sha256', this.signingKey).update(dataString).digest('hex');
  }

  private echoEvent(event: ActivityEvent): void {
    const line = `[${event.timestamp.toISOString()}] ${event.level.toUpperCase()} ${event.component} ${event.eventType} ${JSON.stringify(event.details)}`;

    switch (event.level) {
      case 'error':
        this.sink.error(line);
        break;
      case 'warn':
        this.sink.warn(line);
        break;
      default:
        this.sink.log(line);
    }
  }
}
