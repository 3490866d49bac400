/**
 * Activity log event models
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type EventDetails = Record<string, string | number | boolean | null | string[]>;

export interface ActivityEvent {
  eventId: string;
  timestamp: Date;
  level: LogLevel;
  eventType: string;
  component: string;
  details: EventDetails;
  signature: string;
}
