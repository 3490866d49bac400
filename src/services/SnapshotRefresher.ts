/**
 * Snapshot Refresher
 * Pulls every tracked entity from a holdings source and stamps the result with a refresh time
 */

import { IHoldingsSource } from '../connectors/HoldingsSource';
import {
  EntityId,
  HoldingsSnapshot,
  RawEntityRecord,
  RawHoldings,
  RefreshFailure,
  TrackedEntity
} from '../models/Holdings';
import { ErrorHandler, ErrorHandlingResult, RetryPolicy } from '../utils/ErrorHandler';
import { ActivityLog } from './ActivityLog';

export interface SnapshotRefresherOptions {
  activityLog?: ActivityLog;
  errorHandler?: ErrorHandler;
  retryPolicy?: RetryPolicy;
  now?: () => Date;
}

const COMPONENT = 'SnapshotRefresher';

const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 1000,
  maxBackoffMs: 30000
};

export class SnapshotRefresher {
  private readonly source: IHoldingsSource;
  private readonly entities: TrackedEntity[];
  private readonly activityLog: ActivityLog;
  private readonly errorHandler: ErrorHandler;
  private readonly retryPolicy: RetryPolicy;
  private readonly now: () => Date;

  private lastSnapshot: HoldingsSnapshot | null = null;
  private pending: Promise<HoldingsSnapshot> | null = null;
  private timer?: NodeJS.Timeout;
  private running: boolean = false;

  constructor(source: IHoldingsSource, entities: TrackedEntity[], options: SnapshotRefresherOptions = {}) {
    this.source = source;
    this.entities = [...entities];
    this.activityLog = options.activityLog ?? new ActivityLog();
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Refreshes every tracked entity. A call made while a refresh is in flight
   * shares the in-flight result.
   */
  refreshNow(): Promise<HoldingsSnapshot> {
    if (this.pending) {
      return this.pending;
    }

    this.pending = this.collect().finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  /**
   * Refreshes immediately, then every `intervalMs` until stopped
   */
  start(intervalMs: number): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.activityLog.info('REFRESH_SCHEDULE_STARTED', COMPONENT, { intervalMs });
    this.schedule(0, intervalMs);
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.activityLog.info('REFRESH_SCHEDULE_STOPPED', COMPONENT);
  }

  isRunning(): boolean {
    return this.running;
  }

  isRefreshing(): boolean {
    return this.pending !== null;
  }

  getLastSnapshot(): HoldingsSnapshot | null {
    return this.lastSnapshot;
  }

  getLastRefreshTime(): Date | null {
    return this.lastSnapshot?.refreshedAt ?? null;
  }

  private schedule(delayMs: number, intervalMs: number): void {
    this.timer = setTimeout(() => {
      this.runScheduled(intervalMs).catch((error: unknown) => {
        this.activityLog.error('SCHEDULED_REFRESH_FAILED', COMPONENT, {
          error: error instanceof Error ? error.message : String(error)
        });
      });
    }, delayMs);
  }

  private async runScheduled(intervalMs: number): Promise<void> {
    if (!this.running) return;

    try {
      await this.refreshNow();
    } finally {
      if (this.running) {
        this.schedule(intervalMs, intervalMs);
      }
    }
  }

  private async collect(): Promise<HoldingsSnapshot> {
    this.activityLog.info('REFRESH_STARTED', COMPONENT, {
      source: this.source.name,
      entityCount: this.entities.length
    });

    const results = await Promise.all(
      this.entities.map(entity => this.fetchWithRetry(entity).then(result => ({ entity, result })))
    );

    const fetched: [EntityId, RawEntityRecord][] = [];
    const failures: RefreshFailure[] = [];
    for (const { entity, result } of results) {
      if (result.success) {
        fetched.push([entity.id, result.result]);
        continue;
      }

      failures.push({ entityId: entity.id, message: result.error.message, attempts: result.attempts });
      this.activityLog.warn('ENTITY_FETCH_FAILED', COMPONENT, {
        entityId: entity.id,
        code: result.error.code,
        attempts: result.attempts,
        error: result.error.message
      });
    }

    // fromEntries defines own properties, so an id such as "__proto__" stays a record
    const records: RawHoldings = Object.fromEntries(fetched);
    const snapshot: HoldingsSnapshot = { refreshedAt: this.now(), records, failures };
    const succeeded = fetched.length;

    if (succeeded === 0 && failures.length > 0) {
      // Keep serving the previous snapshot
      this.activityLog.error('REFRESH_FAILED', COMPONENT, { failedCount: failures.length });
      return snapshot;
    }

    this.lastSnapshot = snapshot;
    this.activityLog.info('REFRESH_COMPLETED', COMPONENT, {
      refreshedAt: snapshot.refreshedAt.toISOString(),
      entityCount: succeeded,
      failedCount: failures.length
    });
    return snapshot;
  }

  private fetchWithRetry(entity: TrackedEntity): Promise<ErrorHandlingResult<RawEntityRecord>> {
    return this.errorHandler.handleError(
      () => this.source.fetchEntity(entity),
      {
        operation: 'fetchEntity',
        component: COMPONENT,
        entityId: entity.id,
        timestamp: this.now(),
        metadata: { category: entity.category, source: this.source.name }
      },
      this.retryPolicy
    );
  }
}
