/**
 * Holdings Aggregator
 * Folds raw per-entity holdings into a bidirectional entity <-> asset index with derived totals
 */

import {
  AssetId,
  AssetNode,
  EntityId,
  EntityNode,
  Holding,
  HoldingsSnapshot,
  NormalizedIndex,
  RawHoldings
} from '../models/Holdings';
import { contractViolation } from '../utils/ErrorHandler';

export type AggregationIssueKind =
  | 'invalid-entity-record'
  | 'invalid-assets'
  | 'invalid-asset-record'
  | 'invalid-field';

export interface AggregationIssue {
  kind: AggregationIssueKind;
  entityId: EntityId;
  assetId?: AssetId;
  field?: 'name' | 'quantity' | 'value_usd';
  message: string;
}

export interface AggregateOptions {
  onIssue?: (issue: AggregationIssue) => void;
}

interface EntityLine {
  name: string;
  holding: Holding;
}

interface AssetAccumulator {
  name: string;
  entities: EntityId[];
  total_quantity: number;
  total_value: number;
}

const COMPONENT = 'HoldingsAggregator';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds the normalized index. Malformed numbers become 0 and malformed entity
 * records are skipped; both are reported through `onIssue`.
 * Identifiers are matched exactly, without case or whitespace normalization.
 */
export function aggregate(raw: RawHoldings, options: AggregateOptions = {}): NormalizedIndex {
  if (!isRecord(raw)) {
    throw contractViolation('Raw holdings must be a mapping of entity id to record', 'aggregate', COMPONENT);
  }

  const report = options.onIssue ?? (() => undefined);
  const entities = new Map<EntityId, EntityNode>();
  const assets = new Map<AssetId, AssetAccumulator>();

  for (const [entityId, record] of Object.entries(raw)) {
    let lines: Map<AssetId, EntityLine> | null;
    try {
      lines = readEntityLines(entityId, record, report);
    } catch (error) {
      report({
        kind: 'invalid-entity-record',
        entityId,
        message: error instanceof Error ? error.message : String(error)
      });
      continue;
    }
    if (lines === null) {
      continue;
    }

    const holdings = new Map<AssetId, Holding>();
    let totalValue = 0;
    for (const [symbol, line] of lines) {
      holdings.set(symbol, line.holding);
      totalValue += line.holding.value_usd;
    }
    entities.set(entityId, { total_value: totalValue, assets: holdings });

    for (const [symbol, line] of lines) {
      let asset = assets.get(symbol);
      if (!asset) {
        asset = { name: line.name, entities: [], total_quantity: 0, total_value: 0 };
        assets.set(symbol, asset);
      }
      asset.entities.push(entityId);
      asset.total_quantity += line.holding.quantity;
      asset.total_value += line.holding.value_usd;
    }
  }

  // Array.prototype.sort is stable, so ties keep first-seen order
  const ordered = [...assets.entries()].sort((a, b) => b[1].total_value - a[1].total_value);

  return {
    entities,
    assets: new Map<AssetId, AssetNode>(ordered)
  };
}

/**
 * Bounded cache of indices keyed by snapshot refresh time.
 * An entry only answers for the records it was built from, so a snapshot
 * stamped with a reused time does not get a stale index.
 */
export class IndexCache {
  private entries: Map<number, { records: RawHoldings; index: NormalizedIndex }> = new Map();
  private readonly maxEntries: number;

  constructor(maxEntries: number = 4) {
    this.maxEntries = Math.max(1, maxEntries);
  }

  get(snapshot: HoldingsSnapshot): NormalizedIndex | undefined {
    const entry = this.entries.get(snapshot.refreshedAt.getTime());
    return entry && entry.records === snapshot.records ? entry.index : undefined;
  }

  set(snapshot: HoldingsSnapshot, index: NormalizedIndex): void {
    const key = snapshot.refreshedAt.getTime();
    this.entries.delete(key);
    this.entries.set(key, { records: snapshot.records, index });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Aggregates a snapshot, reusing the cached index while the refresh time and records are unchanged
 */
export function aggregateSnapshot(
  snapshot: HoldingsSnapshot,
  cache?: IndexCache,
  options: AggregateOptions = {}
): NormalizedIndex {
  const cached = cache?.get(snapshot);
  if (cached) {
    return cached;
  }

  const index = aggregate(snapshot.records, options);
  cache?.set(snapshot, index);
  return index;
}

function readEntityLines(
  entityId: EntityId,
  record: unknown,
  report: (issue: AggregationIssue) => void
): Map<AssetId, EntityLine> | null {
  if (!isRecord(record)) {
    report({ kind: 'invalid-entity-record', entityId, message: `Record for ${entityId} is not a mapping` });
    return null;
  }

  const lines = new Map<AssetId, EntityLine>();
  const rawAssets = record.assets;
  if (rawAssets === undefined || rawAssets === null) {
    return lines;
  }
  if (!isRecord(rawAssets)) {
    report({ kind: 'invalid-assets', entityId, message: `Assets of ${entityId} are not a mapping` });
    return null;
  }

  for (const [symbol, line] of Object.entries(rawAssets)) {
    if (!isRecord(line)) {
      report({
        kind: 'invalid-asset-record',
        entityId,
        assetId: symbol,
        message: `Asset ${symbol} of ${entityId} is not a mapping`
      });
      continue;
    }

    const readField = (field: 'quantity' | 'value_usd'): number => {
      const value = line[field];
      if (value === undefined || value === null) {
        return 0;
      }
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        report({
          kind: 'invalid-field',
          entityId,
          assetId: symbol,
          field,
          message: `Field ${field} of ${entityId}/${symbol} is not a non-negative number`
        });
        return 0;
      }
      return value === 0 ? 0 : value;
    };

    let name = symbol;
    if (typeof line.name === 'string') {
      name = line.name;
    } else if (line.name !== undefined && line.name !== null) {
      report({
        kind: 'invalid-field',
        entityId,
        assetId: symbol,
        field: 'name',
        message: `Field name of ${entityId}/${symbol} is not a string`
      });
    }

    lines.set(symbol, {
      name,
      holding: { quantity: readField('quantity'), value_usd: readField('value_usd') }
    });
  }

  return lines;
}
