/**
 * Holdings data models: raw per-entity records and the normalized index built from them
 */

export type EntityId = string;
export type AssetId = string;

/**
 * One asset line as reported for an entity by a holdings source.
 * Every field may be missing; the aggregator substitutes defaults.
 */
export interface RawAssetRecord {
  name?: string;
  quantity?: number;
  value_usd?: number;
}

export interface RawEntityRecord {
  entity_name?: string;
  assets?: Record<AssetId, RawAssetRecord>;
}

/**
 * Raw input to aggregation, keyed by entity identifier
 */
export type RawHoldings = Record<EntityId, RawEntityRecord>;

/**
 * Quantity/value attribution of one asset to one entity
 */
export interface Holding {
  readonly quantity: number;
  readonly value_usd: number;
}

export interface EntityNode {
  readonly total_value: number;
  readonly assets: ReadonlyMap<AssetId, Holding>;
}

export interface AssetNode {
  readonly name: string;
  /** Holder identifiers in first-seen order */
  readonly entities: readonly EntityId[];
  readonly total_quantity: number;
  readonly total_value: number;
}

/**
 * Bidirectional entity <-> asset index with derived totals.
 * Assets iterate by total value, descending.
 */
export interface NormalizedIndex {
  readonly entities: ReadonlyMap<EntityId, EntityNode>;
  readonly assets: ReadonlyMap<AssetId, AssetNode>;
}

export type EntityCategory = 'exchange' | 'institution';

export interface TrackedEntity {
  id: EntityId;
  category: EntityCategory;
}

export interface RefreshFailure {
  entityId: EntityId;
  message: string;
  attempts: number;
}

/**
 * Raw holdings captured by one refresh pass
 */
export interface HoldingsSnapshot {
  refreshedAt: Date;
  records: RawHoldings;
  failures: RefreshFailure[];
}

/**
 * Plain-object form of a NormalizedIndex, used at JSON boundaries
 */
export interface NormalizedIndexJSON {
  entities: Record<EntityId, { total_value: number; assets: Record<AssetId, Holding> }>;
  assets: Record<AssetId, { name: string; entities: EntityId[]; total_quantity: number; total_value: number }>;
}

export function emptyIndex(): NormalizedIndex {
  return { entities: new Map(), assets: new Map() };
}

export function toIndexJSON(index: NormalizedIndex): NormalizedIndexJSON {
  // Object.fromEntries defines own properties, so ids such as __proto__ survive
  const entities: NormalizedIndexJSON['entities'] = Object.fromEntries(
    [...index.entities].map(([entityId, entity]): [EntityId, NormalizedIndexJSON['entities'][EntityId]] => [
      entityId,
      { total_value: entity.total_value, assets: Object.fromEntries(entity.assets) }
    ])
  );

  const assets: NormalizedIndexJSON['assets'] = Object.fromEntries(
    [...index.assets].map(([symbol, asset]): [AssetId, NormalizedIndexJSON['assets'][AssetId]] => [
      symbol,
      {
        name: asset.name,
        entities: [...asset.entities],
        total_quantity: asset.total_quantity,
        total_value: asset.total_value
      }
    ])
  );

  return { entities, assets };
}
