/**
 * Holdings Summary
 * Selection defaults and tabular views over a normalized index
 */

import { AssetId, AssetNode, EntityId, EntityNode, Holding, NormalizedIndex } from '../models/Holdings';

export interface Selection {
  entities: EntityId[];
  assets: AssetId[];
}

export interface HoldingsTableRow {
  symbol: AssetId;
  name: string;
  totalValue: number;
  totalQuantity: number;
  /** Share of the selected assets' combined value, 0-100 */
  marketShare: number;
  holders: EntityId[];
}

export interface HoldingsSummaryStats {
  assetCount: number;
  totalValue: number;
  averageHolders: number;
}

export interface OverlapMatrix {
  assets: AssetId[];
  entities: EntityId[];
  /** values[assetRow][entityColumn] in USD */
  values: number[][];
}

export const DEFAULT_ENTITY_COUNT = 5;
export const DEFAULT_ASSET_COUNT = 10;

function knownIds<T>(ids: Iterable<string>, known: ReadonlyMap<string, T>): string[] {
  const seen = new Set<string>();
  for (const id of ids) {
    if (known.has(id)) seen.add(id);
  }
  return [...seen];
}

/**
 * The highest-valued assets, with the first entities in index order widened
 * to every holder of those assets so each default asset can be drawn
 */
export function defaultSelection(
  index: NormalizedIndex,
  entityCount: number = DEFAULT_ENTITY_COUNT,
  assetCount: number = DEFAULT_ASSET_COUNT
): Selection {
  const allEntities = [...index.entities.keys()];
  const assets = [...index.assets.keys()].slice(0, Math.max(0, assetCount));

  const included = new Set(allEntities.slice(0, Math.max(0, entityCount)));
  for (const symbol of assets) {
    for (const holder of index.assets.get(symbol)?.entities ?? []) {
      included.add(holder);
    }
  }

  return {
    entities: allEntities.filter(entityId => included.has(entityId)),
    assets
  };
}

export function selectAll(index: NormalizedIndex): Selection {
  return {
    entities: [...index.entities.keys()],
    assets: [...index.assets.keys()]
  };
}

/**
 * Restricts the index to the selection, recomputing totals so the result is a valid index
 */
export function filterIndex(
  index: NormalizedIndex,
  selectedEntities: Iterable<EntityId>,
  selectedAssets: Iterable<AssetId>
): NormalizedIndex {
  const entityIds = knownIds(selectedEntities, index.entities);
  const assetIds = knownIds(selectedAssets, index.assets);
  const assetSet = new Set(assetIds);

  const entities = new Map<EntityId, EntityNode>();
  for (const entityId of entityIds) {
    const source = index.entities.get(entityId);
    if (!source) continue;

    const holdings = new Map<AssetId, Holding>();
    let totalValue = 0;
    for (const [symbol, holding] of source.assets) {
      if (assetSet.has(symbol)) {
        holdings.set(symbol, { ...holding });
        totalValue += holding.value_usd;
      }
    }
    entities.set(entityId, { total_value: totalValue, assets: holdings });
  }

  const assets: [AssetId, AssetNode][] = [];
  for (const symbol of assetIds) {
    const source = index.assets.get(symbol);
    if (!source) continue;

    const holders = source.entities.filter(holder => entities.get(holder)?.assets.has(symbol));
    if (holders.length === 0) continue;

    let totalQuantity = 0;
    let totalValue = 0;
    for (const holder of holders) {
      const holding = entities.get(holder)?.assets.get(symbol);
      totalQuantity += holding?.quantity ?? 0;
      totalValue += holding?.value_usd ?? 0;
    }
    assets.push([symbol, { name: source.name, entities: holders, total_quantity: totalQuantity, total_value: totalValue }]);
  }

  assets.sort((a, b) => b[1].total_value - a[1].total_value);

  return { entities, assets: new Map(assets) };
}

/**
 * Detail rows for the selected assets, largest first.
 * Market share is relative to the selected assets, not to the selected entities.
 */
export function buildHoldingsTable(
  index: NormalizedIndex,
  selectedEntities: Iterable<EntityId>,
  selectedAssets: Iterable<AssetId>
): HoldingsTableRow[] {
  const entityIds = knownIds(selectedEntities, index.entities);
  const assetIds = knownIds(selectedAssets, index.assets);

  const nodes: [AssetId, AssetNode][] = [];
  for (const symbol of assetIds) {
    const node = index.assets.get(symbol);
    if (node) nodes.push([symbol, node]);
  }

  const selectedTotal = nodes.reduce((sum, [, node]) => sum + node.total_value, 0);

  return nodes
    .map(([symbol, node]) => ({
      symbol,
      name: node.name,
      totalValue: node.total_value,
      totalQuantity: node.total_quantity,
      marketShare: selectedTotal > 0 ? (node.total_value / selectedTotal) * 100 : 0,
      holders: entityIds.filter(entityId => node.entities.includes(entityId))
    }))
    .sort((a, b) => b.totalValue - a.totalValue);
}

export function summarizeHoldings(index: NormalizedIndex, selectedAssets: Iterable<AssetId>): HoldingsSummaryStats {
  const nodes = knownIds(selectedAssets, index.assets)
    .map(symbol => index.assets.get(symbol))
    .filter((node): node is AssetNode => node !== undefined);

  if (nodes.length === 0) {
    return { assetCount: 0, totalValue: 0, averageHolders: 0 };
  }

  const totalValue = nodes.reduce((sum, node) => sum + node.total_value, 0);
  const holderCount = nodes.reduce((sum, node) => sum + node.entities.length, 0);

  return {
    assetCount: nodes.length,
    totalValue,
    averageHolders: holderCount / nodes.length
  };
}

/**
 * Asset-by-entity value grid; 0 where an entity does not hold the asset
 */
export function buildOverlapMatrix(
  index: NormalizedIndex,
  selectedEntities: Iterable<EntityId>,
  selectedAssets: Iterable<AssetId>
): OverlapMatrix {
  const entities = knownIds(selectedEntities, index.entities);
  const assets = knownIds(selectedAssets, index.assets);

  const values = assets.map(symbol =>
    entities.map(entityId => index.entities.get(entityId)?.assets.get(symbol)?.value_usd ?? 0)
  );

  return { assets, entities, values };
}
