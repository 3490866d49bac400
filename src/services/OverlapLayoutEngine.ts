/**
 * Overlap Layout Engine
 * Places entities on a circle and each asset at the value-weighted centroid of its holders.
 * The layout approximates multi-set overlap; it does not solve exact Venn geometry.
 */

import { AssetId, AssetNode, EntityId, EntityNode, NormalizedIndex } from '../models/Holdings';
import {
  AssetBubbleElement,
  GuideShapeElement,
  LayoutScene,
  LegendEntryElement,
  Point,
  SceneElement,
  ViewRange
} from '../models/Scene';
import { DEFAULT_ENTITY_PALETTE, lightenColor, paletteColor } from '../utils/colors';
import { anchorPoint, logScaledSize, sqrtScaledSize, weightedCentroid } from '../utils/geometry';
import { formatPercent, formatQuantity, formatUsd } from '../utils/format';
import { contractViolation } from '../utils/ErrorHandler';

/**
 * Percentage band; applies from `min` (inclusive) up to the next band's `min`
 */
export interface PercentageTier {
  min: number;
  color: string;
  label: string;
}

export interface LayoutConfig {
  anchorRadius: number;
  entityPalette: string[];
  zoneSqrtScale: number;
  markerScale: number;
  zoneMinSize: number;
  zoneLightenAmount: number;
  zoneOpacity: number;
  assetLogScale: number;
  assetOpacity: number;
  overlayMinSize: number;
  overlayOffsetFactor: number;
  percentageTiers: PercentageTier[];
  multiHolderColor: string;
  viewExtent: number;
  guideRadii: number[];
  guideColor: string;
  legendMarkerSize: number;
}

export const DEFAULT_PERCENTAGE_TIERS: PercentageTier[] = [
  { min: 0, color: '#CCCCCC', label: '<1%' },
  { min: 1, color: '#92D050', label: '1-5%' },
  { min: 5, color: '#00B0F0', label: '5-10%' },
  { min: 10, color: '#FFC000', label: '10-20%' },
  { min: 20, color: '#FF0000', label: '≥20%' }
];

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  anchorRadius: 5.5,
  entityPalette: [...DEFAULT_ENTITY_PALETTE],
  zoneSqrtScale: 0.00002,
  markerScale: 25,
  zoneMinSize: 40,
  zoneLightenAmount: 0.8,
  zoneOpacity: 0.4,
  assetLogScale: 0.8,
  assetOpacity: 0.85,
  overlayMinSize: 35,
  overlayOffsetFactor: 0.12,
  percentageTiers: DEFAULT_PERCENTAGE_TIERS,
  multiHolderColor: '#8C1AFF',
  viewExtent: 7,
  guideRadii: [6, 3],
  guideColor: 'rgba(0,0,0,0.1)',
  legendMarkerSize: 15
};

const COMPONENT = 'OverlapLayoutEngine';
const SINGLE_HOLDER_BORDER = 'rgba(0,0,0,0.5)';
const ENTITY_LABEL_FONT_SIZE = 16;
const ASSET_LABEL_FONT_SIZE = 11;
const OVERLAY_FONT_SIZE = 10;

interface PlacedEntity {
  id: EntityId;
  node: EntityNode;
  anchor: Point;
  color: string;
}

interface PlacedAsset {
  id: AssetId;
  node: AssetNode;
  holders: PlacedEntity[];
  position: Point;
  /** log-scaled size before marker scaling */
  scaledValue: number;
  percentage: number;
}

function isMapLike(value: unknown): value is ReadonlyMap<unknown, unknown> {
  return value instanceof Map;
}

function uniqueKnown<T>(ids: Iterable<string>, known: ReadonlyMap<string, T>): string[] {
  const seen = new Set<string>();
  for (const id of ids) {
    if (known.has(id)) {
      seen.add(id);
    }
  }
  return [...seen];
}

export class OverlapLayoutEngine {
  private readonly config: LayoutConfig;

  constructor(config: LayoutConfig = DEFAULT_LAYOUT_CONFIG) {
    this.config = config;
  }

  /**
   * Computes the scene for the selected entities and assets.
   * Unknown identifiers are ignored; an empty selection yields an empty scene.
   */
  layout(
    index: NormalizedIndex,
    selectedEntities: Iterable<EntityId>,
    selectedAssets: Iterable<AssetId>
  ): LayoutScene {
    if (typeof index !== 'object' || index === null || !isMapLike(index.entities) || !isMapLike(index.assets)) {
      throw contractViolation('Layout requires a normalized index with entity and asset maps', 'layout', COMPONENT);
    }

    const entityIds = uniqueKnown(selectedEntities, index.entities);
    const assetIds = uniqueKnown(selectedAssets, index.assets);
    const viewRange = this.viewRange();

    if (entityIds.length === 0 || assetIds.length === 0) {
      return { elements: [], viewRange };
    }

    const entities = this.placeEntities(index, entityIds);
    const assets = this.placeAssets(index, assetIds, entities);

    const elements: SceneElement[] = [
      ...this.guideShapes(),
      ...this.entityElements(entities),
      ...this.assetElements(assets),
      ...this.legendEntries()
    ];

    return { elements, viewRange };
  }

  /**
   * Index of the percentage tier that contains `percentage`
   */
  tierIndexFor(percentage: number): number {
    let tierIndex = 0;
    this.config.percentageTiers.forEach((tier, i) => {
      if (percentage >= tier.min) {
        tierIndex = i;
      }
    });
    return tierIndex;
  }

  private placeEntities(index: NormalizedIndex, entityIds: EntityId[]): Map<EntityId, PlacedEntity> {
    const ranked = entityIds
      .map(id => ({ id, node: this.requireEntity(index, id) }))
      .sort((a, b) => b.node.total_value - a.node.total_value);

    const placed = new Map<EntityId, PlacedEntity>();
    ranked.forEach((entry, rank) => {
      placed.set(entry.id, {
        ...entry,
        anchor: anchorPoint(rank, ranked.length, this.config.anchorRadius),
        color: paletteColor(this.config.entityPalette, rank)
      });
    });
    return placed;
  }

  private placeAssets(
    index: NormalizedIndex,
    assetIds: AssetId[],
    entities: Map<EntityId, PlacedEntity>
  ): PlacedAsset[] {
    let selectedTotal = 0;
    for (const entity of entities.values()) {
      selectedTotal += entity.node.total_value;
    }

    const placed: PlacedAsset[] = [];
    for (const id of assetIds) {
      const node = index.assets.get(id);
      if (!node || node.entities.length === 0) {
        continue;
      }
      // Assets with any holder outside the selection are left out entirely
      if (!node.entities.every(holder => entities.has(holder))) {
        continue;
      }

      const holders = [...entities.values()].filter(entity => node.entities.includes(entity.id));
      const position = weightedCentroid(
        holders.map(holder => ({
          point: holder.anchor,
          weight: holder.node.assets.get(id)?.value_usd ?? 0
        }))
      );
      if (!position) {
        continue;
      }

      const percentage = selectedTotal > 0
        ? Math.min(100, Math.max(0, (node.total_value / selectedTotal) * 100))
        : 0;

      placed.push({
        id,
        node,
        holders,
        position,
        scaledValue: logScaledSize(node.total_value, this.config.assetLogScale),
        percentage
      });
    }

    // Larger bubbles first so smaller ones render on top
    return placed.sort((a, b) => b.scaledValue - a.scaledValue);
  }

  private entityElements(entities: Map<EntityId, PlacedEntity>): SceneElement[] {
    const zones: SceneElement[] = [];
    const labels: SceneElement[] = [];

    for (const entity of entities.values()) {
      zones.push({
        kind: 'entity-zone',
        entityId: entity.id,
        position: { ...entity.anchor },
        size: sqrtScaledSize(
          entity.node.total_value,
          this.config.zoneSqrtScale * this.config.markerScale,
          this.config.zoneMinSize
        ),
        color: lightenColor(entity.color, this.config.zoneLightenAmount),
        borderColor: entity.color,
        opacity: this.config.zoneOpacity,
        legendLabel: entity.id,
        tooltip: `${entity.id}\nTotal Holdings: ${formatUsd(entity.node.total_value)}`
      });

      labels.push({
        kind: 'entity-label',
        entityId: entity.id,
        position: { ...entity.anchor },
        size: ENTITY_LABEL_FONT_SIZE,
        color: 'black',
        opacity: 1,
        text: entity.id.toUpperCase()
      });
    }

    return [...zones, ...labels];
  }

  private assetElements(assets: PlacedAsset[]): SceneElement[] {
    const elements: SceneElement[] = [];

    for (const asset of assets) {
      const tierIndex = this.tierIndexFor(asset.percentage);
      const multiHolder = asset.holders.length > 1;
      const markerSize = asset.scaledValue * this.config.markerScale;

      const bubble: AssetBubbleElement = {
        kind: 'asset-bubble',
        assetId: asset.id,
        position: { ...asset.position },
        size: markerSize,
        color: this.config.percentageTiers[tierIndex].color,
        borderColor: multiHolder ? this.config.multiHolderColor : SINGLE_HOLDER_BORDER,
        opacity: this.config.assetOpacity,
        percentage: asset.percentage,
        tierIndex,
        holders: asset.holders.map(holder => holder.id),
        multiHolder,
        tooltip: this.assetTooltip(asset)
      };
      elements.push(bubble);

      elements.push({
        kind: 'asset-label',
        assetId: asset.id,
        position: { ...asset.position },
        size: ASSET_LABEL_FONT_SIZE,
        color: 'white',
        opacity: 1,
        text: `${asset.id}\n${formatPercent(asset.percentage, 1)}`
      });

      if (markerSize > this.config.overlayMinSize) {
        elements.push({
          kind: 'percentage-overlay',
          assetId: asset.id,
          position: {
            x: asset.position.x,
            y: asset.position.y + asset.scaledValue * this.config.overlayOffsetFactor
          },
          size: OVERLAY_FONT_SIZE,
          color: 'white',
          opacity: 1,
          text: formatPercent(asset.percentage, 1)
        });
      }
    }

    return elements;
  }

  private assetTooltip(asset: PlacedAsset): string {
    const { node } = asset;
    const lines = [
      asset.id,
      `Total Value: ${formatUsd(node.total_value)}`,
      `Market Share: ${formatPercent(asset.percentage, 2)}`,
      `Quantity: ${formatQuantity(node.total_quantity)}`,
      `Held by: ${asset.holders.map(holder => holder.id).join(', ')}`,
      '---'
    ];

    const breakdown = asset.holders
      .map(holder => ({ id: holder.id, value: holder.node.assets.get(asset.id)?.value_usd ?? 0 }))
      .sort((a, b) => b.value - a.value);

    for (const entry of breakdown) {
      const share = node.total_value > 0 ? (entry.value / node.total_value) * 100 : 0;
      lines.push(`${entry.id}: ${formatUsd(entry.value)} (${formatPercent(share, 1)})`);
    }

    return lines.join('\n');
  }

  private guideShapes(): GuideShapeElement[] {
    return this.config.guideRadii.map(radius => ({
      kind: 'guide-shape',
      shape: 'circle',
      position: { x: 0, y: 0 },
      size: radius,
      color: this.config.guideColor,
      opacity: 1
    }));
  }

  private legendEntries(): LegendEntryElement[] {
    const tiers: LegendEntryElement[] = this.config.percentageTiers.map(tier => ({
      kind: 'legend-entry',
      position: null,
      group: 'percentage-tier',
      label: `Market Share: ${tier.label}`,
      size: this.config.legendMarkerSize,
      color: tier.color,
      opacity: this.config.assetOpacity
    }));

    tiers.push({
      kind: 'legend-entry',
      position: null,
      group: 'multi-holder',
      label: 'Asset held by multiple entities',
      size: this.config.legendMarkerSize,
      color: this.config.multiHolderColor,
      opacity: this.config.assetOpacity
    });

    return tiers;
  }

  private viewRange(): ViewRange {
    const extent = this.config.viewExtent;
    return { x: [-extent, extent], y: [-extent, extent], aspectRatio: 1 };
  }

  private requireEntity(index: NormalizedIndex, id: EntityId): EntityNode {
    const node = index.entities.get(id);
    if (!node) {
      throw contractViolation(`Entity ${id} is missing from the index`, 'layout', COMPONENT);
    }
    return node;
  }
}

/**
 * Lays out a scene with the given (or default) configuration
 */
export function layout(
  index: NormalizedIndex,
  selectedEntities: Iterable<EntityId>,
  selectedAssets: Iterable<AssetId>,
  config: LayoutConfig = DEFAULT_LAYOUT_CONFIG
): LayoutScene {
  return new OverlapLayoutEngine(config).layout(index, selectedEntities, selectedAssets);
}
