/**
 * Renderer-agnostic scene produced by the overlap layout engine
 */

import { AssetId, EntityId } from './Holdings';

export interface Point {
  x: number;
  y: number;
}

export type SceneElementKind =
  | 'guide-shape'
  | 'entity-zone'
  | 'entity-label'
  | 'asset-bubble'
  | 'asset-label'
  | 'percentage-overlay'
  | 'legend-entry';

interface BaseSceneElement {
  kind: SceneElementKind;
  /** Scene-unit coordinates; null for elements that live outside the plot area */
  position: Point | null;
  /** Marker diameter in renderer units, or radius in scene units for guide shapes */
  size: number;
  color: string;
  opacity: number;
  text?: string;
  tooltip?: string;
}

export interface GuideShapeElement extends BaseSceneElement {
  kind: 'guide-shape';
  shape: 'circle';
  position: Point;
}

export interface EntityZoneElement extends BaseSceneElement {
  kind: 'entity-zone';
  entityId: EntityId;
  position: Point;
  borderColor: string;
  /** Entities carry their own legend entry through the zone */
  legendLabel: string;
}

export interface EntityLabelElement extends BaseSceneElement {
  kind: 'entity-label';
  entityId: EntityId;
  position: Point;
  text: string;
}

export interface AssetBubbleElement extends BaseSceneElement {
  kind: 'asset-bubble';
  assetId: AssetId;
  position: Point;
  borderColor: string;
  percentage: number;
  tierIndex: number;
  holders: EntityId[];
  multiHolder: boolean;
  tooltip: string;
}

export interface AssetLabelElement extends BaseSceneElement {
  kind: 'asset-label';
  assetId: AssetId;
  position: Point;
  text: string;
}

export interface PercentageOverlayElement extends BaseSceneElement {
  kind: 'percentage-overlay';
  assetId: AssetId;
  position: Point;
  text: string;
}

export type LegendGroup = 'percentage-tier' | 'multi-holder';

export interface LegendEntryElement extends BaseSceneElement {
  kind: 'legend-entry';
  position: null;
  group: LegendGroup;
  label: string;
}

export type SceneElement =
  | GuideShapeElement
  | EntityZoneElement
  | EntityLabelElement
  | AssetBubbleElement
  | AssetLabelElement
  | PercentageOverlayElement
  | LegendEntryElement;

export interface ViewRange {
  x: [number, number];
  y: [number, number];
  aspectRatio: number;
}

/**
 * Ordered drawable elements; later elements render on top
 */
export interface LayoutScene {
  elements: SceneElement[];
  viewRange: ViewRange;
}

export function isSceneEmpty(scene: LayoutScene): boolean {
  return scene.elements.length === 0;
}

export function elementsOfKind<K extends SceneElementKind>(
  scene: LayoutScene,
  kind: K
): Extract<SceneElement, { kind: K }>[] {
  return scene.elements.filter(
    (element): element is Extract<SceneElement, { kind: K }> => element.kind === kind
  );
}
