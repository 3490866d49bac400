/**
 * Geometry helpers for the overlap layout
 */

import { Point } from '../models/Scene';

export interface WeightedPoint {
  point: Point;
  weight: number;
}

/**
 * Position of rank `index` out of `count` on a circle, starting at angle 0
 */
export function anchorPoint(index: number, count: number, radius: number): Point {
  const angle = (2 * Math.PI * index) / count;
  return {
    x: radius * Math.cos(angle),
    y: radius * Math.sin(angle)
  };
}

export function meanPoint(points: readonly Point[]): Point | null {
  if (points.length === 0) {
    return null;
  }

  const x = points.reduce((sum, point) => sum + point.x, 0) / points.length;
  const y = points.reduce((sum, point) => sum + point.y, 0) / points.length;
  return { x, y };
}

/**
 * Weighted average of points. Falls back to the plain mean when every weight is zero.
 * A single point is returned as-is.
 */
export function weightedCentroid(points: readonly WeightedPoint[]): Point | null {
  if (points.length === 0) {
    return null;
  }
  if (points.length === 1) {
    return { ...points[0].point };
  }

  const totalWeight = points.reduce((sum, entry) => sum + entry.weight, 0);
  if (totalWeight <= 0) {
    return meanPoint(points.map(entry => entry.point));
  }

  let x = 0;
  let y = 0;
  for (const entry of points) {
    x += entry.point.x * entry.weight;
    y += entry.point.y * entry.weight;
  }

  return { x: x / totalWeight, y: y / totalWeight };
}

/**
 * Square-root scaled size with a visibility floor
 */
export function sqrtScaledSize(value: number, scale: number, minimum: number): number {
  return Math.max(Math.sqrt(Math.max(0, value)) * scale, minimum);
}

/**
 * log10 scaled size; values below 1 map to 0
 */
export function logScaledSize(value: number, scale: number): number {
  return Math.log10(Math.max(1, value)) * scale;
}
