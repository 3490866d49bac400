import React from 'react';
import {
  AssetBubbleElement,
  EntityZoneElement,
  LayoutScene,
  LegendEntryElement,
  Point,
  SceneElement
} from '../../models/Scene';

interface OverlapChartProps {
  scene: LayoutScene;
  /** Pixel width and height of the square plot */
  size?: number;
}

export const NO_DATA_MESSAGE = 'No data available for the selected filters';

const LINE_HEIGHT = 1.1;

/**
 * Renders a layout scene as SVG. Marker sizes are diameters in pixels;
 * guide shape sizes are radii in scene units.
 */
export const OverlapChart: React.FC<OverlapChartProps> = ({ scene, size = 640 }) => {
  if (scene.elements.length === 0) {
    return (
      <div className="overlap-chart overlap-chart-empty">
        <p>{NO_DATA_MESSAGE}</p>
      </div>
    );
  }

  const [x0, x1] = scene.viewRange.x;
  const [, y1] = scene.viewRange.y;
  const scale = size / (x1 - x0);
  const toPixel = (point: Point): { cx: number; cy: number } => ({
    cx: (point.x - x0) * scale,
    cy: (y1 - point.y) * scale
  });

  const legend: { key: string; label: string; color: string; border?: string }[] = [
    ...scene.elements
      .filter((element): element is EntityZoneElement => element.kind === 'entity-zone')
      .map(zone => ({ key: `entity-${zone.entityId}`, label: zone.legendLabel, color: zone.borderColor })),
    ...scene.elements
      .filter((element): element is LegendEntryElement => element.kind === 'legend-entry')
      .map(entry => ({
        key: `${entry.group}-${entry.label}`,
        label: entry.label,
        color: entry.group === 'multi-holder' ? 'transparent' : entry.color,
        border: entry.group === 'multi-holder' ? entry.color : undefined
      }))
  ];

  const renderText = (text: string, cx: number, cy: number, fontSize: number, color: string) => {
    const lines = text.split('\n');
    const firstOffset = -((lines.length - 1) * LINE_HEIGHT) / 2;
    return (
      <text x={cx} y={cy} fontSize={fontSize} fill={color} textAnchor="middle" dominantBaseline="middle">
        {lines.map((line, i) => (
          <tspan key={i} x={cx} dy={`${i === 0 ? firstOffset : LINE_HEIGHT}em`}>
            {line}
          </tspan>
        ))}
      </text>
    );
  };

  const renderElement = (element: SceneElement, index: number) => {
    switch (element.kind) {
      case 'guide-shape': {
        const { cx, cy } = toPixel(element.position);
        return (
          <circle
            key={index}
            className="guide-shape"
            cx={cx}
            cy={cy}
            r={element.size * scale}
            fill="none"
            stroke={element.color}
            strokeOpacity={element.opacity}
          />
        );
      }
      case 'entity-zone':
      case 'asset-bubble': {
        const { cx, cy } = toPixel(element.position);
        return (
          <circle
            key={index}
            className={element.kind}
            cx={cx}
            cy={cy}
            r={element.size / 2}
            fill={element.color}
            fillOpacity={element.opacity}
            stroke={element.borderColor}
            strokeWidth={borderWidth(element)}
          >
            {element.tooltip && <title>{element.tooltip}</title>}
          </circle>
        );
      }
      case 'entity-label':
      case 'asset-label':
      case 'percentage-overlay': {
        const { cx, cy } = toPixel(element.position);
        return (
          <g key={index} className={element.kind} opacity={element.opacity}>
            {renderText(element.text, cx, cy, element.size, element.color)}
          </g>
        );
      }
      case 'legend-entry':
        return null;
    }
  };

  return (
    <div className="overlap-chart">
      <svg
        xmlns="http://www.w3.org/2000/svg"
        width={size}
        height={size * scene.viewRange.aspectRatio}
        viewBox={`0 0 ${size} ${size * scene.viewRange.aspectRatio}`}
      >
        {scene.elements.map(renderElement)}
      </svg>
      <ul className="overlap-legend">
        {legend.map(entry => (
          <li key={entry.key}>
            <span
              className="legend-swatch"
              style={{ backgroundColor: entry.color, border: entry.border ? `2px solid ${entry.border}` : undefined }}
            />
            {entry.label}
          </li>
        ))}
      </ul>
    </div>
  );
};

function borderWidth(element: EntityZoneElement | AssetBubbleElement): number {
  if (element.kind === 'entity-zone') return 2;
  return element.multiHolder ? 2 : 1;
}
