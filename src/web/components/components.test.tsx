import React from 'react';
import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import { NO_DATA_MESSAGE, OverlapChart } from './OverlapChart';
import { HoldingsTable } from './HoldingsTable';
import { DashboardPage, undrawnAssets } from './DashboardPage';
import { aggregate } from '../../services/HoldingsAggregator';
import { layout } from '../../services/OverlapLayoutEngine';
import { buildHoldingsTable, summarizeHoldings } from '../../services/HoldingsSummary';
import { LayoutScene } from '../../models/Scene';

const index = aggregate({
  A: { assets: { X: { quantity: 1, value_usd: 100 } } },
  B: { assets: { X: { quantity: 2, value_usd: 300 }, Y: { quantity: 5, value_usd: 50 } } }
});
const scene = layout(index, ['A', 'B'], ['X', 'Y']);
const emptyScene: LayoutScene = { elements: [], viewRange: { x: [-7, 7], y: [-7, 7], aspectRatio: 1 } };

const count = (markup: string, fragment: string): number => markup.split(fragment).length - 1;

describe('OverlapChart', () => {
  it('should show the no-data message for an empty scene', () => {
    expect(renderToStaticMarkup(<OverlapChart scene={emptyScene} />)).toBe(
      `<div class="overlap-chart overlap-chart-empty"><p>${NO_DATA_MESSAGE}</p></div>`
    );
  });

  it('should draw one shape per zone, bubble and guide', () => {
    const markup = renderToStaticMarkup(<OverlapChart scene={scene} />);

    expect(count(markup, 'class="guide-shape"')).toBe(2);
    expect(count(markup, 'class="entity-zone"')).toBe(2);
    expect(count(markup, 'class="asset-bubble"')).toBe(2);
    expect(count(markup, 'class="percentage-overlay"')).toBe(1);
  });

  it('should attach tooltips to zones and bubbles', () => {
    const markup = renderToStaticMarkup(<OverlapChart scene={scene} />);

    expect(markup).toContain('<title>B\nTotal Holdings: $350.00</title>');
    expect(markup).toContain('<title>Y\nTotal Value: $50.00\n');
  });

  it('should list entities, tiers and the multi-holder marker in the legend', () => {
    const markup = renderToStaticMarkup(<OverlapChart scene={scene} />);

    expect(count(markup, '<li>')).toBe(8);
    expect(markup).toContain('Asset held by multiple entities</li>');
  });
});

describe('HoldingsTable', () => {
  it('should render one row per asset with formatted values', () => {
    const rows = buildHoldingsTable(index, ['A', 'B'], ['X', 'Y']);
    const markup = renderToStaticMarkup(<HoldingsTable rows={rows} stats={summarizeHoldings(index, ['X', 'Y'])} />);

    expect(markup).toContain(
      '<tr><td>X</td><td>X</td><td>$400</td><td>3.0000</td><td>88.89%</td><td>A, B</td></tr>'
    );
    expect(markup).toContain(
      '<tr><td>Y</td><td>Y</td><td>$50</td><td>5.0000</td><td>11.11%</td><td>B</td></tr>'
    );
    expect(markup).toContain('<span class="summary-value">$450</span>');
    expect(markup).toContain('<span class="summary-value">1.5</span>');
  });

  it('should say so when no assets are selected', () => {
    const markup = renderToStaticMarkup(
      <HoldingsTable rows={[]} stats={{ assetCount: 0, totalValue: 0, averageHolders: 0 }} />
    );

    expect(markup).toContain('<p class="holdings-empty">No assets selected.</p>');
    expect(markup).not.toContain('<table>');
  });
});

describe('DashboardPage', () => {
  const render = (refreshedAt: Date | null) =>
    renderToStaticMarkup(
      <DashboardPage
        scene={scene}
        rows={buildHoldingsTable(index, ['B'], ['Y'])}
        stats={summarizeHoldings(index, ['Y'])}
        available={{ entities: ['A', 'B'], assets: ['X', 'Y'] }}
        selection={{ entities: ['B'], assets: ['Y'] }}
        refreshedAt={refreshedAt}
        failures={[{ entityId: 'kraken', message: 'network down', attempts: 3 }]}
      />
    );

  it('should mark the current selection', () => {
    const markup = render(null);

    expect(markup).toContain('<input type="checkbox" name="entities" checked="" value="B"/>');
    expect(markup).toContain('<input type="checkbox" name="entities" value="A"/>');
    expect(markup).toContain('<input type="checkbox" name="assets" checked="" value="Y"/>');
  });

  it('should link to select-all and clear selections', () => {
    const markup = render(null);

    expect(markup).toContain('href="/?entities=A%2CB&amp;assets=X%2CY"');
    expect(markup).toContain('href="/?entities=&amp;assets="');
  });

  it('should show the refresh time and failed entities', () => {
    expect(render(null)).toContain('Last updated: never');
    expect(render(new Date('2026-05-01T00:00:00.000Z'))).toContain('Last updated: 2026-05-01T00:00:00.000Z');
    expect(render(null)).toContain('<li>kraken: network down (3 attempts)</li>');
  });

  it('should list selected assets whose holders are not all selected', () => {
    const partial = layout(index, ['B'], ['X', 'Y']);
    const rows = buildHoldingsTable(index, ['B'], ['X', 'Y']);

    expect(undrawnAssets(partial, rows)).toEqual(['X']);

    const markup = renderToStaticMarkup(
      <DashboardPage
        scene={partial}
        rows={rows}
        stats={summarizeHoldings(index, ['X', 'Y'])}
        available={{ entities: ['A', 'B'], assets: ['X', 'Y'] }}
        selection={{ entities: ['B'], assets: ['X', 'Y'] }}
        refreshedAt={null}
        failures={[]}
      />
    );

    expect(markup).toContain('<p class="chart-omissions">Not drawn, held by an unselected entity: X</p>');
  });

  it('should not list omissions when everything selected is drawn', () => {
    expect(render(null)).not.toContain('class="chart-omissions"');
  });
});
