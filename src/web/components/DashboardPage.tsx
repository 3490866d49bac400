import React from 'react';
import { AssetId, EntityId, RefreshFailure } from '../../models/Holdings';
import { AssetBubbleElement, LayoutScene } from '../../models/Scene';
import { HoldingsSummaryStats, HoldingsTableRow, Selection } from '../../services/HoldingsSummary';
import { OverlapChart } from './OverlapChart';
import { HoldingsTable } from './HoldingsTable';

export interface DashboardPageProps {
  title?: string;
  scene: LayoutScene;
  rows: HoldingsTableRow[];
  stats: HoldingsSummaryStats;
  /** Every entity and asset the index knows */
  available: Selection;
  selection: Selection;
  refreshedAt: Date | null;
  failures: RefreshFailure[];
}

const PAGE_STYLE = `
body { font-family: sans-serif; margin: 24px; color: #222; }
.dashboard-layout { display: flex; gap: 24px; align-items: flex-start; }
.selection-panel fieldset { max-height: 260px; overflow-y: auto; margin-bottom: 12px; }
.overlap-legend { list-style: none; padding: 0; }
.legend-swatch { display: inline-block; width: 12px; height: 12px; border-radius: 50%; margin-right: 6px; }
.refresh-failures { color: #B82E2E; }
.chart-omissions { color: #8A6D00; }
table { border-collapse: collapse; margin-top: 12px; }
th, td { border-bottom: 1px solid #ddd; padding: 4px 10px; text-align: left; }
`;

/**
 * Selected assets listed in the table that the chart leaves out because a holder is not selected
 */
export function undrawnAssets(scene: LayoutScene, rows: HoldingsTableRow[]): AssetId[] {
  const drawn = new Set(
    scene.elements
      .filter((element): element is AssetBubbleElement => element.kind === 'asset-bubble')
      .map(bubble => bubble.assetId)
  );
  return rows.map(row => row.symbol).filter(symbol => !drawn.has(symbol));
}

function selectionHref(entities: EntityId[], assets: AssetId[]): string {
  const params = new URLSearchParams({ entities: entities.join(','), assets: assets.join(',') });
  return `/?${params.toString()}`;
}

export const DashboardPage: React.FC<DashboardPageProps> = ({
  title = 'Asset Holdings Overlap',
  scene,
  rows,
  stats,
  available,
  selection,
  refreshedAt,
  failures
}) => {
  const undrawn = scene.elements.length > 0 ? undrawnAssets(scene, rows) : [];

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
        <style>{PAGE_STYLE}</style>
      </head>
      <body>
        <header className="dashboard-header">
          <h1>{title}</h1>
          <div className="last-updated">
            Last updated: {refreshedAt ? refreshedAt.toISOString() : 'never'}
          </div>
          {failures.length > 0 && (
            <ul className="refresh-failures">
              {failures.map(failure => (
                <li key={failure.entityId}>
                  {failure.entityId}: {failure.message} ({failure.attempts} attempts)
                </li>
              ))}
            </ul>
          )}
        </header>

        <div className="dashboard-layout">
          <form className="selection-panel" method="get" action="/">
            <fieldset>
              <legend>Entities</legend>
              <input type="hidden" name="entities" value="" />
              {available.entities.map(entityId => (
                <label key={entityId}>
                  <input
                    type="checkbox"
                    name="entities"
                    value={entityId}
                    defaultChecked={selection.entities.includes(entityId)}
                  />
                  {entityId}
                  <br />
                </label>
              ))}
            </fieldset>
            <fieldset>
              <legend>Assets</legend>
              <input type="hidden" name="assets" value="" />
              {available.assets.map(assetId => (
                <label key={assetId}>
                  <input
                    type="checkbox"
                    name="assets"
                    value={assetId}
                    defaultChecked={selection.assets.includes(assetId)}
                  />
                  {assetId}
                  <br />
                </label>
              ))}
            </fieldset>
            <button type="submit">Apply</button>{' '}
            <a href={selectionHref(available.entities, available.assets)}>Select all</a>{' '}
            <a href={selectionHref([], [])}>Clear</a>
          </form>

          <main>
            <OverlapChart scene={scene} />
            {undrawn.length > 0 && (
              <p className="chart-omissions">
                {`Not drawn, held by an unselected entity: ${undrawn.join(', ')}`}
              </p>
            )}
            <HoldingsTable rows={rows} stats={stats} />
          </main>
        </div>
      </body>
    </html>
  );
};
