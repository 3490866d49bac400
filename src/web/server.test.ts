import { describe, it, expect, beforeEach } from 'vitest';
import * as path from 'path';
import { DashboardServer } from './server';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { IHoldingsSource } from '../connectors/HoldingsSource';
import { JsonFileHoldingsSource } from '../connectors/JsonFileHoldingsSource';
import { RawEntityRecord, TrackedEntity } from '../models/Holdings';
import { ActivityLog } from '../services/ActivityLog';
import { SnapshotRefresher } from '../services/SnapshotRefresher';
import { ErrorHandler } from '../utils/ErrorHandler';

class InMemoryHoldingsSource implements IHoldingsSource {
  readonly name = 'memory';
  failing = false;

  constructor(private readonly records: Record<string, RawEntityRecord>) {}

  async fetchEntity(entity: TrackedEntity): Promise<RawEntityRecord> {
    if (this.failing) {
      throw new Error(`invalid payload for ${entity.id}`);
    }
    return this.records[entity.id] ?? {};
  }
}

describe('DashboardServer', () => {
  let source: InMemoryHoldingsSource;
  let refresher: SnapshotRefresher;
  let activityLog: ActivityLog;
  let server: DashboardServer;

  beforeEach(() => {
    source = new InMemoryHoldingsSource({
      A: { assets: { X: { value_usd: 100 } } },
      B: { assets: { X: { value_usd: 300 }, Y: { value_usd: 50 } } }
    });
    activityLog = new ActivityLog();
    refresher = new SnapshotRefresher(
      source,
      [
        { id: 'A', category: 'exchange' },
        { id: 'B', category: 'institution' }
      ],
      {
        activityLog,
        errorHandler: new ErrorHandler({ sleep: async () => undefined }),
        now: () => new Date('2026-05-01T00:00:00.000Z')
      }
    );
    server = new DashboardServer({
      config: ConfigurationManager.getDefaultConfiguration(),
      refresher,
      activityLog
    });
  });

  const getJson = async (url: string, method: string = 'GET') => {
    const response = await server.route(method, url);
    return { status: response.status, payload: JSON.parse(response.body) };
  };

  it('should report degraded health before the first refresh', async () => {
    const { status, payload } = await getJson('/api/health');

    expect(status).toBe(200);
    expect(payload.status).toBe('degraded');
    expect(payload.lastRefresh).toBeNull();
  });

  it('should refresh on request and report healthy afterwards', async () => {
    const refreshed = await getJson('/api/refresh', 'POST');
    const health = await getJson('/api/health');

    expect(refreshed.payload).toEqual({ refreshedAt: '2026-05-01T00:00:00.000Z', entityCount: 2, failures: [] });
    expect(health.payload.status).toBe('healthy');
    expect(health.payload.lastRefresh).toBe('2026-05-01T00:00:00.000Z');
  });

  it('should serve the index as plain objects', async () => {
    await refresher.refreshNow();

    const { payload } = await getJson('/api/index');

    expect(Object.keys(payload.assets)).toEqual(['X', 'Y']);
    expect(payload.assets.X.entities).toEqual(['A', 'B']);
    expect(payload.entities.B.total_value).toBe(350);
  });

  it('should restrict the index to a requested selection', async () => {
    await refresher.refreshNow();

    const { payload } = await getJson('/api/index?entities=B&assets=X');

    expect(Object.keys(payload.entities)).toEqual(['B']);
    expect(payload.entities.B.total_value).toBe(300);
    expect(Object.keys(payload.assets)).toEqual(['X']);
    expect(payload.assets.X.entities).toEqual(['B']);
    expect(payload.assets.X.total_value).toBe(300);
  });

  it('should lay out the default selection when none is given', async () => {
    await refresher.refreshNow();

    const { payload } = await getJson('/api/scene');

    expect(payload.selection).toEqual({ entities: ['A', 'B'], assets: ['X', 'Y'] });
    expect(payload.scene.elements).toHaveLength(17);
    expect(payload.scene.viewRange).toEqual({ x: [-7, 7], y: [-7, 7], aspectRatio: 1 });
  });

  it('should honor explicit and cleared selections', async () => {
    await refresher.refreshNow();

    const single = await getJson('/api/scene?entities=B&assets=Y');
    const cleared = await getJson('/api/scene?entities=&assets=X');

    expect(single.payload.selection).toEqual({ entities: ['B'], assets: ['Y'] });
    expect(cleared.payload.selection).toEqual({ entities: [], assets: ['X'] });
    expect(cleared.payload.scene.elements).toEqual([]);
  });

  it('should serve table rows, statistics and the overlap matrix', async () => {
    await refresher.refreshNow();

    const { payload } = await getJson('/api/table?entities=A&entities=B&assets=Y,X');

    expect(payload.rows.map((row: { symbol: string }) => row.symbol)).toEqual(['X', 'Y']);
    expect(payload.stats).toEqual({ assetCount: 2, totalValue: 450, averageHolders: 1.5 });
    expect(payload.matrix).toEqual({
      assets: ['Y', 'X'],
      entities: ['A', 'B'],
      values: [
        [0, 50],
        [100, 300]
      ]
    });
  });

  it('should render the dashboard page', async () => {
    await refresher.refreshNow();

    const response = await server.route('GET', '/?entities=B&assets=Y');

    expect(response.status).toBe(200);
    expect(response.contentType).toBe('text/html; charset=utf-8');
    expect(response.body.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);
    expect(response.body).toContain('Last updated: 2026-05-01T00:00:00.000Z');
  });

  it('should render the no-data message before any refresh', async () => {
    const response = await server.route('GET', '/');

    expect(response.body).toContain('No data available for the selected filters');
  });

  it('should keep serving the previous snapshot when a refresh fails entirely', async () => {
    await refresher.refreshNow();
    source.failing = true;

    const refreshed = await getJson('/api/refresh', 'POST');
    const scene = await getJson('/api/scene?entities=A,B&assets=X');

    expect(refreshed.payload.entityCount).toBe(0);
    expect(refreshed.payload.failures).toHaveLength(2);
    expect(scene.payload.scene.elements.length).toBeGreaterThan(0);
  });

  it('should reject unknown routes and wrong methods', async () => {
    expect((await getJson('/api/unknown')).status).toBe(404);
    expect((await getJson('/favicon.ico')).status).toBe(404);
    expect((await getJson('/api/refresh')).status).toBe(405);
    expect((await getJson('/api/scene', 'POST')).status).toBe(405);
  });

  it('should answer preflight requests without a body', async () => {
    const response = await server.route('OPTIONS', '/api/scene');

    expect(response.status).toBe(204);
    expect(response.body).toBe('');
  });
});

describe('DashboardServer on the bundled sample data', () => {
  let server: DashboardServer;

  beforeEach(async () => {
    const config = ConfigurationManager.getDefaultConfiguration();
    const activityLog = new ActivityLog();
    const refresher = new SnapshotRefresher(
      new JsonFileHoldingsSource(path.join(__dirname, '..', '..', 'data', 'sample-holdings.json')),
      config.sources.entities,
      { activityLog, errorHandler: new ErrorHandler({ sleep: async () => undefined }) }
    );
    await refresher.refreshNow();
    server = new DashboardServer({ config, refresher, activityLog });
  });

  it('should draw every asset the default table lists', async () => {
    const scene = JSON.parse((await server.route('GET', '/api/scene')).body);
    const table = JSON.parse((await server.route('GET', '/api/table')).body);

    const drawn: string[] = scene.scene.elements
      .filter((element: { kind: string }) => element.kind === 'asset-bubble')
      .map((element: { assetId: string }) => element.assetId);
    const listed: string[] = table.rows.map((row: { symbol: string }) => row.symbol);

    expect(table.selection.assets).toEqual(['BTC', 'ETH', 'USDT', 'SOL', 'OKB', 'XRP', 'LEO', 'ADA', 'DOGE', 'DOT']);
    expect(table.selection.entities).toHaveLength(8);
    expect([...drawn].sort()).toEqual([...listed].sort());
    expect(drawn).toContain('BTC');
  });

  it('should name the selected assets the chart leaves out', async () => {
    const defaultPage = await server.route('GET', '/');
    const narrowed = await server.route('GET', '/?entities=binance&assets=BTC,XRP');

    expect(defaultPage.body).not.toContain('class="chart-omissions"');
    expect(narrowed.body).toContain('<p class="chart-omissions">Not drawn, held by an unselected entity: BTC</p>');
  });
});
