import { createServer, IncomingMessage, ServerResponse } from 'http';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { ApplicationConfig, ConfigurationManager } from '../config/ConfigurationManager';
import { JsonFileHoldingsSource } from '../connectors/JsonFileHoldingsSource';
import { NormalizedIndex, emptyIndex, toIndexJSON } from '../models/Holdings';
import { ActivityLog } from '../services/ActivityLog';
import { IndexCache, aggregateSnapshot } from '../services/HoldingsAggregator';
import {
  Selection,
  buildHoldingsTable,
  buildOverlapMatrix,
  defaultSelection,
  filterIndex,
  selectAll,
  summarizeHoldings
} from '../services/HoldingsSummary';
import { OverlapLayoutEngine } from '../services/OverlapLayoutEngine';
import { SnapshotRefresher } from '../services/SnapshotRefresher';
import { ErrorHandler, isApplicationError } from '../utils/ErrorHandler';
import { DashboardPage } from './components/DashboardPage';

export interface DashboardServerOptions {
  config: ApplicationConfig;
  refresher: SnapshotRefresher;
  activityLog: ActivityLog;
  cache?: IndexCache;
}

export interface RouteResponse {
  status: number;
  contentType: string;
  body: string;
}

const COMPONENT = 'DashboardServer';

const json = (status: number, payload: unknown): RouteResponse => ({
  status,
  contentType: 'application/json',
  body: JSON.stringify(payload)
});

/**
 * Reads a comma-separated or repeated id parameter; null when the parameter is absent
 */
function readIds(params: URLSearchParams, name: string): string[] | null {
  if (!params.has(name)) {
    return null;
  }
  return params
    .getAll(name)
    .flatMap(value => value.split(','))
    .filter(id => id.length > 0);
}

/**
 * HTTP server for the holdings overlap dashboard
 */
export class DashboardServer {
  private server: ReturnType<typeof createServer>;
  private readonly config: ApplicationConfig;
  private readonly refresher: SnapshotRefresher;
  private readonly activityLog: ActivityLog;
  private readonly cache: IndexCache;
  private readonly engine: OverlapLayoutEngine;

  constructor(options: DashboardServerOptions) {
    this.config = options.config;
    this.refresher = options.refresher;
    this.activityLog = options.activityLog;
    this.cache = options.cache ?? new IndexCache();
    this.engine = new OverlapLayoutEngine(this.config.layout);

    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.activityLog.error('RESPONSE_FAILED', COMPONENT, {
          error: error instanceof Error ? error.message : String(error)
        });
      });
    });
  }

  /**
   * Resolves a request to a response without touching the socket
   */
  async route(method: string, rawUrl: string): Promise<RouteResponse> {
    const url = new URL(rawUrl, 'http://localhost');
    const path = url.pathname;

    try {
      if (path === '/' || path === '/index.html') {
        if (method !== 'GET') return json(405, { error: 'Method not allowed' });
        return {
          status: 200,
          contentType: 'text/html; charset=utf-8',
          body: this.renderPage(url.searchParams)
        };
      }

      if (!path.startsWith('/api/')) {
        return json(404, { error: 'Not found' });
      }

      if (method === 'OPTIONS') {
        return { status: 204, contentType: 'text/plain', body: '' };
      }

      return await this.handleApiRequest(method, path, url.searchParams);
    } catch (error) {
      this.activityLog.error('REQUEST_FAILED', COMPONENT, {
        method,
        path,
        error: error instanceof Error ? error.message : String(error)
      });
      return json(500, {
        error: 'Internal server error',
        message: isApplicationError(error) ? error.userMessage : 'An unexpected error occurred.'
      });
    }
  }

  private async handleApiRequest(method: string, path: string, params: URLSearchParams): Promise<RouteResponse> {
    switch (path) {
      case '/api/health': {
        if (method !== 'GET') break;
        const snapshot = this.refresher.getLastSnapshot();
        return json(200, {
          status: snapshot ? 'healthy' : 'degraded',
          timestamp: new Date(),
          version: this.config.version,
          lastRefresh: snapshot?.refreshedAt ?? null,
          refreshing: this.refresher.isRefreshing(),
          failedEntities: snapshot?.failures.map(failure => failure.entityId) ?? []
        });
      }
      case '/api/index': {
        if (method !== 'GET') break;
        const index = this.currentIndex();
        if (!params.has('entities') && !params.has('assets')) {
          return json(200, toIndexJSON(index));
        }
        const selection = this.resolveSelection(params, index);
        return json(200, toIndexJSON(filterIndex(index, selection.entities, selection.assets)));
      }
      case '/api/scene': {
        if (method !== 'GET') break;
        const index = this.currentIndex();
        const selection = this.resolveSelection(params, index);
        return json(200, {
          selection,
          scene: this.engine.layout(index, selection.entities, selection.assets)
        });
      }
      case '/api/table': {
        if (method !== 'GET') break;
        const index = this.currentIndex();
        const selection = this.resolveSelection(params, index);
        return json(200, {
          selection,
          rows: buildHoldingsTable(index, selection.entities, selection.assets),
          stats: summarizeHoldings(index, selection.assets),
          matrix: buildOverlapMatrix(index, selection.entities, selection.assets)
        });
      }
      case '/api/refresh': {
        if (method !== 'POST') break;
        const snapshot = await this.refresher.refreshNow();
        return json(200, {
          refreshedAt: snapshot.refreshedAt,
          entityCount: Object.keys(snapshot.records).length,
          failures: snapshot.failures
        });
      }
      default:
        return json(404, { error: 'API endpoint not found' });
    }

    return json(405, { error: 'Method not allowed' });
  }

  private renderPage(params: URLSearchParams): string {
    const index = this.currentIndex();
    const selection = this.resolveSelection(params, index);
    const snapshot = this.refresher.getLastSnapshot();

    const markup = renderToStaticMarkup(
      createElement(DashboardPage, {
        scene: this.engine.layout(index, selection.entities, selection.assets),
        rows: buildHoldingsTable(index, selection.entities, selection.assets),
        stats: summarizeHoldings(index, selection.assets),
        available: selectAll(index),
        selection,
        refreshedAt: snapshot?.refreshedAt ?? null,
        failures: snapshot?.failures ?? []
      })
    );

    return `<!DOCTYPE html>${markup}`;
  }

  /**
   * Index of the last good snapshot, aggregated once per refresh
   */
  private currentIndex(): NormalizedIndex {
    const snapshot = this.refresher.getLastSnapshot();
    if (!snapshot) {
      return emptyIndex();
    }

    return aggregateSnapshot(snapshot, this.cache, {
      onIssue: issue => {
        this.activityLog.warn('AGGREGATION_ISSUE', 'HoldingsAggregator', {
          kind: issue.kind,
          entityId: issue.entityId,
          assetId: issue.assetId ?? null,
          message: issue.message
        });
      }
    });
  }

  private resolveSelection(params: URLSearchParams, index: NormalizedIndex): Selection {
    const defaults = defaultSelection(
      index,
      this.config.dashboard.defaultEntityCount,
      this.config.dashboard.defaultAssetCount
    );

    return {
      entities: readIds(params, 'entities') ?? defaults.entities,
      assets: readIds(params, 'assets') ?? defaults.assets
    };
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method || 'GET';

    // Request bodies are not used; drain them before responding
    req.resume();

    const response = await this.route(method, req.url || '/');

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.writeHead(response.status, { 'Content-Type': response.contentType });
    res.end(response.body);
  }

  public start(): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(this.config.port, this.config.host, () => {
        this.activityLog.info('SERVER_STARTED', COMPONENT, {
          url: `http://${this.config.host}:${this.config.port}/`
        });
        resolve();
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.activityLog.info('SERVER_STOPPED', COMPONENT);
        resolve();
      });
    });
  }
}

/**
 * Loads configuration, starts the refresh schedule and serves the dashboard
 */
export async function main(): Promise<void> {
  const configManager = new ConfigurationManager();
  await configManager.loadConfiguration();
  const config = configManager.getConfiguration();

  const activityLog = new ActivityLog({ level: config.logLevel, echo: true });
  const refresher = new SnapshotRefresher(
    new JsonFileHoldingsSource(config.sources.snapshotPath),
    config.sources.entities,
    {
      activityLog,
      errorHandler: new ErrorHandler(),
      retryPolicy: {
        maxAttempts: config.refresh.maxAttempts,
        backoffMs: config.refresh.backoffMs,
        maxBackoffMs: config.refresh.maxBackoffMs
      }
    }
  );

  const server = new DashboardServer({ config, refresher, activityLog });
  // The first scheduled refresh runs immediately
  refresher.start(config.refresh.intervalMs);
  await server.start();

  // Graceful shutdown
  process.on('SIGINT', () => {
    refresher.stop();
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        activityLog.error('SHUTDOWN_FAILED', COMPONENT, {
          error: error instanceof Error ? error.message : String(error)
        });
        process.exit(1);
      }
    );
  });
}

// Start server if this file is run directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Failed to start dashboard server:', error);
    process.exit(1);
  });
}
