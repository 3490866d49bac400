export * from './HoldingsAggregator';
export * from './OverlapLayoutEngine';
export * from './HoldingsSummary';
export * from './SnapshotRefresher';
export * from './ActivityLog';
