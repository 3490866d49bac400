export * from './HoldingsSource';
export * from './JsonFileHoldingsSource';
