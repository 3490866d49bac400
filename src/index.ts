/**
 * Holdings Overlap - Main Entry Point
 * Cross-referenced holdings index and overlap layout for multi-entity asset holdings
 */

export * from './models';
export * from './services';
export * from './connectors';
export * from './config';
export * from './utils';

// Application version and metadata
export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Holdings Overlap';
