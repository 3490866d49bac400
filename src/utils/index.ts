export * from './ErrorHandler';
export * from './colors';
export * from './geometry';
export * from './format';
