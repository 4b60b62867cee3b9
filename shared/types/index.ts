// Central export point for all types

export * from './cache.types';
export * from './document.types';
export * from './history.types';
export * from './telemetry.types';
export * from './maintenance.types';
