export { initStore, closeStore, initModels, initServices } from './bootstrap/storeBootstrap';
export type { Store, ModelRegistry, ServiceRegistry } from './bootstrap/storeBootstrap';

export { initDb, closeDb, getDbPath } from './models/db';
export { runMigrations } from './models/runMigrations';
export { AnalysisCacheModel } from './models/AnalysisCacheModel';
export type { PutOptions } from './models/AnalysisCacheModel';
export { DocumentModel, reconstructChunkRanges } from './models/DocumentModel';
export { InteractionModel, estimateCost } from './models/InteractionModel';
export { SearchHistoryModel } from './models/SearchHistoryModel';
export { TelemetryModel } from './models/TelemetryModel';

export { AnalysisCacheService } from './services/AnalysisCacheService';
export type { GetOrComputeOptions } from './services/AnalysisCacheService';
export { DocumentService, estimateTokens } from './services/DocumentService';
export { TelemetryService } from './services/TelemetryService';
export { SearchHistoryService, countDeals } from './services/SearchHistoryService';
export type { RecordSearchOptions } from './services/SearchHistoryService';
export { MaintenanceService } from './services/MaintenanceService';
export { ConfirmationGate, DEFAULT_CONFIRMATION_WINDOW_MS } from './services/ConfirmationGate';
export {
  ServiceError,
  NotFoundError,
  ConstraintViolationError,
  StorageUnavailableError,
  MalformedInputError,
} from './services/base';

export { loadConfig, DEFAULT_COST_RATES } from './utils/config';
export type { StoreConfig } from './utils/config';
export { fingerprint, canonicalJson, contentHash } from './utils/fingerprint';
export { logger } from './utils/logger';
export { EventPayloadSchemas } from './shared/schemas/telemetrySchemas';

export * from './shared/types';
