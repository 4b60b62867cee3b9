import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { loadConfig, type StoreConfig } from '../utils/config';
import { initDb, closeDb } from '../models/db';
import { runMigrations } from '../models/runMigrations';
import { AnalysisCacheModel } from '../models/AnalysisCacheModel';
import { DocumentModel } from '../models/DocumentModel';
import { InteractionModel } from '../models/InteractionModel';
import { SearchHistoryModel } from '../models/SearchHistoryModel';
import { TelemetryModel } from '../models/TelemetryModel';
import { AnalysisCacheService } from '../services/AnalysisCacheService';
import { ConfirmationGate } from '../services/ConfirmationGate';
import { DocumentService } from '../services/DocumentService';
import { MaintenanceService } from '../services/MaintenanceService';
import { SearchHistoryService } from '../services/SearchHistoryService';
import { TelemetryService } from '../services/TelemetryService';

/**
 * Registry of all database models
 */
export interface ModelRegistry {
  analysisCacheModel: AnalysisCacheModel;
  documentModel: DocumentModel;
  interactionModel: InteractionModel;
  searchHistoryModel: SearchHistoryModel;
  telemetryModel: TelemetryModel;
}

export interface ServiceRegistry {
  telemetry: TelemetryService;
  analysisCache: AnalysisCacheService;
  documents: DocumentService;
  searches: SearchHistoryService;
  confirmationGate: ConfirmationGate;
  maintenance: MaintenanceService;
}

export interface Store {
  db: Database.Database;
  config: StoreConfig;
  models: ModelRegistry;
  services: ServiceRegistry;
}

/**
 * Instantiates every model over one connection.
 */
export function initModels(db: Database.Database, config: StoreConfig): ModelRegistry {
  logger.info('[StoreBootstrap] Initializing models...');
  return {
    analysisCacheModel: new AnalysisCacheModel(db),
    documentModel: new DocumentModel(db),
    interactionModel: new InteractionModel(db, config.costRates),
    searchHistoryModel: new SearchHistoryModel(db),
    telemetryModel: new TelemetryModel(db),
  };
}

/**
 * Wires services to their models. Order follows dependencies: telemetry first.
 */
export function initServices(db: Database.Database, models: ModelRegistry, config: StoreConfig): ServiceRegistry {
  logger.info('[StoreBootstrap] Initializing services...');

  const telemetry = new TelemetryService({ telemetryModel: models.telemetryModel });

  const analysisCache = new AnalysisCacheService({
    analysisCacheModel: models.analysisCacheModel,
    telemetryService: telemetry,
    settings: { cacheTtlMs: config.cacheTtlMs, singleFlight: config.singleFlight },
  });

  const documents = new DocumentService({
    documentModel: models.documentModel,
    interactionModel: models.interactionModel,
    telemetryService: telemetry,
  });

  const searches = new SearchHistoryService({
    searchHistoryModel: models.searchHistoryModel,
    telemetryService: telemetry,
  });

  const confirmationGate = new ConfirmationGate({ windowMs: config.confirmationWindowMs });

  const maintenance = new MaintenanceService({
    db,
    ...models,
    confirmationGate,
    settings: { telemetryRetentionMs: config.telemetryRetentionMs },
  });

  return { telemetry, analysisCache, documents, searches, confirmationGate, maintenance };
}

/**
 * Opens the database, applies pending migrations and builds the models and services.
 * @param config Store settings; read from the environment when omitted.
 */
export function initStore(config: StoreConfig = loadConfig()): Store {
  const db = initDb(config.dbPath);
  try {
    const applied = runMigrations(db);
    logger.info(`[StoreBootstrap] Database ready (${applied} migration(s) applied).`);

    const models = initModels(db, config);
    const services = initServices(db, models, config);
    return { db, config, models, services };
  } catch (error) {
    logger.error('[StoreBootstrap] Store initialization failed:', error);
    closeDb(db);
    throw error;
  }
}

/**
 * Releases service state in reverse order of construction, then closes the connection.
 */
export async function closeStore(store: Store): Promise<void> {
  logger.info('[StoreBootstrap] Closing store...');
  const { services } = store;
  const servicesToCleanup = [
    services.maintenance,
    services.confirmationGate,
    services.searches,
    services.documents,
    services.analysisCache,
    services.telemetry,
  ];

  for (const service of servicesToCleanup) {
    try {
      await service.cleanup();
      logger.debug(`[StoreBootstrap] Cleaned up ${service.constructor.name}`);
    } catch (error) {
      logger.error(`[StoreBootstrap] Failed to cleanup ${service.constructor.name}:`, error);
    }
  }

  closeDb(store.db);
}
