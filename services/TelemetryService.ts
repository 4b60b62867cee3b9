import { TelemetryModel } from '../models/TelemetryModel';
import { EventPayloadSchemas, isKnownEventKind } from '../shared/schemas/telemetrySchemas';
import { BaseService } from './base/BaseService';
import type {
  DailyEventCount,
  EventKind,
  EventKindCount,
  EventPayload,
  TelemetryContext,
  TelemetryEvent,
} from '../shared/types';

interface TelemetryServiceDeps {
  telemetryModel: TelemetryModel;
}

/**
 * Records usage events. Payloads of known kinds are checked against their
 * documented shape; a mismatch is logged and the event is stored anyway.
 */
export class TelemetryService extends BaseService<TelemetryServiceDeps> {
  constructor(deps: TelemetryServiceDeps) {
    super('TelemetryService', deps);
    this.logger.info("[TelemetryService] Initialized.");
  }

  log(eventKind: EventKind, payload?: EventPayload, context: TelemetryContext = {}): string {
    if (payload !== undefined && isKnownEventKind(eventKind)) {
      const result = EventPayloadSchemas[eventKind].safeParse(payload);
      if (!result.success) {
        this.logWarn(`Payload for '${eventKind}' does not match its documented shape:`,
          result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
      }
    }
    return this.deps.telemetryModel.log(eventKind, payload ?? null, context);
  }

  recent(limit?: number): TelemetryEvent[] {
    return this.deps.telemetryModel.recent(limit);
  }

  dailyCounts(windowMs: number): DailyEventCount[] {
    return this.deps.telemetryModel.dailyCounts(windowMs);
  }

  countsByKind(windowMs: number): EventKindCount[] {
    return this.deps.telemetryModel.countsByKind(windowMs);
  }

  purgeOlderThan(ageMs: number): number {
    return this.deps.telemetryModel.purgeOlderThan(ageMs);
  }

  deleteAll(): number {
    return this.deps.telemetryModel.deleteAll();
  }
}
