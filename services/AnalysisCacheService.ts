import { AnalysisCacheModel } from '../models/AnalysisCacheModel';
import { fingerprint } from '../utils/fingerprint';
import { BaseService } from './base/BaseService';
import { TelemetryService } from './TelemetryService';
import type { StoreConfig } from '../utils/config';
import type {
  CacheRequest,
  ComputeResult,
  EventKind,
  EventPayload,
  TelemetryContext,
} from '../shared/types';

interface AnalysisCacheServiceDeps {
  analysisCacheModel: AnalysisCacheModel;
  telemetryService: TelemetryService;
  settings: Pick<StoreConfig, 'cacheTtlMs' | 'singleFlight'>;
}

export interface GetOrComputeOptions {
  /** Overrides the configured TTL. `null` stores an entry that never expires. */
  ttlMs?: number | null;
  source?: string;
  telemetry?: TelemetryContext;
}

/**
 * Read-through cache in front of an external text-producing service.
 *
 * With single-flight on, concurrent misses for one fingerprint share a
 * single computation. With it off, each miss computes and the last write wins.
 */
export class AnalysisCacheService extends BaseService<AnalysisCacheServiceDeps> {
  private readonly inflight = new Map<string, Promise<string>>();

  constructor(deps: AnalysisCacheServiceDeps) {
    super('AnalysisCacheService', deps);
    this.logger.info(`[AnalysisCacheService] Initialized (single-flight ${deps.settings.singleFlight ? 'on' : 'off'}).`);
  }

  /**
   * Returns the cached payload for the request, or computes, stores and returns it.
   * A failed computation is not cached; callers sharing it all see the failure.
   */
  async getOrCompute(
    request: CacheRequest,
    compute: () => Promise<string>,
    options: GetOrComputeOptions = {}
  ): Promise<ComputeResult> {
    const { subject, queryKind, parameters = {} } = request;
    const key = fingerprint(subject, queryKind, parameters);

    const cached = this.deps.analysisCacheModel.getByFingerprint(key);
    if (cached) {
      this.logDebug(`Cache hit for ${subject}/${queryKind}`);
      this.recordEvent('cache_hit', { subject, queryKind }, options.telemetry);
      return { payload: cached.payload, cacheHit: true };
    }

    const shared = this.inflight.get(key);
    if (shared) {
      this.logDebug(`Joining in-flight computation for ${subject}/${queryKind}`);
      return { payload: await shared, cacheHit: false };
    }

    const pending = this.execute('compute', async () => {
      const payload = await compute();
      this.store(request, payload, options);
      return payload;
    }, { subject, queryKind, fingerprint: key });

    if (!this.deps.settings.singleFlight) {
      return { payload: await pending, cacheHit: false };
    }

    this.inflight.set(key, pending);
    try {
      return { payload: await pending, cacheHit: false };
    } finally {
      // cleanup() may have dropped this slot and a newer call claimed the key
      if (this.inflight.get(key) === pending) {
        this.inflight.delete(key);
      }
    }
  }

  /**
   * Newest live payload for each query kind cached under a subject.
   */
  restoreSubject(subject: string): Record<string, string> {
    const restored: Record<string, string> = {};
    // Entries arrive newest first, so the first seen per kind wins
    for (const entry of this.deps.analysisCacheModel.getAllForSubject(subject)) {
      if (!(entry.queryKind in restored)) {
        restored[entry.queryKind] = entry.payload;
      }
    }
    this.logDebug(`Restored ${Object.keys(restored).length} analyses for ${subject}`);
    return restored;
  }

  /**
   * Number of computations currently shared between callers.
   */
  inflightCount(): number {
    return this.inflight.size;
  }

  async cleanup(): Promise<void> {
    this.inflight.clear();
  }

  private store(request: CacheRequest, payload: string, options: GetOrComputeOptions): void {
    const { subject, queryKind, parameters = {} } = request;

    // Empty results are returned but never cached
    if (payload.length === 0) {
      this.logWarn(`Empty result for ${subject}/${queryKind}; not caching.`);
      return;
    }

    const ttl = options.ttlMs === undefined ? this.deps.settings.cacheTtlMs : options.ttlMs;
    this.deps.analysisCacheModel.put(subject, queryKind, parameters, payload, {
      source: options.source,
      ttlMs: ttl ?? undefined,
    });
    this.recordEvent('market_analysis', { subject, queryKind, resultLength: payload.length }, options.telemetry);
  }

  private recordEvent(kind: EventKind, payload: EventPayload, context?: TelemetryContext): void {
    this.deps.telemetryService.log(kind, payload, context);
  }
}
