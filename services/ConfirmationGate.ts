import { BaseService } from './base/BaseService';
import type { BulkDeleteScope } from '../shared/types';

interface ConfirmationGateDeps {
  /** How long an arm stays valid, in milliseconds. */
  windowMs: number;
}

export const DEFAULT_CONFIRMATION_WINDOW_MS = 10_000;

/**
 * Two-step confirmation for destructive operations: a caller arms a scope,
 * then commits it within the window. Arms live in memory, per instance.
 */
export class ConfirmationGate extends BaseService<ConfirmationGateDeps> {
  private readonly armed = new Map<string, number>();

  constructor(deps: ConfirmationGateDeps = { windowMs: DEFAULT_CONFIRMATION_WINDOW_MS }) {
    super('ConfirmationGate', deps);
  }

  /**
   * Records intent to run `scope` for this session. Re-arming restarts the window.
   * Returns the time the arm expires.
   */
  arm(scope: BulkDeleteScope, sessionToken: string): number {
    const now = Date.now();
    this.pruneExpired(now);
    const expiresAt = now + this.deps.windowMs;
    this.armed.set(this.key(scope, sessionToken), expiresAt);
    this.logInfo(`Armed '${scope}' until ${new Date(expiresAt).toISOString()}`);
    return expiresAt;
  }

  /**
   * True only when a matching arm exists and has not expired. Consumes the arm either way.
   */
  commit(scope: BulkDeleteScope, sessionToken: string): boolean {
    const key = this.key(scope, sessionToken);
    const expiresAt = this.armed.get(key);
    this.armed.delete(key);

    if (expiresAt === undefined) {
      this.logWarn(`Commit of '${scope}' without a matching arm`);
      return false;
    }
    if (Date.now() > expiresAt) {
      this.logWarn(`Arm for '${scope}' expired before commit`);
      return false;
    }
    return true;
  }

  disarm(scope: BulkDeleteScope, sessionToken: string): boolean {
    return this.armed.delete(this.key(scope, sessionToken));
  }

  isArmed(scope: BulkDeleteScope, sessionToken: string): boolean {
    const expiresAt = this.armed.get(this.key(scope, sessionToken));
    return expiresAt !== undefined && Date.now() <= expiresAt;
  }

  /**
   * Number of arms held in memory, expired ones included until the next arm().
   */
  armedCount(): number {
    return this.armed.size;
  }

  async cleanup(): Promise<void> {
    this.armed.clear();
  }

  private pruneExpired(now: number): void {
    for (const [key, expiresAt] of this.armed) {
      if (now > expiresAt) {
        this.armed.delete(key);
      }
    }
  }

  private key(scope: BulkDeleteScope, sessionToken: string): string {
    return `${scope}\u0000${sessionToken}`;
  }
}
