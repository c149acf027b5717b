/**
 * Idempotency Module
 *
 * Optional guard against rapid duplicate deliveries of the same webhook.
 *
 * A delivery is keyed by (event, record id, restart flag). A second delivery
 * with the same key is rejected while the first is in flight, and for one
 * window after it completed. A failed run releases its key, so the same
 * signal can be retried at once.
 *
 * State is in process memory only; a window of 0 disables the guard.
 */

import { createHash } from 'crypto';

// ============================================================================
// Keys
// ============================================================================

export interface IdempotencyKeyInput {
  event: string;
  recordId: string;
  restart: boolean;
}

/**
 * Deterministic delivery key
 *
 * Algorithm:
 * 1. Join event | record id | restart with a pipe separator
 * 2. Hash using SHA-256
 * 3. Prefix the first 16 hex characters with "evt_"
 */
export function generateIdempotencyKey(input: IdempotencyKeyInput): string {
  const hashInput = [
    input.event,
    input.recordId,
    input.restart ? 'restart' : 'normal',
  ].join('|');

  const hash = createHash('sha256').update(hashInput).digest('hex');
  return `evt_${hash.substring(0, 16)}`;
}

// ============================================================================
// Guard
// ============================================================================

export type DuplicateReason = 'in_flight' | 'completed';

export type GuardDecision =
  | { accepted: true; key: string | null }
  | { accepted: false; key: string; reason: DuplicateReason };

interface GuardEntry {
  state: DuplicateReason;
  /** Set on completion; in-flight claims last until settled */
  expiresAt: number | null;
}

export interface IdempotencyGuardOptions {
  /** Duplicate window in milliseconds; 0 disables the guard */
  windowMs: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

export class IdempotencyGuard {
  private readonly windowMs: number;
  private readonly now: () => number;
  private entries: Map<string, GuardEntry> = new Map();

  constructor(options: IdempotencyGuardOptions) {
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.windowMs > 0;
  }

  /**
   * Claim a delivery. An accepted claim must be settled with `complete`
   * or `release`.
   */
  begin(event: string, recordId: string, restart: boolean): GuardDecision {
    if (!this.enabled) {
      return { accepted: true, key: null };
    }

    const now = this.now();
    this.prune(now);

    const key = generateIdempotencyKey({ event, recordId, restart });

    const existing = this.entries.get(key);
    if (existing) {
      return { accepted: false, key, reason: existing.state };
    }

    this.entries.set(key, { state: 'in_flight', expiresAt: null });
    return { accepted: true, key };
  }

  /** Mark a claimed delivery as done; duplicates stay rejected for one window */
  complete(key: string | null): void {
    if (key === null) {
      return;
    }
    const entry = this.entries.get(key);
    if (entry) {
      entry.state = 'completed';
      entry.expiresAt = this.now() + this.windowMs;
    }
  }

  /** Drop a claim so the same delivery can be retried */
  release(key: string | null): void {
    if (key !== null) {
      this.entries.delete(key);
    }
  }

  /** Number of live claims */
  get size(): number {
    return this.entries.size;
  }

  private prune(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
