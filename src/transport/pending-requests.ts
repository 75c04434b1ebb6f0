/**
 * Pending requests manager for response correlation.
 *
 * Tracks requests written to a stream transport and matches them with the
 * response that carries the same request id.
 *
 * @module transport/pending-requests
 */

import type { RequestId } from '../types.js';
import { RequestTimeoutError } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A request awaiting its response. Entries leave the map once settled.
 */
interface PendingRequest {
  readonly requestId: RequestId;
  readonly resolve: (value: Buffer) => void;
  readonly reject: (error: Error) => void;

  /** Timeout handle, null when the request waits indefinitely */
  readonly timeoutHandle: ReturnType<typeof setTimeout> | null;

  readonly timeoutMs: number;
  readonly createdAt: number;
}

/**
 * Statistics about pending requests.
 */
export interface PendingRequestsStats {
  readonly pendingCount: number;
  readonly totalInitiated: number;
  readonly totalResolved: number;
  readonly totalRejected: number;
  readonly totalTimedOut: number;
}

// =============================================================================
// PendingRequests Manager
// =============================================================================

/**
 * Correlates request ids with their response payloads.
 *
 * @example
 * ```typescript
 * const pending = new PendingRequests();
 * const promise = pending.register(requestId, 5000);
 *
 * // ... write the request, later when the response arrives:
 * pending.resolve(requestId, responsePayload);
 * ```
 */
export class PendingRequests {
  private readonly pending = new Map<RequestId, PendingRequest>();

  private totalInitiated = 0;
  private totalResolved = 0;
  private totalRejected = 0;
  private totalTimedOut = 0;

  /**
   * Registers a request and returns a promise for its response payload.
   *
   * @param timeoutMs - Rejects with RequestTimeoutError after this long; 0 waits indefinitely
   */
  register(requestId: RequestId, timeoutMs: number): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      let timeoutHandle: ReturnType<typeof setTimeout> | null = null;

      if (timeoutMs > 0) {
        timeoutHandle = setTimeout(() => {
          this.handleTimeout(requestId);
        }, timeoutMs);

        // Don't block process exit
        timeoutHandle.unref();
      }

      this.pending.set(requestId, {
        requestId,
        resolve,
        reject,
        timeoutHandle,
        timeoutMs,
        createdAt: Date.now(),
      });

      this.totalInitiated++;
    });
  }

  /**
   * Resolves a pending request.
   *
   * @returns true if the request was found and resolved
   */
  resolve(requestId: RequestId, payload: Buffer): boolean {
    const request = this.take(requestId);
    if (!request) {
      return false;
    }

    this.totalResolved++;
    request.resolve(payload);
    return true;
  }

  /**
   * Rejects a pending request.
   *
   * @returns true if the request was found and rejected
   */
  reject(requestId: RequestId, error: Error): boolean {
    const request = this.take(requestId);
    if (!request) {
      return false;
    }

    this.totalRejected++;
    request.reject(error);
    return true;
  }

  /**
   * Rejects every pending request.
   *
   * @returns Number of requests rejected
   */
  rejectAll(error: Error): number {
    const requests = Array.from(this.pending.keys());
    let rejected = 0;
    for (const requestId of requests) {
      if (this.reject(requestId, error)) {
        rejected++;
      }
    }
    return rejected;
  }

  isPending(requestId: RequestId): boolean {
    return this.pending.has(requestId);
  }

  get size(): number {
    return this.pending.size;
  }

  getStats(): PendingRequestsStats {
    return {
      pendingCount: this.pending.size,
      totalInitiated: this.totalInitiated,
      totalResolved: this.totalResolved,
      totalRejected: this.totalRejected,
      totalTimedOut: this.totalTimedOut,
    };
  }

  private take(requestId: RequestId): PendingRequest | undefined {
    const request = this.pending.get(requestId);
    if (!request) {
      return undefined;
    }

    if (request.timeoutHandle) {
      clearTimeout(request.timeoutHandle);
    }
    this.pending.delete(requestId);
    return request;
  }

  private handleTimeout(requestId: RequestId): void {
    const request = this.pending.get(requestId);
    if (!request) {
      return;
    }

    this.pending.delete(requestId);
    this.totalTimedOut++;

    request.reject(new RequestTimeoutError(requestId, request.timeoutMs));
  }
}
