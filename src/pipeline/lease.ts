/**
 * Exclusive per-order leases.
 *
 * A worker holds an order for one pipeline cycle. A lease that outlives its
 * TTL (a crashed worker) can be taken over by anyone.
 */

import { PipelineError } from "../types/errors.js";

export interface OrderLease {
  orderId: string;
  holder: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

export class OrderLeaseManager {
  private readonly leases = new Map<string, OrderLease>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Take or renew the lease on an order.
   *
   * @throws PipelineError LEASE_HELD when another holder has a live lease
   */
  acquire(orderId: string, holder: string): OrderLease {
    const current = this.leases.get(orderId);
    const now = this.now();
    if (current !== undefined && current.holder !== holder && current.expiresAt > now) {
      throw new PipelineError("LEASE_HELD", `Order ${orderId} is leased by ${current.holder}`, {
        orderId,
        holder: current.holder,
        expiresAt: current.expiresAt,
      });
    }
    const lease: OrderLease = { orderId, holder, expiresAt: now + this.ttlMs };
    this.leases.set(orderId, lease);
    return lease;
  }

  /** Releases only the caller's own lease. */
  release(lease: OrderLease): boolean {
    const current = this.leases.get(lease.orderId);
    if (current === undefined || current.holder !== lease.holder) {
      return false;
    }
    this.leases.delete(lease.orderId);
    return true;
  }

  holderOf(orderId: string): string | null {
    const current = this.leases.get(orderId);
    if (current === undefined || current.expiresAt <= this.now()) {
      return null;
    }
    return current.holder;
  }
}
