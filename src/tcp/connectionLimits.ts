/**
 * Tracks open TCP connection counts per client address and in total.
 *
 * tryAcquire/tryAccept and release are the only mutation entry points. Each
 * runs synchronously from check to update, so no other admission decision
 * can interleave between them.
 */
export interface ConnectionLimitsConfig {
  /** 0 = unlimited */
  maxPerAddress: number;
  /** 0 = unlimited */
  maxTotal: number;
}

export type RejectionReason = 'total_limit' | 'address_limit';

export type AdmissionDecision = { ok: true } | { ok: false; reason: RejectionReason };

export interface ConnectionLimitsSnapshot {
  total: number;
  addresses: Record<string, number>;
  maxPerAddress: number;
  maxTotal: number;
}

export interface ConnectionLimits {
  tryAcquire: (address: string) => AdmissionDecision;
  tryAccept: (address: string) => boolean;
  release: (address: string) => void;
  getTotal: () => number;
  getCount: (address: string) => number;
  snapshot: () => ConnectionLimitsSnapshot;
}

export function createConnectionLimits(config: ConnectionLimitsConfig): ConnectionLimits {
  const addressCount = new Map<string, number>();
  let total = 0;
  const maxPerAddress = Math.max(0, config.maxPerAddress);
  const maxTotal = Math.max(0, config.maxTotal);

  function tryAcquire(address: string): AdmissionDecision {
    if (maxTotal > 0 && total >= maxTotal) return { ok: false, reason: 'total_limit' };
    const current = addressCount.get(address) ?? 0;
    if (maxPerAddress > 0 && current >= maxPerAddress) {
      return { ok: false, reason: 'address_limit' };
    }
    addressCount.set(address, current + 1);
    total += 1;
    return { ok: true };
  }

  function tryAccept(address: string): boolean {
    return tryAcquire(address).ok;
  }

  function release(address: string): void {
    const n = addressCount.get(address) ?? 0;
    if (n === 0) return;
    if (n === 1) {
      addressCount.delete(address);
    } else {
      addressCount.set(address, n - 1);
    }
    if (total > 0) total -= 1;
  }

  function getTotal(): number {
    return total;
  }

  function getCount(address: string): number {
    return addressCount.get(address) ?? 0;
  }

  function snapshot(): ConnectionLimitsSnapshot {
    return {
      total,
      addresses: Object.fromEntries(addressCount),
      maxPerAddress,
      maxTotal,
    };
  }

  return { tryAcquire, tryAccept, release, getTotal, getCount, snapshot };
}
