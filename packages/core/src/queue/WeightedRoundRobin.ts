interface Slot<K> {
  key: K;
  weight: number;
  current: number;
}

/**
 * Smooth weighted round-robin. Over one cycle (sum of weights / gcd) every
 * available key is picked in exact proportion to its weight, so a low weight
 * delays a key but never starves it.
 */
export class WeightedRoundRobin<K> {
  private slots: Slot<K>[];

  constructor(weights: Iterable<readonly [K, number]>) {
    this.slots = [];
    for (const [key, weight] of weights) {
      if (weight <= 0) {
        throw new Error("Weights must be greater than 0");
      }
      this.slots.push({ key, weight, current: 0 });
    }
  }

  next(isAvailable: (key: K) => boolean = () => true): K | null {
    let total = 0;
    let best: Slot<K> | null = null;

    for (const slot of this.slots) {
      if (!isAvailable(slot.key)) continue;
      slot.current += slot.weight;
      total += slot.weight;
      if (best === null || slot.current > best.current) {
        best = slot;
      }
    }

    if (best === null) return null;
    best.current -= total;
    return best.key;
  }

  reset(): void {
    for (const slot of this.slots) {
      slot.current = 0;
    }
  }
}
