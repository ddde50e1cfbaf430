/**
 * Snapshot Store
 *
 * Holds the current network + fare table snapshot behind a single reference.
 * A rebuild constructs a complete new snapshot before swapping the reference,
 * so readers always see either the old snapshot or the new one, never a mix.
 * A failed rebuild leaves the previous snapshot in effect.
 */

import type { FareTable } from '../types/fare.js';
import type { NetworkSnapshot } from '../types/network.js';
import type { TopologyData } from '../types/topology.js';
import { SnapshotUnavailableError } from './errors.js';
import { buildFareTable } from './fare-table.js';
import { buildNetwork } from './network-model.js';

export interface EngineSnapshot {
  readonly version: number;
  readonly builtAt: Date;
  readonly network: NetworkSnapshot;
  readonly fares: FareTable;
}

export interface SnapshotSource {
  acquire(): EngineSnapshot;
}

export class SnapshotStore implements SnapshotSource {
  private current: EngineSnapshot | null = null;
  private nextVersion = 1;

  constructor(private readonly currency?: string) {}

  /**
   * Build and atomically install a new snapshot
   *
   * @throws IntegrityError if the topology or fare data is malformed
   */
  rebuild(data: TopologyData): EngineSnapshot {
    const network = buildNetwork(data.stations, data.lines, data.transferLinks);
    const fares = buildFareTable(network, {
      fareRules: data.fareRules,
      passengerTypes: data.passengerTypes,
      groupDiscounts: data.groupDiscounts,
      currency: this.currency,
    });

    const snapshot: EngineSnapshot = Object.freeze({
      version: this.nextVersion,
      builtAt: new Date(),
      network,
      fares,
    });

    this.nextVersion += 1;
    this.current = snapshot;
    return snapshot;
  }

  /**
   * Current snapshot; callers keep the reference for the duration of one request
   */
  acquire(): EngineSnapshot {
    if (!this.current) {
      throw new SnapshotUnavailableError();
    }
    return this.current;
  }

  peek(): EngineSnapshot | null {
    return this.current;
  }
}
