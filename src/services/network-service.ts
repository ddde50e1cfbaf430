/**
 * Network Service
 *
 * Loads topology from the provider and installs it as the next snapshot.
 * Reloads are serialized: a reload requested while another is running waits for it,
 * so two rebuilds never race to swap the reference.
 */

import { IntegrityError } from '../engine/errors.js';
import type { EngineSnapshot, SnapshotStore } from '../engine/snapshot-store.js';
import type { Logger } from '../utils/logger.js';
import type { EngineMetrics } from '../utils/metrics.js';
import type { TopologyProvider } from './topology-repository.js';

export interface NetworkServiceDeps {
  store: SnapshotStore;
  provider: TopologyProvider;
  logger: Logger;
  metrics?: EngineMetrics;
}

export interface ReloadResult {
  version: number;
  builtAt: string;
  stations: number;
  lines: number;
  edges: number;
}

export function summarizeSnapshot(snapshot: EngineSnapshot): ReloadResult {
  return {
    version: snapshot.version,
    builtAt: snapshot.builtAt.toISOString(),
    stations: snapshot.network.stations.size,
    lines: snapshot.network.lines.size,
    edges: snapshot.network.edges.size,
  };
}

export class NetworkService {
  private readonly store: SnapshotStore;
  private readonly provider: TopologyProvider;
  private readonly logger: Logger;
  private readonly metrics?: EngineMetrics;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(deps: NetworkServiceDeps) {
    if (!deps.store) {
      throw new Error('store is required');
    }
    if (!deps.provider) {
      throw new Error('provider is required');
    }
    if (!deps.logger) {
      throw new Error('logger is required');
    }
    this.store = deps.store;
    this.provider = deps.provider;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
  }

  /**
   * Load topology and swap in a new snapshot
   *
   * @throws IntegrityError when the data fails validation; the previous snapshot stays current
   */
  reload(reason: string, correlationId?: string): Promise<ReloadResult> {
    const run = this.pending.then(
      () => this.rebuild(reason, correlationId),
      () => this.rebuild(reason, correlationId)
    );
    this.pending = run;
    return run;
  }

  private async rebuild(reason: string, correlationId?: string): Promise<ReloadResult> {
    this.logger.info('Rebuilding network snapshot', { reason, correlation_id: correlationId });

    try {
      const data = await this.provider.load();
      const result = summarizeSnapshot(this.store.rebuild(data));

      this.metrics?.recordRebuild('success');
      this.logger.info('Network snapshot rebuilt', {
        ...result,
        reason,
        correlation_id: correlationId,
      });
      return result;
    } catch (error) {
      this.metrics?.recordRebuild('failure');

      if (error instanceof IntegrityError) {
        this.logger.error('Network data failed integrity checks', {
          issues: error.issues,
          reason,
          currentVersion: this.store.peek()?.version ?? null,
          correlation_id: correlationId,
        });
      } else {
        this.logger.error('Network snapshot rebuild failed', {
          error: error instanceof Error ? error.message : String(error),
          reason,
          correlation_id: correlationId,
        });
      }
      throw error;
    }
  }
}

export function createNetworkService(deps: NetworkServiceDeps): NetworkService {
  return new NetworkService(deps);
}
