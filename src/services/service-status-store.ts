/**
 * Latest real-time service status (closures and delays), applied to every plan
 */

import type { ServiceOverlay } from '../types/network.js';

export interface OverlaySummary {
  closedLines: number;
  closedStations: number;
  closedEdges: number;
  delayedLines: number;
  delayedEdges: number;
  updatedAt: string | null;
}

export class ServiceStatusStore {
  private overlay: ServiceOverlay = {};
  private updatedAt: Date | null = null;

  /**
   * Replace the whole overlay; status updates are full snapshots, not deltas
   */
  replace(overlay: ServiceOverlay): void {
    this.overlay = Object.freeze({
      closedLineIds: [...(overlay.closedLineIds ?? [])],
      closedStationIds: [...(overlay.closedStationIds ?? [])],
      closedEdgeIds: [...(overlay.closedEdgeIds ?? [])],
      lineDelays: { ...(overlay.lineDelays ?? {}) },
      edgeDelays: { ...(overlay.edgeDelays ?? {}) },
    });
    this.updatedAt = new Date();
  }

  current(): ServiceOverlay {
    return this.overlay;
  }

  summary(): OverlaySummary {
    return {
      closedLines: this.overlay.closedLineIds?.length ?? 0,
      closedStations: this.overlay.closedStationIds?.length ?? 0,
      closedEdges: this.overlay.closedEdgeIds?.length ?? 0,
      delayedLines: Object.keys(this.overlay.lineDelays ?? {}).length,
      delayedEdges: Object.keys(this.overlay.edgeDelays ?? {}).length,
      updatedAt: this.updatedAt ? this.updatedAt.toISOString() : null,
    };
  }
}
