/**
 * Per-call view over a network snapshot
 *
 * Applies real-time closures, avoided lines, delay minutes and the alternatives
 * generator's edge exclusions without touching the shared snapshot.
 */

import type { Edge, NetworkSnapshot, ServiceOverlay } from '../types/network.js';

export interface GraphView {
  readonly network: NetworkSnapshot;
  outgoing(stationId: string): readonly Edge[];
  without(edgeIds: Iterable<string>): GraphView;
}

export interface GraphViewOptions {
  overlay?: ServiceOverlay;
  avoidLineIds?: readonly string[];
}

interface ViewRules {
  closedLines: ReadonlySet<string>;
  closedStations: ReadonlySet<string>;
  closedEdges: ReadonlySet<string>;
  lineDelays: ReadonlyMap<string, number>;
  edgeDelays: ReadonlyMap<string, number>;
}

function toDelayMap(delays: Record<string, number> | undefined): Map<string, number> {
  const map = new Map<string, number>();
  for (const [key, minutes] of Object.entries(delays ?? {})) {
    if (Number.isFinite(minutes) && minutes > 0) {
      map.set(key, minutes);
    }
  }
  return map;
}

class FilteredGraphView implements GraphView {
  private readonly cache = new Map<string, readonly Edge[]>();

  constructor(
    readonly network: NetworkSnapshot,
    private readonly rules: ViewRules,
    private readonly excluded: ReadonlySet<string>
  ) {}

  outgoing(stationId: string): readonly Edge[] {
    const cached = this.cache.get(stationId);
    if (cached) {
      return cached;
    }

    const edges: Edge[] = [];
    for (const edge of this.network.adjacency.get(stationId) ?? []) {
      if (this.isOpen(edge)) {
        edges.push(this.withDelay(edge));
      }
    }

    this.cache.set(stationId, edges);
    return edges;
  }

  without(edgeIds: Iterable<string>): GraphView {
    return new FilteredGraphView(this.network, this.rules, new Set([...this.excluded, ...edgeIds]));
  }

  private isOpen(edge: Edge): boolean {
    const { closedLines, closedStations, closedEdges } = this.rules;

    if (this.excluded.has(edge.id) || closedEdges.has(edge.id)) {
      return false;
    }
    if (closedStations.has(edge.fromStationId) || closedStations.has(edge.toStationId)) {
      return false;
    }
    return !(edge.kind === 'ride' && closedLines.has(edge.lineId));
  }

  private withDelay(edge: Edge): Edge {
    const lineDelay = edge.kind === 'ride' ? this.rules.lineDelays.get(edge.lineId) ?? 0 : 0;
    const delay = lineDelay + (this.rules.edgeDelays.get(edge.id) ?? 0);
    return delay > 0 ? { ...edge, travelTimeMinutes: edge.travelTimeMinutes + delay } : edge;
  }
}

export function createGraphView(network: NetworkSnapshot, options: GraphViewOptions = {}): GraphView {
  const { overlay = {}, avoidLineIds = [] } = options;

  return new FilteredGraphView(
    network,
    {
      closedLines: new Set([...(overlay.closedLineIds ?? []), ...avoidLineIds]),
      closedStations: new Set(overlay.closedStationIds ?? []),
      closedEdges: new Set(overlay.closedEdgeIds ?? []),
      lineDelays: toDelayMap(overlay.lineDelays),
      edgeDelays: toDelayMap(overlay.edgeDelays),
    },
    new Set()
  );
}
