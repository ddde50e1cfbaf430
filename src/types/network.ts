/**
 * Network topology types
 * Input shapes supplied by the topology provider, and the frozen snapshot built from them
 */

export type LineStatus = 'active' | 'maintenance' | 'inactive';

export type EdgeKind = 'ride' | 'transfer';

export interface Station {
  id: string;
  name: string;
  lat: number;
  lon: number;
  zone: number;
  isInterchange: boolean;
  lineId: string; // Owning line
}

/**
 * Travel between two consecutive stations of a line (applies in both directions)
 */
export interface LineHop {
  travelTimeMinutes: number;
  distanceKm: number;
  baseCost: number;
}

export interface Line {
  id: string;
  companyId: string;
  name: string;
  color: string | null;
  status: LineStatus;
  stationIds: string[]; // Ordered along the line
  hops: LineHop[]; // hops[i] joins stationIds[i] and stationIds[i + 1]
}

export interface TransferLink {
  id: string;
  stationAId: string;
  stationBId: string;
  walkingTimeMinutes: number;
  walkingDistanceMeters: number;
  transferFee: number;
  isActive: boolean;
}

interface EdgeBase {
  id: string;
  fromStationId: string;
  toStationId: string;
  travelTimeMinutes: number;
  distanceKm: number;
  cost: number;
}

export interface RideEdge extends EdgeBase {
  kind: 'ride';
  lineId: string;
}

export interface TransferEdge extends EdgeBase {
  kind: 'transfer';
  transferLinkId: string;
}

export type Edge = RideEdge | TransferEdge;

export interface NetworkSnapshot {
  readonly stations: ReadonlyMap<string, Readonly<Station>>;
  readonly lines: ReadonlyMap<string, Readonly<Line>>;
  readonly transferLinks: ReadonlyMap<string, Readonly<TransferLink>>;
  readonly adjacency: ReadonlyMap<string, readonly Edge[]>; // Outgoing edges sorted by id
  readonly edges: ReadonlyMap<string, Edge>;
}

/**
 * Real-time closures and delays applied to a single planning call
 */
export interface ServiceOverlay {
  closedLineIds?: string[];
  closedStationIds?: string[];
  closedEdgeIds?: string[];
  lineDelays?: Record<string, number>; // Minutes added to every ride edge of the line
  edgeDelays?: Record<string, number>; // Minutes added to a single edge
}
