/**
 * Network Model
 *
 * Builds an immutable directed weighted graph from station, line and transfer data.
 * Ride edges are generated in both directions for every hop of an active line;
 * each active transfer link becomes a symmetric pair of transfer edges.
 * Validation is all-or-nothing: any issue aborts the build with an IntegrityError.
 */

import type {
  Edge,
  Line,
  NetworkSnapshot,
  RideEdge,
  Station,
  TransferEdge,
  TransferLink,
} from '../types/network.js';
import { IntegrityError } from './errors.js';

export function rideEdgeId(lineId: string, fromStationId: string, toStationId: string): string {
  return `ride:${lineId}:${fromStationId}>${toStationId}`;
}

export function transferEdgeId(linkId: string, fromStationId: string, toStationId: string): string {
  return `transfer:${linkId}:${fromStationId}>${toStationId}`;
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function indexById<T extends { id: string }>(
  items: readonly T[],
  kind: string,
  issues: string[]
): Map<string, Readonly<T>> {
  const index = new Map<string, Readonly<T>>();
  for (const item of items) {
    if (index.has(item.id)) {
      issues.push(`duplicate ${kind} id ${item.id}`);
      continue;
    }
    index.set(item.id, Object.freeze({ ...item }));
  }
  return index;
}

function validateStations(
  stations: ReadonlyMap<string, Station>,
  lines: ReadonlyMap<string, Line>,
  issues: string[]
): void {
  for (const station of stations.values()) {
    if (!lines.has(station.lineId)) {
      issues.push(`station ${station.id} references unknown line ${station.lineId}`);
    }
    if (!Number.isInteger(station.zone) || station.zone < 1) {
      issues.push(`station ${station.id} has invalid zone ${station.zone}`);
    }
  }
}

function buildRideEdges(
  line: Line,
  stations: ReadonlyMap<string, Station>,
  issues: string[]
): RideEdge[] {
  const edges: RideEdge[] = [];

  for (const stationId of line.stationIds) {
    const station = stations.get(stationId);
    if (!station) {
      issues.push(`line ${line.id} references unknown station ${stationId}`);
    } else if (station.lineId !== line.id) {
      issues.push(`line ${line.id} lists station ${stationId} owned by line ${station.lineId}`);
    }
  }

  if (line.status !== 'active') {
    return edges;
  }

  if (line.stationIds.length < 2) {
    issues.push(`active line ${line.id} has fewer than two stations`);
    return edges;
  }

  if (line.hops.length !== line.stationIds.length - 1) {
    issues.push(
      `line ${line.id} has ${line.hops.length} hops for ${line.stationIds.length} stations`
    );
    return edges;
  }

  line.hops.forEach((hop, i) => {
    const from = line.stationIds[i];
    const to = line.stationIds[i + 1];

    if (
      !isNonNegative(hop.travelTimeMinutes) ||
      !isNonNegative(hop.distanceKm) ||
      !isNonNegative(hop.baseCost)
    ) {
      issues.push(`line ${line.id} hop ${from}-${to} has a negative or non-finite weight`);
      return;
    }

    const weights = {
      travelTimeMinutes: hop.travelTimeMinutes,
      distanceKm: hop.distanceKm,
      cost: hop.baseCost,
    };

    edges.push(
      { kind: 'ride', id: rideEdgeId(line.id, from, to), fromStationId: from, toStationId: to, lineId: line.id, ...weights },
      { kind: 'ride', id: rideEdgeId(line.id, to, from), fromStationId: to, toStationId: from, lineId: line.id, ...weights }
    );
  });

  return edges;
}

function buildTransferEdges(
  link: TransferLink,
  stations: ReadonlyMap<string, Station>,
  issues: string[]
): TransferEdge[] {
  const problems: string[] = [];

  if (!stations.has(link.stationAId)) {
    problems.push(`transfer link ${link.id} references unknown station ${link.stationAId}`);
  }
  if (!stations.has(link.stationBId)) {
    problems.push(`transfer link ${link.id} references unknown station ${link.stationBId}`);
  }
  if (link.stationAId === link.stationBId) {
    problems.push(`transfer link ${link.id} links station ${link.stationAId} to itself`);
  }
  if (
    !isNonNegative(link.walkingTimeMinutes) ||
    !isNonNegative(link.walkingDistanceMeters) ||
    !isNonNegative(link.transferFee)
  ) {
    problems.push(`transfer link ${link.id} has a negative or non-finite weight`);
  }

  if (problems.length > 0) {
    issues.push(...problems);
    return [];
  }

  if (!link.isActive) {
    return [];
  }

  const weights = {
    travelTimeMinutes: link.walkingTimeMinutes,
    distanceKm: link.walkingDistanceMeters / 1000,
    cost: link.transferFee,
  };

  return [
    {
      kind: 'transfer',
      id: transferEdgeId(link.id, link.stationAId, link.stationBId),
      fromStationId: link.stationAId,
      toStationId: link.stationBId,
      transferLinkId: link.id,
      ...weights,
    },
    {
      kind: 'transfer',
      id: transferEdgeId(link.id, link.stationBId, link.stationAId),
      fromStationId: link.stationBId,
      toStationId: link.stationAId,
      transferLinkId: link.id,
      ...weights,
    },
  ];
}

/**
 * Build a frozen network snapshot
 *
 * @throws IntegrityError listing every problem found in the input
 */
export function buildNetwork(
  stations: readonly Station[],
  lines: readonly Line[],
  transferLinks: readonly TransferLink[]
): NetworkSnapshot {
  const issues: string[] = [];

  const stationIndex = indexById(stations, 'station', issues);
  const lineIndex = indexById(
    lines.map((line) => ({
      ...line,
      stationIds: [...line.stationIds],
      hops: line.hops.map((hop) => ({ ...hop })),
    })),
    'line',
    issues
  );
  const linkIndex = indexById(transferLinks, 'transfer link', issues);

  validateStations(stationIndex, lineIndex, issues);

  const allEdges: Edge[] = [];
  for (const line of lineIndex.values()) {
    allEdges.push(...buildRideEdges(line, stationIndex, issues));
  }
  for (const link of linkIndex.values()) {
    allEdges.push(...buildTransferEdges(link, stationIndex, issues));
  }

  if (issues.length > 0) {
    throw new IntegrityError(issues);
  }

  const edges = new Map<string, Edge>();
  const outgoing = new Map<string, Edge[]>();
  for (const stationId of stationIndex.keys()) {
    outgoing.set(stationId, []);
  }

  for (const edge of allEdges) {
    const frozen = Object.freeze(edge);
    edges.set(frozen.id, frozen);
    outgoing.get(frozen.fromStationId)?.push(frozen);
  }

  const adjacency = new Map<string, readonly Edge[]>();
  for (const [stationId, list] of outgoing) {
    list.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    adjacency.set(stationId, Object.freeze(list));
  }

  return Object.freeze({
    stations: stationIndex,
    lines: lineIndex,
    transferLinks: linkIndex,
    adjacency,
    edges,
  });
}
