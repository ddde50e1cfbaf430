/**
 * Itinerary assembly from a path of edges
 */

import { createHash } from 'crypto';
import type { Edge, NetworkSnapshot } from '../types/network.js';
import type { Itinerary, ItinerarySegment, Objective } from '../types/itinerary.js';
import { roundTo } from '../utils/rounding.js';
import { compareIds, edgeScore } from './objective.js';

const MS_PER_MINUTE = 60_000;

function describeSegment(segment: ItinerarySegment): string {
  if (segment.kind === 'ride') {
    return `Take ${segment.lineName} from ${segment.fromStationName} to ${segment.toStationName}`;
  }
  return `Walk ${segment.travelTimeMinutes} minutes from ${segment.fromStationName} to ${segment.toStationName}`;
}

function toSegment(network: NetworkSnapshot, edge: Edge, index: number): ItinerarySegment {
  const from = network.stations.get(edge.fromStationId);
  const to = network.stations.get(edge.toStationId);
  if (!from || !to) {
    // Snapshot construction guarantees both endpoints exist
    throw new Error(`Edge ${edge.id} references a station missing from the snapshot`);
  }

  const base = {
    index,
    edgeId: edge.id,
    fromStationId: from.id,
    fromStationName: from.name,
    fromZone: from.zone,
    toStationId: to.id,
    toStationName: to.name,
    toZone: to.zone,
    travelTimeMinutes: edge.travelTimeMinutes,
    distanceKm: edge.distanceKm,
    cost: edge.cost,
    instruction: '',
  };

  let segment: ItinerarySegment;
  if (edge.kind === 'ride') {
    const line = network.lines.get(edge.lineId);
    segment = {
      ...base,
      kind: 'ride',
      lineId: edge.lineId,
      lineName: line?.name ?? edge.lineId,
      lineColor: line?.color ?? null,
    };
  } else {
    segment = { ...base, kind: 'transfer', transferLinkId: edge.transferLinkId };
  }

  segment.instruction = describeSegment(segment);
  return segment;
}

/**
 * Build an itinerary from a contiguous, non-empty edge path
 *
 * The score is accumulated edge by edge in path order, matching the route finder's arithmetic.
 */
export function buildItinerary(
  network: NetworkSnapshot,
  path: readonly Edge[],
  objective: Objective
): Itinerary {
  if (path.length === 0) {
    throw new Error('Cannot build an itinerary from an empty path');
  }

  let score = 0;
  let travelTimeMinutes = 0;
  let distanceKm = 0;
  let transfers = 0;
  let walkingMinutes = 0;
  let baseCost = 0;
  const linesUsed: string[] = [];

  const segments = path.map((edge, index) => {
    if (index > 0 && path[index - 1].toStationId !== edge.fromStationId) {
      throw new Error(`Path is not contiguous at edge ${edge.id}`);
    }

    score += edgeScore(edge, objective.weights);
    travelTimeMinutes += edge.travelTimeMinutes;
    distanceKm += edge.distanceKm;
    baseCost += edge.cost;

    const segment = toSegment(network, edge, index);
    if (segment.kind === 'transfer') {
      transfers += 1;
      walkingMinutes += segment.travelTimeMinutes;
    } else if (!linesUsed.includes(segment.lineName)) {
      linesUsed.push(segment.lineName);
    }
    return segment;
  });

  return {
    id: itineraryId(path),
    origin: path[0].fromStationId,
    destination: path[path.length - 1].toStationId,
    preference: objective.preference,
    segments,
    travelTimeMinutes: roundTo(travelTimeMinutes, 3),
    distanceKm: roundTo(distanceKm, 3),
    transfers,
    walkingMinutes: roundTo(walkingMinutes, 3),
    baseCost: roundTo(baseCost, 2),
    linesUsed,
    score: roundTo(score, 6),
  };
}

export function itineraryId(path: readonly Pick<Edge, 'id'>[]): string {
  return createHash('sha1')
    .update(path.map((edge) => edge.id).join('|'))
    .digest('hex')
    .slice(0, 16);
}

/**
 * Order-independent identity of the edges an itinerary uses
 */
export function edgeSetKey(itinerary: Itinerary): string {
  return [...new Set(itinerary.segments.map((segment) => segment.edgeId))].sort(compareIds).join('|');
}

function pathKey(itinerary: Itinerary): string {
  return itinerary.segments.map((segment) => segment.edgeId).join('|');
}

/**
 * Ranking order: score, then transfers, then distance, then path identity
 */
export function compareItineraries(a: Itinerary, b: Itinerary): number {
  if (a.score !== b.score) {
    return a.score < b.score ? -1 : 1;
  }
  if (a.transfers !== b.transfers) {
    return a.transfers - b.transfers;
  }
  if (a.distanceKm !== b.distanceKm) {
    return a.distanceKm < b.distanceKm ? -1 : 1;
  }
  return compareIds(pathKey(a), pathKey(b));
}

/**
 * Attach clock times to every segment, starting at the given departure
 */
export function scheduleItinerary(itinerary: Itinerary, departure: Date): Itinerary {
  let clock = departure.getTime();

  const segments = itinerary.segments.map((segment) => {
    const departAt = new Date(clock).toISOString();
    clock += segment.travelTimeMinutes * MS_PER_MINUTE;
    return { ...segment, departAt, arriveAt: new Date(clock).toISOString() };
  });

  return {
    ...itinerary,
    segments,
    departAt: departure.toISOString(),
    arriveAt: new Date(clock).toISOString(),
  };
}
