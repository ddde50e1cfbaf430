/**
 * Route Finder
 *
 * Early-exit Dijkstra over a graph view. Labels are compared lexicographically:
 * objective score, then transfer count, then accumulated distance, and the frontier
 * breaks remaining ties on station id. When two paths reach a station with equal
 * labels, the one arriving via the lowest (fromStationId, edgeId) is kept, so the
 * result never depends on edge iteration order.
 *
 * With a transfer or walking limit a single label per station is no longer enough:
 * a cheaper arrival may have used up the transfers a later leg needs. The constrained
 * search keeps every label not dominated on (score, transfers, walking, distance) and
 * rebuilds the path from parent links.
 */

import type { Edge } from '../types/network.js';
import type { Itinerary, Objective } from '../types/itinerary.js';
import { PriorityQueue } from '../utils/priority-queue.js';
import {
  InvalidRequestError,
  NoPathError,
  SearchBudgetExceededError,
  StationNotFoundError,
} from './errors.js';
import type { GraphView } from './graph-view.js';
import { buildItinerary } from './itinerary.js';
import { compareIds, compareLabels, edgeScore, nearlyAtMost, type PathLabel } from './objective.js';

export const DEFAULT_MAX_FRONTIER_POPS = 10_000;

/**
 * Per-request limits on the path, unbounded when omitted
 */
export interface RouteConstraints {
  maxTransfers?: number;
  maxWalkingMinutes?: number;
}

export interface RouteFinderOptions extends RouteConstraints {
  maxFrontierPops?: number;
}

interface Limits {
  maxTransfers: number;
  maxWalkingMinutes: number;
}

interface ConstrainedLabel extends PathLabel {
  stationId: string;
  walkingMinutes: number;
  pathKey: string;
  edge?: Edge;
  parent?: ConstrainedLabel;
}

interface FrontierEntry extends PathLabel {
  stationId: string;
}

function compareEntries(a: FrontierEntry, b: FrontierEntry): number {
  return compareLabels(a, b) || compareIds(a.stationId, b.stationId);
}

function preferArrival(candidate: Edge, current: Edge | undefined): boolean {
  if (!current) {
    return true;
  }
  return (
    (compareIds(candidate.fromStationId, current.fromStationId) ||
      compareIds(candidate.id, current.id)) < 0
  );
}

function tracePath(arrivals: ReadonlyMap<string, Edge>, origin: string, destination: string): Edge[] {
  const path: Edge[] = [];
  let stationId = destination;

  while (stationId !== origin) {
    const edge = arrivals.get(stationId);
    if (!edge) {
      throw new Error(`Broken predecessor chain at station ${stationId}`);
    }
    path.push(edge);
    stationId = edge.fromStationId;
  }

  return path.reverse();
}

function compareConstrained(a: ConstrainedLabel, b: ConstrainedLabel): number {
  return compareLabels(a, b) || compareIds(a.stationId, b.stationId) || compareIds(a.pathKey, b.pathKey);
}

function dominates(a: ConstrainedLabel, b: ConstrainedLabel): boolean {
  return (
    nearlyAtMost(a.score, b.score) &&
    a.transfers <= b.transfers &&
    nearlyAtMost(a.walkingMinutes, b.walkingMinutes) &&
    nearlyAtMost(a.distanceKm, b.distanceKm)
  );
}

function labelPath(label: ConstrainedLabel): Edge[] {
  const path: Edge[] = [];
  let current: ConstrainedLabel | undefined = label;
  while (current && current.edge) {
    path.push(current.edge);
    current = current.parent;
  }
  return path.reverse();
}

function resolveLimits(options: RouteConstraints): Limits | null {
  const { maxTransfers, maxWalkingMinutes } = options;
  if (maxTransfers === undefined && maxWalkingMinutes === undefined) {
    return null;
  }
  if (maxTransfers !== undefined && (!Number.isInteger(maxTransfers) || maxTransfers < 0)) {
    throw new InvalidRequestError('maxTransfers must be a non-negative integer', 'maxTransfers');
  }
  if (maxWalkingMinutes !== undefined && (!Number.isFinite(maxWalkingMinutes) || maxWalkingMinutes < 0)) {
    throw new InvalidRequestError('maxWalkingMinutes must be a non-negative number', 'maxWalkingMinutes');
  }
  return {
    maxTransfers: maxTransfers ?? Infinity,
    maxWalkingMinutes: maxWalkingMinutes ?? Infinity,
  };
}

export function assertStationsExist(view: GraphView, ...stationIds: string[]): void {
  for (const stationId of stationIds) {
    if (!view.network.stations.has(stationId)) {
      throw new StationNotFoundError(stationId);
    }
  }
}

/**
 * Find the best itinerary for one objective weighting
 *
 * @throws StationNotFoundError if either endpoint is unknown
 * @throws NoPathError if the destination is unreachable in this view
 * @throws SearchBudgetExceededError if the frontier-pop bound is hit first
 * @throws InvalidRequestError for a negative or fractional transfer limit, or a negative walking limit
 */
export function findBest(
  view: GraphView,
  origin: string,
  destination: string,
  objective: Objective,
  options: RouteFinderOptions = {}
): Itinerary {
  const maxFrontierPops = options.maxFrontierPops ?? DEFAULT_MAX_FRONTIER_POPS;

  assertStationsExist(view, origin, destination);
  if (origin === destination) {
    throw new InvalidRequestError('Origin and destination must differ', 'destination');
  }

  const limits = resolveLimits(options);
  if (limits) {
    return findBestWithin(view, origin, destination, objective, maxFrontierPops, limits);
  }

  const best = new Map<string, PathLabel>([[origin, { score: 0, transfers: 0, distanceKm: 0 }]]);
  const arrivals = new Map<string, Edge>();
  const settled = new Set<string>();
  const frontier = new PriorityQueue<FrontierEntry>(compareEntries);
  frontier.push({ stationId: origin, score: 0, transfers: 0, distanceKm: 0 });

  let pops = 0;

  while (frontier.size > 0) {
    const entry = frontier.pop();
    if (!entry || settled.has(entry.stationId)) {
      continue;
    }

    pops += 1;
    if (pops > maxFrontierPops) {
      throw new SearchBudgetExceededError(maxFrontierPops);
    }

    settled.add(entry.stationId);
    if (entry.stationId === destination) {
      return buildItinerary(view.network, tracePath(arrivals, origin, destination), objective);
    }

    for (const edge of view.outgoing(entry.stationId)) {
      if (settled.has(edge.toStationId)) {
        continue;
      }

      const next: PathLabel = {
        score: entry.score + edgeScore(edge, objective.weights),
        transfers: entry.transfers + (edge.kind === 'transfer' ? 1 : 0),
        distanceKm: entry.distanceKm + edge.distanceKm,
      };

      const current = best.get(edge.toStationId);
      const order = current ? compareLabels(next, current) : -1;

      if (order < 0) {
        best.set(edge.toStationId, next);
        arrivals.set(edge.toStationId, edge);
        frontier.push({ stationId: edge.toStationId, ...next });
      } else if (order === 0 && preferArrival(edge, arrivals.get(edge.toStationId))) {
        arrivals.set(edge.toStationId, edge);
      }
    }
  }

  throw new NoPathError(origin, destination);
}

function findBestWithin(
  view: GraphView,
  origin: string,
  destination: string,
  objective: Objective,
  maxFrontierPops: number,
  limits: Limits
): Itinerary {
  const expanded = new Map<string, ConstrainedLabel[]>();
  const frontier = new PriorityQueue<ConstrainedLabel>(compareConstrained);
  frontier.push({ stationId: origin, score: 0, transfers: 0, distanceKm: 0, walkingMinutes: 0, pathKey: '' });

  const isDominated = (label: ConstrainedLabel) =>
    (expanded.get(label.stationId) ?? []).some((other) => dominates(other, label));

  let pops = 0;

  while (frontier.size > 0) {
    const label = frontier.pop();
    if (!label || isDominated(label)) {
      continue;
    }

    pops += 1;
    if (pops > maxFrontierPops) {
      throw new SearchBudgetExceededError(maxFrontierPops);
    }

    if (label.stationId === destination) {
      return buildItinerary(view.network, labelPath(label), objective);
    }

    const atStation = expanded.get(label.stationId);
    if (atStation) {
      atStation.push(label);
    } else {
      expanded.set(label.stationId, [label]);
    }

    for (const edge of view.outgoing(label.stationId)) {
      const isTransfer = edge.kind === 'transfer';
      const next: ConstrainedLabel = {
        stationId: edge.toStationId,
        score: label.score + edgeScore(edge, objective.weights),
        transfers: label.transfers + (isTransfer ? 1 : 0),
        distanceKm: label.distanceKm + edge.distanceKm,
        walkingMinutes: label.walkingMinutes + (isTransfer ? edge.travelTimeMinutes : 0),
        pathKey: label.pathKey === '' ? edge.id : `${label.pathKey}|${edge.id}`,
        edge,
        parent: label,
      };

      if (next.transfers > limits.maxTransfers || !nearlyAtMost(next.walkingMinutes, limits.maxWalkingMinutes)) {
        continue;
      }
      if (!isDominated(next)) {
        frontier.push(next);
      }
    }
  }

  throw new NoPathError(origin, destination);
}
