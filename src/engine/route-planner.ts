/**
 * Route Planner
 *
 * Orchestrates one planning call against a single acquired snapshot:
 * validate → resolve objective → alternatives → price per passenger type → rank.
 * An empty result is always a NoPathError, never an empty list.
 */

import type {
  FareQuote,
  Itinerary,
  PlanRequest,
  PricedItinerary,
  QuoteRequest,
} from '../types/itinerary.js';
import type { FareBreakdown } from '../types/fare.js';
import type { Logger } from '../utils/logger.js';
import type { EngineMetrics } from '../utils/metrics.js';
import { DEFAULT_ALTERNATIVES, findAlternatives } from './alternatives-generator.js';
import {
  FareRuleMissingError,
  InvalidPassengerTypeError,
  InvalidRequestError,
  NoPathError,
  RouteEngineError,
  StationNotFoundError,
} from './errors.js';
import { price } from './fare-calculator.js';
import { createGraphView } from './graph-view.js';
import { compareItineraries, scheduleItinerary } from './itinerary.js';
import { resolveObjective } from './objective.js';
import { itineraryFromStations } from './path-quote.js';
import type { EngineSnapshot, SnapshotSource } from './snapshot-store.js';

export interface RoutePlannerDeps {
  store: SnapshotSource;
  logger: Logger;
  metrics?: EngineMetrics;
  maxFrontierPops?: number;
  defaultAlternatives?: number;
}

function uniquePassengerTypes(passengerTypes: readonly string[]): string[] {
  if (passengerTypes.length === 0) {
    throw new InvalidRequestError('At least one passenger type is required', 'passengerTypes');
  }
  return [...new Set(passengerTypes)];
}

function validateGroup(group: { size: number } | undefined): void {
  if (group && (!Number.isInteger(group.size) || group.size < 1)) {
    throw new InvalidRequestError('groupSize must be a positive integer', 'groupSize');
  }
}

function ridesAny(itinerary: Itinerary, lineIds: ReadonlySet<string>): boolean {
  return itinerary.segments.some((segment) => segment.kind === 'ride' && lineIds.has(segment.lineId));
}

/**
 * Objective order, with itineraries on a preferred line moved ahead of the rest
 */
function preferringLines(itineraries: readonly Itinerary[], preferLineIds: readonly string[] | undefined): Itinerary[] {
  const ordered = [...itineraries].sort(compareItineraries);
  if (!preferLineIds || preferLineIds.length === 0) {
    return ordered;
  }
  const preferred = new Set(preferLineIds);
  return [
    ...ordered.filter((itinerary) => ridesAny(itinerary, preferred)),
    ...ordered.filter((itinerary) => !ridesAny(itinerary, preferred)),
  ];
}

export class RoutePlanner {
  private readonly store: SnapshotSource;
  private readonly logger: Logger;
  private readonly metrics?: EngineMetrics;
  private readonly maxFrontierPops?: number;
  private readonly defaultAlternatives: number;

  constructor(deps: RoutePlannerDeps) {
    if (!deps.store) {
      throw new Error('store is required');
    }
    if (!deps.logger) {
      throw new Error('logger is required');
    }
    this.store = deps.store;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.maxFrontierPops = deps.maxFrontierPops;
    this.defaultAlternatives = deps.defaultAlternatives ?? DEFAULT_ALTERNATIVES;
  }

  /**
   * Plan and price ranked itineraries
   */
  plan(request: PlanRequest, correlationId?: string): PricedItinerary[] {
    const started = performance.now();

    try {
      const snapshot = this.store.acquire();
      const result = this.planOn(snapshot, request);

      this.metrics?.recordPlan(request.preference, 'success', (performance.now() - started) / 1000);
      this.logger.info('Route plan completed', {
        origin: request.origin,
        destination: request.destination,
        preference: request.preference,
        itineraryCount: result.length,
        snapshotVersion: snapshot.version,
        correlation_id: correlationId,
      });

      return result;
    } catch (error) {
      const outcome = error instanceof RouteEngineError ? error.code : 'INTERNAL_ERROR';
      this.metrics?.recordPlan(request.preference, outcome, (performance.now() - started) / 1000);
      this.logFailure('Route plan failed', error, {
        origin: request.origin,
        destination: request.destination,
        preference: request.preference,
        correlation_id: correlationId,
      });
      throw error;
    }
  }

  /**
   * Price an explicit station sequence without searching
   */
  quote(request: QuoteRequest, correlationId?: string): FareQuote {
    try {
      const snapshot = this.store.acquire();
      const passengerTypes = uniquePassengerTypes(request.passengerTypes);
      validateGroup(request.group);

      const itinerary = itineraryFromStations(snapshot.network, request.stationIds);
      return { itinerary, fares: this.priceAll(snapshot, itinerary, passengerTypes, request.group) };
    } catch (error) {
      this.logFailure('Fare quote failed', error, {
        stationIds: request.stationIds,
        correlation_id: correlationId,
      });
      throw error;
    }
  }

  private planOn(snapshot: EngineSnapshot, request: PlanRequest): PricedItinerary[] {
    const { network, fares } = snapshot;

    if (request.origin === request.destination) {
      throw new InvalidRequestError('Origin and destination must differ', 'destination');
    }
    for (const stationId of [request.origin, request.destination]) {
      if (!network.stations.has(stationId)) {
        throw new StationNotFoundError(stationId);
      }
    }

    const passengerTypes = uniquePassengerTypes(request.passengerTypes);
    for (const passengerType of passengerTypes) {
      if (!fares.passengerTypes.has(passengerType)) {
        throw new InvalidPassengerTypeError(passengerType);
      }
    }
    validateGroup(request.group);

    const objective = resolveObjective(request.preference);
    const view = createGraphView(network, {
      overlay: request.overlay,
      avoidLineIds: request.avoidLineIds,
    });

    const itineraries = findAlternatives(
      view,
      request.origin,
      request.destination,
      objective,
      request.alternatives ?? this.defaultAlternatives,
      {
        maxFrontierPops: this.maxFrontierPops,
        maxTransfers: request.maxTransfers,
        maxWalkingMinutes: request.maxWalkingMinutes,
      }
    );
    if (itineraries.length === 0) {
      throw new NoPathError(request.origin, request.destination);
    }

    return preferringLines(itineraries, request.preferLineIds).map((itinerary, i) => ({
      rank: i + 1,
      itinerary: request.departureTime ? scheduleItinerary(itinerary, request.departureTime) : itinerary,
      fares: this.priceAll(snapshot, itinerary, passengerTypes, request.group),
    }));
  }

  private priceAll(
    snapshot: EngineSnapshot,
    itinerary: Itinerary,
    passengerTypes: readonly string[],
    group: { size: number } | undefined
  ): FareBreakdown[] {
    return passengerTypes.map((passengerType) =>
      price(snapshot.fares, itinerary, passengerType, group !== undefined, group?.size ?? 1)
    );
  }

  private logFailure(message: string, error: unknown, meta: Record<string, unknown>): void {
    if (error instanceof FareRuleMissingError) {
      // Data gap in the fare tables: needs operator attention
      this.logger.error(message, { ...meta, code: error.code, lineId: error.lineId, zone: error.zone });
    } else if (error instanceof RouteEngineError) {
      this.logger.warn(message, { ...meta, code: error.code, error: error.message });
    } else {
      this.logger.error(message, {
        ...meta,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
  }
}

export function createRoutePlanner(deps: RoutePlannerDeps): RoutePlanner {
  return new RoutePlanner(deps);
}
