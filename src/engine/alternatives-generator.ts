/**
 * Alternatives Generator
 *
 * Bounded Yen-style search: every accepted itinerary is expanded once by re-running
 * the route finder with each of its edges excluded in turn (single-edge exclusions only,
 * never combinations). The best remaining candidate whose edge set differs from every
 * accepted itinerary is accepted next.
 */

import type { Itinerary, Objective } from '../types/itinerary.js';
import { InvalidRequestError, NoPathError } from './errors.js';
import type { GraphView } from './graph-view.js';
import { compareItineraries, edgeSetKey } from './itinerary.js';
import { findBest, type RouteFinderOptions } from './route-finder.js';

export const MIN_ALTERNATIVES = 1;
export const MAX_ALTERNATIVES = 5;
export const DEFAULT_ALTERNATIVES = 3;

function findBestOrNull(
  view: GraphView,
  origin: string,
  destination: string,
  objective: Objective,
  options: RouteFinderOptions
): Itinerary | null {
  try {
    return findBest(view, origin, destination, objective, options);
  } catch (error) {
    // An exclusion that disconnects the pair simply yields no candidate
    if (error instanceof NoPathError) {
      return null;
    }
    throw error;
  }
}

export function findAlternatives(
  view: GraphView,
  origin: string,
  destination: string,
  objective: Objective,
  maxResults: number,
  options: RouteFinderOptions = {}
): Itinerary[] {
  if (!Number.isInteger(maxResults) || maxResults < MIN_ALTERNATIVES || maxResults > MAX_ALTERNATIVES) {
    throw new InvalidRequestError(
      `alternatives must be an integer between ${MIN_ALTERNATIVES} and ${MAX_ALTERNATIVES}`,
      'alternatives'
    );
  }

  const primary = findBest(view, origin, destination, objective, options);
  const accepted: Itinerary[] = [primary];
  const acceptedKeys = new Set([edgeSetKey(primary)]);
  const candidates = new Map<string, Itinerary>();
  let expanded = 0;

  while (accepted.length < maxResults) {
    for (; expanded < accepted.length; expanded++) {
      const edgeIds = new Set(accepted[expanded].segments.map((segment) => segment.edgeId));

      for (const edgeId of edgeIds) {
        const candidate = findBestOrNull(view.without([edgeId]), origin, destination, objective, options);
        if (!candidate) {
          continue;
        }

        const key = edgeSetKey(candidate);
        if (!acceptedKeys.has(key) && !candidates.has(key)) {
          candidates.set(key, candidate);
        }
      }
    }

    let bestKey: string | undefined;
    let bestCandidate: Itinerary | undefined;
    for (const [key, candidate] of candidates) {
      if (!bestCandidate || compareItineraries(candidate, bestCandidate) < 0) {
        bestKey = key;
        bestCandidate = candidate;
      }
    }

    if (bestKey === undefined || !bestCandidate) {
      break;
    }

    candidates.delete(bestKey);
    acceptedKeys.add(bestKey);
    accepted.push(bestCandidate);
  }

  return accepted;
}
