/**
 * Objective weighting per route preference
 *
 * score(edge) = time·travelTimeMinutes + cost·monetaryCost + transfer·(edge is a transfer ? 1 : 0)
 */

import type { Edge } from '../types/network.js';
import type { Objective, ObjectiveWeights, RoutePreference } from '../types/itinerary.js';

// Keeps equal-time routes from zig-zagging through needless transfers
export const FASTEST_TRANSFER_PENALTY = 0.1;

// Dominates any time or cost contribution on the networks the engine serves
export const FEWEST_TRANSFERS_PENALTY = 1000;

const WEIGHTS: Record<RoutePreference, ObjectiveWeights> = {
  fastest: { time: 1, cost: 0, transfer: FASTEST_TRANSFER_PENALTY },
  cheapest: { time: 0, cost: 1, transfer: 0 },
  'fewest-transfers': { time: 0, cost: 0, transfer: FEWEST_TRANSFERS_PENALTY },
};

export function resolveObjective(preference: RoutePreference): Objective {
  return { preference, weights: { ...WEIGHTS[preference] } };
}

export function edgeScore(edge: Edge, weights: ObjectiveWeights): number {
  return (
    weights.time * edge.travelTimeMinutes +
    weights.cost * edge.cost +
    (edge.kind === 'transfer' ? weights.transfer : 0)
  );
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Sums of fractional minutes drift in floating point; closer than this counts as equal
export const SCORE_EPSILON = 1e-9;

export function nearlyEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= SCORE_EPSILON;
}

export function nearlyAtMost(a: number, b: number): boolean {
  return a <= b + SCORE_EPSILON;
}

/**
 * Accumulated search label, compared score first, then transfers, then distance
 */
export interface PathLabel {
  score: number;
  transfers: number;
  distanceKm: number;
}

export function compareLabels(a: PathLabel, b: PathLabel): number {
  if (!nearlyEqual(a.score, b.score)) {
    return a.score < b.score ? -1 : 1;
  }
  if (a.transfers !== b.transfers) {
    return a.transfers - b.transfers;
  }
  if (!nearlyEqual(a.distanceKm, b.distanceKm)) {
    return a.distanceKm < b.distanceKm ? -1 : 1;
  }
  return 0;
}
