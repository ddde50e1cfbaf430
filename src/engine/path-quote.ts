/**
 * Itineraries from explicit station sequences, for standalone fare quotes
 */

import type { Edge, NetworkSnapshot } from '../types/network.js';
import type { Itinerary, Objective } from '../types/itinerary.js';
import { InvalidRequestError, StationNotFoundError } from './errors.js';
import { buildItinerary } from './itinerary.js';
import { resolveObjective } from './objective.js';

function connectingEdge(network: NetworkSnapshot, from: string, to: string): Edge | undefined {
  // Adjacency lists are sorted by id, so the first match of a kind is the lowest id
  const edges = (network.adjacency.get(from) ?? []).filter((edge) => edge.toStationId === to);
  return edges.find((edge) => edge.kind === 'ride') ?? edges[0];
}

export function itineraryFromStations(
  network: NetworkSnapshot,
  stationIds: readonly string[],
  objective: Objective = resolveObjective('fastest')
): Itinerary {
  if (stationIds.length < 2) {
    throw new InvalidRequestError('A quote needs at least two stations', 'stationIds');
  }

  for (const stationId of stationIds) {
    if (!network.stations.has(stationId)) {
      throw new StationNotFoundError(stationId);
    }
  }

  const path: Edge[] = [];
  for (let i = 0; i < stationIds.length - 1; i++) {
    const edge = connectingEdge(network, stationIds[i], stationIds[i + 1]);
    if (!edge) {
      throw new InvalidRequestError(
        `Stations ${stationIds[i]} and ${stationIds[i + 1]} are not directly connected`,
        'stationIds'
      );
    }
    path.push(edge);
  }

  return buildItinerary(network, path, objective);
}
