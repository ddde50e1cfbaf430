import { describe, it, expect } from 'vitest';
import { InvalidRequestError, StationNotFoundError } from '../../../src/engine/errors.js';
import { buildNetwork } from '../../../src/engine/network-model.js';
import { itineraryFromStations } from '../../../src/engine/path-quote.js';
import type { NetworkSnapshot } from '../../../src/types/network.js';
import { interchangeTopology } from '../../fixtures/networks.js';

function network(): NetworkSnapshot {
  const topo = interchangeTopology();
  return buildNetwork(topo.stations, topo.lines, topo.transferLinks);
}

describe('itineraryFromStations', () => {
  it('follows the listed stations through rides and transfers', () => {
    const itinerary = itineraryFromStations(network(), ['A', 'B', 'B2', 'D']);

    expect(itinerary.segments.map((segment) => segment.edgeId)).toEqual([
      'ride:L1:A>B',
      'transfer:T1:B>B2',
      'ride:L2:B2>D',
    ]);
    expect(itinerary.preference).toBe('fastest');
  });

  it('requires at least two stations', () => {
    expect(() => itineraryFromStations(network(), ['A'])).toThrow(InvalidRequestError);
  });

  it('rejects unknown stations', () => {
    expect(() => itineraryFromStations(network(), ['A', 'NOPE'])).toThrow(StationNotFoundError);
  });

  it('rejects stations that are not adjacent', () => {
    expect(() => itineraryFromStations(network(), ['A', 'C'])).toThrow(
      'Stations A and C are not directly connected'
    );
  });
});
