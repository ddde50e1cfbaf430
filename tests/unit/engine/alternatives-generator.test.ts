import { describe, it, expect } from 'vitest';
import { findAlternatives } from '../../../src/engine/alternatives-generator.js';
import { InvalidRequestError, NoPathError } from '../../../src/engine/errors.js';
import { createGraphView } from '../../../src/engine/graph-view.js';
import { edgeSetKey } from '../../../src/engine/itinerary.js';
import { buildNetwork } from '../../../src/engine/network-model.js';
import { resolveObjective } from '../../../src/engine/objective.js';
import { findBest } from '../../../src/engine/route-finder.js';
import type { GraphView } from '../../../src/engine/graph-view.js';
import type { TopologyData } from '../../../src/types/topology.js';
import {
  disconnectedTopology,
  meshTopology,
  singleLineTopology,
  twoPathTopology,
} from '../../fixtures/networks.js';

function viewOf(topo: TopologyData): GraphView {
  return createGraphView(buildNetwork(topo.stations, topo.lines, topo.transferLinks));
}

describe('findAlternatives', () => {
  it('returns only the structurally distinct paths that exist', () => {
    const itineraries = findAlternatives(viewOf(twoPathTopology()), 'A', 'C', resolveObjective('fastest'), 5);

    expect(itineraries).toHaveLength(2);
    expect(itineraries.map((itinerary) => itinerary.segments.map((segment) => segment.edgeId))).toEqual([
      ['ride:L1:A>B', 'ride:L1:B>C'],
      ['transfer:TAX:A>X', 'ride:L2:X>Y', 'ride:L2:Y>Z', 'transfer:TCZ:Z>C'],
    ]);
  });

  it('starts with the single best itinerary', () => {
    const view = viewOf(meshTopology());
    const objective = resolveObjective('cheapest');

    const [first] = findAlternatives(view, 'R1', 'G2', objective, 3);
    expect(first).toEqual(findBest(view, 'R1', 'G2', objective));
  });

  it('never returns two itineraries with the same edge set', () => {
    const view = viewOf(meshTopology());
    const itineraries = findAlternatives(view, 'R1', 'G2', resolveObjective('fastest'), 5);
    const keys = itineraries.map(edgeSetKey);

    expect(itineraries.length).toBeGreaterThan(1);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('returns one itinerary when the network offers no other', () => {
    const itineraries = findAlternatives(viewOf(singleLineTopology()), 'A', 'C', resolveObjective('fastest'), 3);
    expect(itineraries).toHaveLength(1);
  });

  it('respects maxResults', () => {
    const itineraries = findAlternatives(viewOf(twoPathTopology()), 'A', 'C', resolveObjective('fastest'), 1);
    expect(itineraries).toHaveLength(1);
  });

  it.each([0, 6, 2.5])('rejects maxResults %s', (maxResults) => {
    expect(() =>
      findAlternatives(viewOf(twoPathTopology()), 'A', 'C', resolveObjective('fastest'), maxResults)
    ).toThrow(InvalidRequestError);
  });

  it('propagates NoPathError when nothing connects the stations', () => {
    expect(() =>
      findAlternatives(viewOf(disconnectedTopology()), 'A', 'Y', resolveObjective('fastest'), 3)
    ).toThrow(NoPathError);
  });
});
