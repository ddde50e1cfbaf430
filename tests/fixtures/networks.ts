/**
 * Hand-built networks shared by the engine, service and API tests
 */

import type { FareRuleSet, GroupDiscountBracket, PassengerType } from '../../src/types/fare.js';
import type { Line, LineHop, Station, TransferLink } from '../../src/types/network.js';
import type { TopologyData } from '../../src/types/topology.js';

export function station(id: string, lineId: string, overrides: Partial<Station> = {}): Station {
  return {
    id,
    name: id,
    lat: 13.75,
    lon: 100.5,
    zone: 1,
    isInterchange: false,
    lineId,
    ...overrides,
  };
}

export function hop(travelTimeMinutes: number, baseCost = 10, distanceKm = 1): LineHop {
  return { travelTimeMinutes, distanceKm, baseCost };
}

export function line(id: string, stationIds: string[], hops: LineHop[], overrides: Partial<Line> = {}): Line {
  return {
    id,
    companyId: 'metro-co',
    name: id,
    color: null,
    status: 'active',
    stationIds,
    hops,
    ...overrides,
  };
}

export function link(
  id: string,
  stationAId: string,
  stationBId: string,
  walkingTimeMinutes: number,
  transferFee = 0,
  overrides: Partial<TransferLink> = {}
): TransferLink {
  return {
    id,
    stationAId,
    stationBId,
    walkingTimeMinutes,
    walkingDistanceMeters: 100,
    transferFee,
    isActive: true,
    ...overrides,
  };
}

/**
 * Station pricing, 0 base and 10 per station travelled, for every zone given
 */
export function stationPricing(lineId: string, zones: number[] = [1]): FareRuleSet {
  return {
    lineId,
    pricing: 'station',
    zones: zones.map((zone) => ({ zone, baseFare: 0, incrementalFare: 10 })),
  };
}

/**
 * Station pricing that charges only a base fare per station travelled
 */
export function flatPricing(lineId: string, baseFare: number, zones: number[] = [1]): FareRuleSet {
  return {
    lineId,
    pricing: 'station',
    zones: zones.map((zone) => ({ zone, baseFare, incrementalFare: 0 })),
  };
}

export const PASSENGER_TYPES: PassengerType[] = [
  { category: 'adult', discountPercent: 0 },
  { category: 'child', discountPercent: 50, ageMin: 4, ageMax: 14 },
  { category: 'senior', discountPercent: 50, ageMin: 60 },
  { category: 'student', discountPercent: 20 },
];

export const GROUP_DISCOUNTS: GroupDiscountBracket[] = [
  { minSize: 5, discountPercent: 10 },
  { minSize: 10, discountPercent: 20 },
];

function topology(stations: Station[], lines: Line[], transferLinks: TransferLink[]): TopologyData {
  return {
    stations,
    lines,
    transferLinks,
    fareRules: lines.filter((l) => l.status === 'active').map((l) => stationPricing(l.id)),
    passengerTypes: PASSENGER_TYPES,
    groupDiscounts: GROUP_DISCOUNTS,
  };
}

/**
 * Blue line A-B-C, 5 minutes and 10 per hop
 */
export function singleLineTopology(): TopologyData {
  return topology(
    [
      station('A', 'L1', { name: 'Alpha' }),
      station('B', 'L1', { name: 'Bravo', isInterchange: true }),
      station('C', 'L1', { name: 'Charlie' }),
    ],
    [line('L1', ['A', 'B', 'C'], [hop(5), hop(5)], { name: 'Blue Line', color: '#1f4e9c' })],
    []
  );
}

/**
 * Blue line A-B-C plus green line B2-D, joined by a 3 minute walk at B costing 5
 */
export function interchangeTopology(): TopologyData {
  const base = singleLineTopology();
  return topology(
    [...base.stations, station('B2', 'L2', { name: 'Bravo Interchange', isInterchange: true }), station('D', 'L2', { name: 'Delta' })],
    [...base.lines, line('L2', ['B2', 'D'], [hop(5)], { name: 'Green Line', color: '#2e8b57' })],
    [link('T1', 'B', 'B2', 3, 5, { walkingDistanceMeters: 200 })]
  );
}

/**
 * Blue line A-B-C with a flat 10 per segment
 */
export function flatFareTopology(): TopologyData {
  return { ...singleLineTopology(), fareRules: [flatPricing('L1', 10)] };
}

/**
 * Zone-priced line A(zone 1) - B(zone 2) - C(zone 1): base 5 plus 10 per zone crossed
 */
export function zoneLoopTopology(): TopologyData {
  return {
    ...topology(
      [station('A', 'L1'), station('B', 'L1', { zone: 2 }), station('C', 'L1')],
      [line('L1', ['A', 'B', 'C'], [hop(5), hop(5)], { name: 'Loop Line' })],
      []
    ),
    fareRules: [
      {
        lineId: 'L1',
        pricing: 'zone',
        zones: [
          { zone: 1, baseFare: 5, incrementalFare: 10 },
          { zone: 2, baseFare: 5, incrementalFare: 10 },
        ],
      },
    ],
  };
}

/**
 * Two parallel lines A-B-C and X-Y-Z joined at both ends, so A to C has exactly two simple paths
 */
export function twoPathTopology(): TopologyData {
  return topology(
    [
      station('A', 'L1'),
      station('B', 'L1'),
      station('C', 'L1'),
      station('X', 'L2'),
      station('Y', 'L2'),
      station('Z', 'L2'),
    ],
    [
      line('L1', ['A', 'B', 'C'], [hop(5), hop(5)], { name: 'Blue Line' }),
      line('L2', ['X', 'Y', 'Z'], [hop(5), hop(5)], { name: 'Green Line' }),
    ],
    [link('TAX', 'A', 'X', 2), link('TCZ', 'C', 'Z', 2)]
  );
}

/**
 * Two lines with no transfer between them
 */
export function disconnectedTopology(): TopologyData {
  return topology(
    [station('A', 'L1'), station('B', 'L1'), station('X', 'L2'), station('Y', 'L2')],
    [line('L1', ['A', 'B'], [hop(5)]), line('L2', ['X', 'Y'], [hop(5)])],
    []
  );
}

/**
 * Three lines with uneven weights and five transfers; several competing paths between most pairs
 */
export function meshTopology(): TopologyData {
  return topology(
    [
      station('R1', 'RED'),
      station('R2', 'RED'),
      station('R3', 'RED'),
      station('R4', 'RED'),
      station('G1', 'GREEN'),
      station('G2', 'GREEN'),
      station('G3', 'GREEN'),
      station('Y1', 'YELLOW'),
      station('Y2', 'YELLOW'),
      station('Y3', 'YELLOW'),
      station('Y4', 'YELLOW'),
    ],
    [
      line('RED', ['R1', 'R2', 'R3', 'R4'], [hop(4, 10, 2), hop(6, 10, 3), hop(3, 10, 1.5)]),
      line('GREEN', ['G1', 'G2', 'G3'], [hop(5, 8, 2.5), hop(2, 8, 1)]),
      line('YELLOW', ['Y1', 'Y2', 'Y3', 'Y4'], [hop(3, 12, 1), hop(3, 12, 1), hop(7, 12, 4)]),
    ],
    [
      link('T-R2-G1', 'R2', 'G1', 2),
      link('T-G3-R4', 'G3', 'R4', 1, 3),
      link('T-R3-Y2', 'R3', 'Y2', 2),
      link('T-Y4-G2', 'Y4', 'G2', 4, 2),
      link('T-R1-Y1', 'R1', 'Y1', 3),
    ]
  );
}

/**
 * Two equal-cost branches (via line LB and via line LC) from A1 to D2
 */
export function tiedTopology(): TopologyData {
  return topology(
    [
      station('A1', 'LA'),
      station('A2', 'LA'),
      station('B1', 'LB'),
      station('B2', 'LB'),
      station('C1', 'LC'),
      station('C2', 'LC'),
      station('D1', 'LD'),
      station('D2', 'LD'),
    ],
    [
      line('LA', ['A1', 'A2'], [hop(5)]),
      line('LB', ['B1', 'B2'], [hop(5)]),
      line('LC', ['C1', 'C2'], [hop(5)]),
      line('LD', ['D1', 'D2'], [hop(5)]),
    ],
    [
      link('TAB', 'A2', 'B1', 1),
      link('TAC', 'A2', 'C1', 1),
      link('TBD', 'B2', 'D1', 1),
      link('TCD', 'C2', 'D1', 1),
    ]
  );
}
