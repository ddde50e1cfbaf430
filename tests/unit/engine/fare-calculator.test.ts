import { describe, it, expect } from 'vitest';
import {
  FareRuleMissingError,
  InvalidPassengerTypeError,
  InvalidRequestError,
} from '../../../src/engine/errors.js';
import { groupDiscountFor, price } from '../../../src/engine/fare-calculator.js';
import { itineraryFromStations } from '../../../src/engine/path-quote.js';
import { SnapshotStore, type EngineSnapshot } from '../../../src/engine/snapshot-store.js';
import type { FareTable, ZoneFare } from '../../../src/types/fare.js';
import type { TopologyData } from '../../../src/types/topology.js';
import {
  GROUP_DISCOUNTS,
  PASSENGER_TYPES,
  flatFareTopology,
  hop,
  interchangeTopology,
  line,
  station,
  zoneLoopTopology,
} from '../../fixtures/networks.js';

function snapshotOf(topo: TopologyData): EngineSnapshot {
  return new SnapshotStore().rebuild(topo);
}

/**
 * Zone-priced line Z1(zone 1) - Z2(zone 2) - Z3(zone 3)
 */
function zonedTopology(): TopologyData {
  return {
    stations: [station('Z1', 'Z'), station('Z2', 'Z', { zone: 2 }), station('Z3', 'Z', { zone: 3 })],
    lines: [line('Z', ['Z1', 'Z2', 'Z3'], [hop(4), hop(4)], { name: 'Zone Line' })],
    transferLinks: [],
    fareRules: [
      {
        lineId: 'Z',
        pricing: 'zone',
        zones: [
          { zone: 1, baseFare: 15, incrementalFare: 5 },
          { zone: 2, baseFare: 15, incrementalFare: 5 },
          { zone: 3, baseFare: 20, incrementalFare: 4 },
        ],
      },
    ],
    passengerTypes: PASSENGER_TYPES,
    groupDiscounts: GROUP_DISCOUNTS,
  };
}

describe('price', () => {
  const snapshot = snapshotOf(interchangeTopology());
  const acrossInterchange = itineraryFromStations(snapshot.network, ['A', 'B', 'B2', 'D']);

  it('prices each ride segment and adds the transfer fee', () => {
    const fare = price(snapshot.fares, acrossInterchange, 'adult', false, 1);

    expect(fare.items).toEqual([
      {
        kind: 'ride',
        segmentIndex: 0,
        lineId: 'L1',
        fromStationId: 'A',
        toStationId: 'B',
        pricing: 'station',
        zone: 1,
        units: 1,
        baseFare: 0,
        incrementalFare: 10,
        amount: 10,
      },
      {
        kind: 'transfer',
        segmentIndex: 1,
        transferLinkId: 'T1',
        fromStationId: 'B',
        toStationId: 'B2',
        amount: 5,
      },
      {
        kind: 'ride',
        segmentIndex: 2,
        lineId: 'L2',
        fromStationId: 'B2',
        toStationId: 'D',
        pricing: 'station',
        zone: 1,
        units: 1,
        baseFare: 0,
        incrementalFare: 10,
        amount: 10,
      },
    ]);
    expect(fare.rideSubtotal).toBe(20);
    expect(fare.transferFees).toBe(5);
    expect(fare.total).toBe(25);
    expect(fare.currency).toBe('THB');
  });

  it('discounts rides but never transfer fees', () => {
    const fare = price(snapshot.fares, acrossInterchange, 'child', false, 1);

    expect(fare.passengerDiscountPercent).toBe(50);
    expect(fare.passengerDiscount).toBe(10);
    expect(fare.total).toBe(15);
  });

  it('prices every ride segment on one line separately', () => {
    const itinerary = itineraryFromStations(snapshot.network, ['A', 'B', 'C']);
    const fare = price(snapshot.fares, itinerary, 'adult', false, 1);

    expect(fare.items).toHaveLength(2);
    expect(fare.items[0]).toMatchObject({ kind: 'ride', segmentIndex: 0, units: 1, amount: 10 });
    expect(fare.items[1]).toMatchObject({ kind: 'ride', segmentIndex: 1, units: 1, amount: 10 });
    expect(fare.total).toBe(20);
  });

  it('charges the base fare on every ride segment', () => {
    const flat = snapshotOf(flatFareTopology());
    const fare = price(flat.fares, itineraryFromStations(flat.network, ['A', 'B', 'C']), 'adult', false, 1);

    expect(fare.items.map((item) => item.amount)).toEqual([10, 10]);
    expect(fare.rideSubtotal).toBe(20);
    expect(fare.total).toBe(20);
  });

  it('prices a ride that leaves a zone and returns to it per segment', () => {
    const loop = snapshotOf(zoneLoopTopology());

    const outAndBack = price(loop.fares, itineraryFromStations(loop.network, ['A', 'B', 'C']), 'adult', false, 1);
    const outOnly = price(loop.fares, itineraryFromStations(loop.network, ['A', 'B']), 'adult', false, 1);

    expect(outAndBack.items).toEqual([
      expect.objectContaining({ zone: 1, units: 1, baseFare: 5, incrementalFare: 10, amount: 15 }),
      expect.objectContaining({ zone: 2, units: 1, baseFare: 5, incrementalFare: 10, amount: 15 }),
    ]);
    expect(outAndBack.rideSubtotal).toBe(30);
    expect(outOnly.rideSubtotal).toBe(15);
    expect(outAndBack.total).toBeGreaterThanOrEqual(outOnly.total);
  });

  it('never charges less for a longer ride on the same line', () => {
    const shorter = price(snapshot.fares, itineraryFromStations(snapshot.network, ['A', 'B']), 'adult', false, 1);
    const longer = price(snapshot.fares, itineraryFromStations(snapshot.network, ['A', 'B', 'C']), 'adult', false, 1);

    expect(longer.total).toBeGreaterThanOrEqual(shorter.total);
  });

  it('prices zone segments by zones crossed from the departure zone rule', () => {
    const zoned = snapshotOf(zonedTopology());

    const outbound = price(zoned.fares, itineraryFromStations(zoned.network, ['Z1', 'Z2', 'Z3']), 'adult', false, 1);
    const inbound = price(zoned.fares, itineraryFromStations(zoned.network, ['Z3', 'Z2', 'Z1']), 'adult', false, 1);
    const oneZone = price(zoned.fares, itineraryFromStations(zoned.network, ['Z1', 'Z2']), 'adult', false, 1);

    expect(outbound.items).toEqual([
      expect.objectContaining({ zone: 1, units: 1, amount: 20 }),
      expect.objectContaining({ zone: 2, units: 1, amount: 20 }),
    ]);
    expect(outbound.total).toBe(40);
    expect(inbound.items).toEqual([
      expect.objectContaining({ zone: 3, units: 1, amount: 24 }),
      expect.objectContaining({ zone: 2, units: 1, amount: 20 }),
    ]);
    expect(inbound.total).toBe(44);
    expect(oneZone.total).toBe(20);
  });

  it('applies the group bracket after the passenger discount', () => {
    const fare = price(snapshot.fares, acrossInterchange, 'child', true, 5);

    expect(fare.groupDiscountPercent).toBe(10);
    expect(fare.groupDiscount).toBe(1.5);
    expect(fare.total).toBe(13.5);
    expect(fare.partyTotal).toBe(67.5);
  });

  it('charges groups below the first bracket the full fare', () => {
    const fare = price(snapshot.fares, acrossInterchange, 'adult', true, 4);

    expect(fare.groupDiscountPercent).toBe(0);
    expect(fare.total).toBe(25);
    expect(fare.partyTotal).toBe(100);
  });

  it('never raises the per-passenger price as the group grows', () => {
    const totals = Array.from({ length: 12 }, (_, i) => price(snapshot.fares, acrossInterchange, 'adult', true, i + 1).total);

    totals.slice(1).forEach((total, i) => {
      expect(total).toBeLessThanOrEqual(totals[i]);
    });
    expect(totals[11]).toBe(20);
  });

  it('ignores the group size for individual fares', () => {
    const fare = price(snapshot.fares, acrossInterchange, 'adult', false, 10);

    expect(fare.groupSize).toBe(1);
    expect(fare.groupDiscountPercent).toBe(0);
    expect(fare.partyTotal).toBe(25);
  });

  it('rejects unknown passenger types', () => {
    expect(() => price(snapshot.fares, acrossInterchange, 'pensioner', false, 1)).toThrow(InvalidPassengerTypeError);
  });

  it('rejects non-positive group sizes', () => {
    expect(() => price(snapshot.fares, acrossInterchange, 'adult', true, 0)).toThrow(InvalidRequestError);
  });

  it('raises FareRuleMissingError when a segment departs an unpriced zone', () => {
    const fares: FareTable = { ...snapshot.fares, rules: new Map<string, ZoneFare>() };

    expect(() => price(fares, acrossInterchange, 'adult', false, 1)).toThrow(FareRuleMissingError);
    expect(() => price(fares, acrossInterchange, 'adult', false, 1)).toThrow('No fare rule for line L1 zone 1');
  });
});

describe('groupDiscountFor', () => {
  it('picks the highest bracket reached', () => {
    expect(groupDiscountFor(GROUP_DISCOUNTS, 1)).toBe(0);
    expect(groupDiscountFor(GROUP_DISCOUNTS, 5)).toBe(10);
    expect(groupDiscountFor(GROUP_DISCOUNTS, 9)).toBe(10);
    expect(groupDiscountFor(GROUP_DISCOUNTS, 25)).toBe(20);
  });

  it('returns 0 without brackets', () => {
    expect(groupDiscountFor([], 40)).toBe(0);
  });
});
