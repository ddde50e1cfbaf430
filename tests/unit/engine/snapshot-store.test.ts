import { describe, it, expect } from 'vitest';
import { IntegrityError, SnapshotUnavailableError } from '../../../src/engine/errors.js';
import { SnapshotStore } from '../../../src/engine/snapshot-store.js';
import { interchangeTopology, line, singleLineTopology, station } from '../../fixtures/networks.js';

describe('SnapshotStore', () => {
  it('has no snapshot before the first rebuild', () => {
    const store = new SnapshotStore();

    expect(store.peek()).toBeNull();
    expect(() => store.acquire()).toThrow(SnapshotUnavailableError);
  });

  it('installs snapshots with increasing versions', () => {
    const store = new SnapshotStore('EUR');

    const first = store.rebuild(singleLineTopology());
    const second = store.rebuild(interchangeTopology());

    expect(first.version).toBe(1);
    expect(second.version).toBe(2);
    expect(store.acquire()).toBe(second);
    expect(second.fares.currency).toBe('EUR');
    expect(Object.isFrozen(second)).toBe(true);
  });

  it('keeps the previous snapshot when a rebuild fails', () => {
    const store = new SnapshotStore();
    const installed = store.rebuild(singleLineTopology());

    const broken = singleLineTopology();
    broken.stations.push(station('Q', 'L1'));
    broken.lines = [line('L1', ['A', 'B', 'C'], [])];

    expect(() => store.rebuild(broken)).toThrow(IntegrityError);
    expect(store.acquire()).toBe(installed);
    expect(store.rebuild(interchangeTopology()).version).toBe(2);
  });

  it('rejects fare data that fails validation', () => {
    const store = new SnapshotStore();
    const topo = singleLineTopology();
    topo.fareRules = [];

    expect(() => store.rebuild(topo)).toThrow('active line L1 has no fare rules');
    expect(store.peek()).toBeNull();
  });

  it('hands out a snapshot unaffected by later rebuilds', () => {
    const store = new SnapshotStore();
    store.rebuild(singleLineTopology());
    const held = store.acquire();

    store.rebuild(interchangeTopology());

    expect(held.network.stations.has('D')).toBe(false);
    expect(store.acquire().network.stations.has('D')).toBe(true);
  });
});
