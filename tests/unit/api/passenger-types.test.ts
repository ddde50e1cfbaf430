/**
 * GET /passenger-types
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { createTestContext, type TestContext } from '../../fixtures/test-app.js';
import { GROUP_DISCOUNTS, PASSENGER_TYPES, singleLineTopology } from '../../fixtures/networks.js';

describe('GET /passenger-types', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('lists passenger types and group brackets of the loaded snapshot', async () => {
    await ctx.networkService.reload('test');

    const response = await request(ctx.app).get('/passenger-types').expect(200);

    expect(response.body.currency).toBe('THB');
    expect(response.body.passengerTypes).toEqual(PASSENGER_TYPES);
    expect(response.body.groupDiscounts).toEqual(GROUP_DISCOUNTS);
  });

  it('lists categories in their fixed order whatever order the data has', async () => {
    ctx.provider.load.mockResolvedValueOnce({
      ...singleLineTopology(),
      passengerTypes: [...PASSENGER_TYPES].reverse(),
    });
    await ctx.networkService.reload('test');

    const response = await request(ctx.app).get('/passenger-types').expect(200);

    expect(response.body.passengerTypes.map((type: { category: string }) => type.category)).toEqual([
      'adult',
      'child',
      'senior',
      'student',
    ]);
  });

  it('returns 503 before the network is loaded', async () => {
    const response = await request(ctx.app).get('/passenger-types').expect(503);

    expect(response.body).toMatchObject({ error: 'SNAPSHOT_UNAVAILABLE', retryable: true });
  });
});
