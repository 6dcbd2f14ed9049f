/**
 * Low Capacity Events Integration Tests
 */

import { Knex } from 'knex';
import { EventAnalyticsService } from '../../src/services/event-analytics.service';
import { ValidationError } from '../../src/errors';
import { createTestDb } from '../helpers/test-db';
import { TicketingFixtures } from '../helpers/fixtures';

describe('EventAnalyticsService.getEventsWithLowCapacityRemaining', () => {
  const now = new Date('2026-06-01T12:00:00.000Z');
  let db: Knex;
  let service: EventAnalyticsService;
  let fixtures: TicketingFixtures;
  let organizerId: number;
  let ids: Record<
    'soldOut' | 'noCapacity' | 'halfFull' | 'zeroCapacity' | 'oversold' | 'boundary' | 'thirds' | 'unpaidHeavy',
    number
  >;

  beforeEach(async () => {
    db = await createTestDb();
    fixtures = new TicketingFixtures(db, now);
    service = new EventAnalyticsService(db, { clock: () => now });
    organizerId = await fixtures.organizer();

    async function eventWithSales(name: string, capacity: number | null, paid: number, unpaid = 0): Promise<number> {
      const eventId = await fixtures.event(organizerId, { name, capacity });
      const ticketTypeId = await fixtures.ticketType(eventId);
      if (paid > 0) {
        await fixtures.sale({ ticketTypeId, quantity: paid, unitPrice: '10.00' });
      }
      if (unpaid > 0) {
        await fixtures.sale({ ticketTypeId, quantity: unpaid, unitPrice: '10.00', paid: false });
      }
      return eventId;
    }

    ids = {
      soldOut: await eventWithSales('Nearly Sold Out', 100, 95),
      noCapacity: await eventWithSales('Open Air', null, 3),
      halfFull: await eventWithSales('Half Full', 100, 50),
      zeroCapacity: await eventWithSales('Zero Capacity', 0, 0),
      oversold: await eventWithSales('Oversold', 10, 12),
      boundary: await eventWithSales('Boundary', 200, 180),
      thirds: await eventWithSales('Thirds', 3, 2),
      unpaidHeavy: await eventWithSales('Unpaid Heavy', 10, 8, 2),
    };
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('should list events at or below the default 10% threshold', async () => {
    const events = await service.getEventsWithLowCapacityRemaining();

    expect(events).toEqual([
      { id: ids.soldOut, name: 'Nearly Sold Out', capacity: 100, ticketsSold: 95, percentageTicketsRemaining: 5 },
      { id: ids.oversold, name: 'Oversold', capacity: 10, ticketsSold: 12, percentageTicketsRemaining: 0 },
      { id: ids.boundary, name: 'Boundary', capacity: 200, ticketsSold: 180, percentageTicketsRemaining: 10 },
    ]);
  });

  it('should exclude events without a capacity or with zero capacity at any threshold', async () => {
    const events = await service.getEventsWithLowCapacityRemaining(100);

    expect(events.map((event) => event.id)).toEqual([
      ids.soldOut,
      ids.halfFull,
      ids.oversold,
      ids.boundary,
      ids.thirds,
      ids.unpaidHeavy,
    ]);
  });

  it('should round reported percentages up to hundredths', async () => {
    const events = await service.getEventsWithLowCapacityRemaining(100);

    expect(events.find((event) => event.id === ids.thirds)?.percentageTicketsRemaining).toBe(33.34);
    expect(events.find((event) => event.id === ids.unpaidHeavy)).toEqual({
      id: ids.unpaidHeavy,
      name: 'Unpaid Heavy',
      capacity: 10,
      ticketsSold: 8,
      percentageTicketsRemaining: 20,
    });
  });

  it('should never report a percentage above the threshold it was listed under', async () => {
    const eventId = await fixtures.event(organizerId, { name: 'Stadium', capacity: 200000 });
    const ticketTypeId = await fixtures.ticketType(eventId);
    await fixtures.sale({ ticketTypeId, quantity: 179991, unitPrice: '10.00' });

    const atTen = await service.getEventsWithLowCapacityRemaining(10);
    const atTenPointZeroOne = await service.getEventsWithLowCapacityRemaining(10.01);

    expect(atTen.map((event) => event.id)).not.toContain(eventId);
    expect(atTenPointZeroOne.find((event) => event.id === eventId)).toEqual({
      id: eventId,
      name: 'Stadium',
      capacity: 200000,
      ticketsSold: 179991,
      percentageTicketsRemaining: 10.01,
    });
    for (const threshold of [10, 10.01, 33.33, 33.34]) {
      const events = await service.getEventsWithLowCapacityRemaining(threshold);
      for (const event of events) {
        expect(event.percentageTicketsRemaining).toBeLessThanOrEqual(threshold);
      }
    }
  });

  it('should compare the exact remaining share against the threshold', async () => {
    const below = await service.getEventsWithLowCapacityRemaining(33.33);
    const above = await service.getEventsWithLowCapacityRemaining(33.34);

    expect(below.map((event) => event.id)).not.toContain(ids.thirds);
    expect(above.map((event) => event.id)).toContain(ids.thirds);
  });

  it('should only include sold-out events at a zero threshold', async () => {
    const events = await service.getEventsWithLowCapacityRemaining(0);

    expect(events.map((event) => event.id)).toEqual([ids.oversold]);
  });

  it('should take its default threshold from options', async () => {
    const wider = new EventAnalyticsService(db, { defaults: { lowCapacityThreshold: 20 } });

    const events = await wider.getEventsWithLowCapacityRemaining();

    expect(events.map((event) => event.id)).toEqual([ids.soldOut, ids.oversold, ids.boundary, ids.unpaidHeavy]);
  });

  it.each([-1, 100.5, Number.NaN, Number.POSITIVE_INFINITY])(
    'should reject threshold %p',
    async (threshold) => {
      await expect(service.getEventsWithLowCapacityRemaining(threshold)).rejects.toBeInstanceOf(ValidationError);
    }
  );
});
