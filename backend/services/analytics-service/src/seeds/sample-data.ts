import { Knex } from 'knex';
import { createLogger } from '../utils/logger';
import type { EventRow, OrderRow, TicketPurchaseRow, TicketTypeRow } from '../types/ticketing.types';

const log = createLogger('sample-data');

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const CAPACITY_CHOICES: Array<number | null> = [null, 100, 200];

export interface SampleDataOptions {
  organizers?: number;
  customers?: number;
  events?: number;
  ticketTypesPerEvent?: number;
  orders?: number;
  /** Uniform [0, 1) source; defaults to Math.random */
  random?: () => number;
  now?: Date;
}

export interface SampleDataSummary {
  organizers: number;
  customers: number;
  events: number;
  ticketTypes: number;
  orders: number;
  ticketPurchases: number;
}

type NewRow<T extends { id: number }> = Omit<T, 'id'>;

/**
 * Replace the contents of the ticketing tables with generated sample data:
 * published upcoming events (capacity unset, 100 or 200), priced ticket types,
 * and a mix of paid/unpaid and anonymous/customer orders.
 */
export async function seedSampleData(db: Knex, options: SampleDataOptions = {}): Promise<SampleDataSummary> {
  const random = options.random ?? Math.random;
  const now = options.now ?? new Date();
  const counts = {
    organizers: options.organizers ?? 3,
    customers: options.customers ?? 10,
    events: options.events ?? 5,
    ticketTypesPerEvent: options.ticketTypesPerEvent ?? 2,
    orders: options.orders ?? 30,
  };

  const randomInt = (min: number, max: number): number => min + Math.floor(random() * (max - min + 1));
  const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];

  const summary = await db.transaction(async (trx) => {
    for (const table of ['ticket_purchases', 'orders', 'ticket_types', 'events', 'users', 'organizers']) {
      await trx(table).del();
    }

    await insertRows(trx, 'organizers', range(counts.organizers).map((i) => ({
      name: `Organizer ${i}`,
      contact_email: `organizer${i}@example.com`,
      description: '',
    })));
    const organizerIds = await insertedIds(trx, 'organizers');

    await insertRows(trx, 'users', range(counts.customers).map((i) => ({
      username: `user${i}`,
      email: `user${i}@example.com`,
    })));
    const customerIds = await insertedIds(trx, 'users');

    const events: Array<NewRow<EventRow>> = organizerIds.length === 0 ? [] : range(counts.events).map((i) => {
      const start = new Date(now.getTime() + randomInt(1, 30) * DAY_MS);
      return {
        name: `Event ${i}`,
        organizer_id: pick(organizerIds),
        status: 'published' as const,
        start_time: start.toISOString(),
        end_time: new Date(start.getTime() + 2 * HOUR_MS).toISOString(),
        location: `Location ${i}`,
        capacity: pick(CAPACITY_CHOICES),
        base_ticket_price: randomInt(10, 100),
      };
    });
    await insertRows(trx, 'events', events);
    const eventIds = await insertedIds(trx, 'events');

    const ticketTypes: Array<NewRow<TicketTypeRow>> = eventIds.flatMap((eventId) =>
      range(counts.ticketTypesPerEvent).map((j) => ({
        event_id: eventId,
        name: `Type ${j}`,
        price: randomInt(10, 100),
        quantity_available: randomInt(10, 200),
        is_active: true,
      }))
    );
    await insertRows(trx, 'ticket_types', ticketTypes);
    const ticketTypeIds = await insertedIds(trx, 'ticket_types');
    const priceById = new Map(ticketTypeIds.map((id, index) => [id, Number(ticketTypes[index].price)]));

    const customerChoices: Array<number | null> = [null, ...customerIds];
    const baskets = ticketTypeIds.length === 0 ? [] : range(counts.orders).map(() =>
      range(randomInt(1, 3)).map(() => {
        const ticketTypeId = pick(ticketTypeIds);
        return { ticketTypeId, quantity: randomInt(1, 5), price: priceById.get(ticketTypeId) ?? 0 };
      })
    );

    const orders: Array<NewRow<OrderRow>> = baskets.map((lines) => ({
      customer_id: pick(customerChoices),
      created_at: now.toISOString(),
      total_amount: lines.reduce((sum, line) => sum + line.quantity * line.price, 0),
      is_paid: random() < 0.5,
      discount_code: null,
    }));
    await insertRows(trx, 'orders', orders);
    const orderIds = await insertedIds(trx, 'orders');

    const purchases: Array<NewRow<TicketPurchaseRow>> = baskets.flatMap((lines, index) =>
      lines.map((line) => ({
        order_id: orderIds[index],
        ticket_type_id: line.ticketTypeId,
        quantity: line.quantity,
        unit_price: line.price,
      }))
    );
    await insertRows(trx, 'ticket_purchases', purchases);

    return {
      organizers: organizerIds.length,
      customers: customerIds.length,
      events: eventIds.length,
      ticketTypes: ticketTypeIds.length,
      orders: orderIds.length,
      ticketPurchases: purchases.length,
    };
  });

  log.info('Sample data generated', summary);
  return summary;
}

/** knex seed entry point */
export async function seed(knex: Knex): Promise<void> {
  await seedSampleData(knex);
}

function range(count: number): number[] {
  return Array.from({ length: count }, (_, i) => i);
}

async function insertRows(db: Knex, table: string, rows: object[]): Promise<void> {
  if (rows.length > 0) {
    await db(table).insert(rows);
  }
}

// Tables are emptied first, so ids in ascending order match insertion order
async function insertedIds(db: Knex, table: string): Promise<number[]> {
  const rows: Array<{ id: number }> = await db(table).select('id').orderBy('id', 'asc');
  return rows.map((row) => row.id);
}
