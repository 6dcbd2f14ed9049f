import { Knex } from 'knex';
import type { DecimalValue, EventRow, TicketTypeRow } from '../../src/types';

const HOUR_MS = 60 * 60 * 1000;

type EventOverrides = Partial<Omit<EventRow, 'id' | 'organizer_id' | 'start_time' | 'end_time'>> & {
  start_time?: Date;
  end_time?: Date;
};

/**
 * Inserts ticketing rows with explicit ids. Ids come from one increasing
 * sequence, so rows created later always have higher ids.
 */
export class TicketingFixtures {
  private sequence = 0;

  constructor(private readonly db: Knex, private readonly now: Date) {}

  async organizer(name?: string): Promise<number> {
    const id = this.nextId();
    await this.db('organizers').insert({ id, name: name ?? `Organizer ${id}` });
    return id;
  }

  async customer(username?: string): Promise<number> {
    const id = this.nextId();
    await this.db('users').insert({ id, username: username ?? `customer${id}` });
    return id;
  }

  async event(organizerId: number, overrides: EventOverrides = {}): Promise<number> {
    const id = this.nextId();
    const { start_time, end_time, ...columns } = overrides;
    const start = start_time ?? new Date(this.now.getTime() + 24 * HOUR_MS);
    const end = end_time ?? new Date(start.getTime() + 2 * HOUR_MS);
    await this.db('events').insert({
      id,
      organizer_id: organizerId,
      name: `Event ${id}`,
      status: 'published',
      capacity: null,
      base_ticket_price: 0,
      ...columns,
      start_time: start.toISOString(),
      end_time: end.toISOString(),
    });
    return id;
  }

  async ticketType(
    eventId: number,
    overrides: Partial<Omit<TicketTypeRow, 'id' | 'event_id'>> = {}
  ): Promise<number> {
    const id = this.nextId();
    await this.db('ticket_types').insert({
      id,
      event_id: eventId,
      name: `Ticket ${id}`,
      price: '10.00',
      quantity_available: 100,
      is_active: true,
      ...overrides,
    });
    return id;
  }

  async order(customerId: number | null, isPaid: boolean): Promise<number> {
    const id = this.nextId();
    await this.db('orders').insert({
      id,
      customer_id: customerId,
      is_paid: isPaid,
      created_at: this.now.toISOString(),
    });
    return id;
  }

  async purchase(orderId: number, ticketTypeId: number, quantity: number, unitPrice: DecimalValue): Promise<number> {
    const id = this.nextId();
    await this.db('ticket_purchases').insert({
      id,
      order_id: orderId,
      ticket_type_id: ticketTypeId,
      quantity,
      unit_price: unitPrice,
    });
    return id;
  }

  /** A single-line order */
  async sale(options: {
    ticketTypeId: number;
    quantity: number;
    unitPrice: DecimalValue;
    paid?: boolean;
    customerId?: number | null;
  }): Promise<number> {
    const orderId = await this.order(options.customerId ?? null, options.paid ?? true);
    await this.purchase(orderId, options.ticketTypeId, options.quantity, options.unitPrice);
    return orderId;
  }

  private nextId(): number {
    this.sequence += 1;
    return this.sequence;
  }
}
