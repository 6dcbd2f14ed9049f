import { Knex } from 'knex';
import type { DecimalValue } from '../../types/ticketing.types';

/**
 * Query builders shared by the calculators.
 *
 * Every sales figure is derived from `paidPurchases`: purchases of unpaid
 * orders are never joined, so they cannot leak into any sum. Aggregates come
 * back raw (no COALESCE); callers apply defaults after aggregation.
 */

/** SUM/COUNT results: bigint strings on PostgreSQL, numbers on SQLite */
export type AggregateValue = string | number | null;

export interface EventSalesRow {
  event_id: number;
  unit_price: DecimalValue;
  units_sold: AggregateValue;
}

export interface CustomerEventSalesRow {
  event_id: number;
  event_name: string;
  unit_price: DecimalValue;
  units_sold: AggregateValue;
}

export function paidPurchases(db: Knex): Knex.QueryBuilder {
  return db('ticket_purchases as tp')
    .join('orders as o', 'o.id', 'tp.order_id')
    .where('o.is_paid', true);
}

/** Units sold per ticket type, for use as a joined subquery */
export function paidUnitsByTicketType(db: Knex): Knex.QueryBuilder {
  return paidPurchases(db)
    .groupBy('tp.ticket_type_id')
    .select('tp.ticket_type_id', db.raw('SUM(tp.quantity) AS units_sold'));
}

/** Units sold per event, for use as a joined subquery */
export function paidUnitsByEvent(db: Knex): Knex.QueryBuilder {
  return paidPurchases(db)
    .join('ticket_types as tt', 'tt.id', 'tp.ticket_type_id')
    .groupBy('tt.event_id')
    .select('tt.event_id', db.raw('SUM(tp.quantity) AS units_sold'));
}

/**
 * Units per (event, unit price) for a batch of events. Grouping by price lets
 * revenue be computed exactly in integer cents.
 */
export function eventSalesByPrice(db: Knex, eventIds: number[]): Knex.QueryBuilder {
  return paidPurchases(db)
    .join('ticket_types as tt', 'tt.id', 'tp.ticket_type_id')
    .whereIn('tt.event_id', eventIds)
    .groupBy('tt.event_id', 'tp.unit_price')
    .select('tt.event_id', 'tp.unit_price', db.raw('SUM(tp.quantity) AS units_sold'));
}

export function customerSalesByEventAndPrice(db: Knex, customerId: number): Knex.QueryBuilder {
  return paidPurchases(db)
    .join('ticket_types as tt', 'tt.id', 'tp.ticket_type_id')
    .join('events as e', 'e.id', 'tt.event_id')
    .where('o.customer_id', customerId)
    .groupBy('e.id', 'e.name', 'tp.unit_price')
    .select('e.id as event_id', 'e.name as event_name', 'tp.unit_price', db.raw('SUM(tp.quantity) AS units_sold'));
}
