/**
 * Row shapes of the ticketing tables the analytics engine reads.
 *
 * Decimal columns come back as strings from PostgreSQL and as numbers from
 * SQLite, hence `DecimalValue`. Timestamps are written as ISO 8601 strings
 * and read back as `Date` (PostgreSQL) or the stored string (SQLite).
 */

export type DecimalValue = string | number;
export type TimestampValue = Date | string;

export const EVENT_STATUSES = ['draft', 'published', 'cancelled', 'completed'] as const;
export type EventStatus = typeof EVENT_STATUSES[number];

export interface OrganizerRow {
  id: number;
  name: string;
  contact_email: string | null;
  description: string | null;
}

export interface UserRow {
  id: number;
  username: string;
  email: string | null;
}

export interface EventRow {
  id: number;
  name: string;
  organizer_id: number;
  status: EventStatus;
  start_time: TimestampValue;
  end_time: TimestampValue;
  location: string | null;
  capacity: number | null;
  base_ticket_price: DecimalValue;
}

export interface TicketTypeRow {
  id: number;
  event_id: number;
  name: string;
  price: DecimalValue;
  quantity_available: number;
  is_active: boolean;
}

export interface OrderRow {
  id: number;
  customer_id: number | null;
  created_at: TimestampValue;
  total_amount: DecimalValue;
  is_paid: boolean;
  discount_code: string | null;
}

export interface TicketPurchaseRow {
  id: number;
  order_id: number;
  ticket_type_id: number;
  quantity: number;
  unit_price: DecimalValue;
}
