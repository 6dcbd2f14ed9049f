import { Knex } from 'knex';
import { AggregateValue, paidUnitsByTicketType } from '../queries/sales-queries';
import { toCount } from '../../utils/decimal';
import type { TicketTypeRank } from '../../types/analytics.types';

interface RankedTicketTypeRow {
  id: number;
  name: string;
  event_name: string;
  units_sold: AggregateValue;
}

export class TicketTypeRanking {
  /**
   * Ticket types by units sold on paid orders, highest first, ties broken by
   * ticket type id ascending. Types without sales rank last with zero units.
   */
  async topSelling(db: Knex, limit: number): Promise<TicketTypeRank[]> {
    if (limit <= 0) {
      return [];
    }

    const rows: RankedTicketTypeRow[] = await db('ticket_types as tt')
      .join('events as e', 'e.id', 'tt.event_id')
      .leftJoin(paidUnitsByTicketType(db).as('sales'), 'sales.ticket_type_id', 'tt.id')
      .select('tt.id', 'tt.name', 'e.name as event_name', 'sales.units_sold')
      // NULLs sort first under DESC on PostgreSQL, so order on the defaulted value
      .orderByRaw('COALESCE(sales.units_sold, 0) DESC')
      .orderBy('tt.id', 'asc')
      .limit(limit);

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      unitsSold: toCount(row.units_sold),
      eventName: row.event_name,
    }));
  }
}
