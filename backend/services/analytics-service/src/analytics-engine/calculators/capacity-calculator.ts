import { Knex } from 'knex';
import { AggregateValue, paidUnitsByEvent } from '../queries/sales-queries';
import { isAtOrBelowPercentage, percentageOf, toCount } from '../../utils/decimal';
import type { LowCapacityEvent } from '../../types/analytics.types';

interface EventCapacityRow {
  id: number;
  name: string;
  capacity: number;
  units_sold: AggregateValue;
}

export class CapacityCalculator {
  /**
   * Events with a positive capacity whose remaining share is at or below
   * `thresholdPercentage`, ordered by id. Events without a capacity are not
   * considered at all. The reported share is rounded up to hundredths and so
   * never exceeds the threshold.
   */
  async findLowCapacityEvents(db: Knex, thresholdPercentage: number): Promise<LowCapacityEvent[]> {
    const rows: EventCapacityRow[] = await db('events as e')
      .leftJoin(paidUnitsByEvent(db).as('sales'), 'sales.event_id', 'e.id')
      .whereNotNull('e.capacity')
      .where('e.capacity', '>', 0)
      .orderBy('e.id', 'asc')
      .select('e.id', 'e.name', 'e.capacity', 'sales.units_sold');

    const lowCapacity: LowCapacityEvent[] = [];

    for (const row of rows) {
      const ticketsSold = toCount(row.units_sold);
      // Clamped so an oversold event reads 0% rather than a negative share
      const remaining = Math.max(row.capacity - ticketsSold, 0);

      if (isAtOrBelowPercentage(remaining, row.capacity, thresholdPercentage)) {
        lowCapacity.push({
          id: row.id,
          name: row.name,
          capacity: row.capacity,
          ticketsSold,
          percentageTicketsRemaining: percentageOf(remaining, row.capacity),
        });
      }
    }

    return lowCapacity;
  }
}
