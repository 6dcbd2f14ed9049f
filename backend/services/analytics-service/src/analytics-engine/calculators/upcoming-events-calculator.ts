import { Knex } from 'knex';
import { eventSalesByPrice, EventSalesRow } from '../queries/sales-queries';
import { centsToAmount, toCents, toCount } from '../../utils/decimal';
import type { EventSummary } from '../../types/analytics.types';

interface UpcomingEventRow {
  id: number;
  name: string;
  capacity: number | null;
  organizer_name: string;
}

interface SalesTally {
  units: number;
  revenueCents: number;
}

export class UpcomingEventsCalculator {
  /**
   * One summary per published event that has not ended by `now`, ordered by
   * start time then id. Runs two queries however many events match.
   */
  async summarize(db: Knex, now: Date): Promise<EventSummary[]> {
    const events: UpcomingEventRow[] = await db('events as e')
      .join('organizers as org', 'org.id', 'e.organizer_id')
      .where('e.status', 'published')
      .where('e.end_time', '>=', now.toISOString())
      .orderBy([
        { column: 'e.start_time', order: 'asc' },
        { column: 'e.id', order: 'asc' },
      ])
      .select('e.id', 'e.name', 'e.capacity', 'org.name as organizer_name');

    if (events.length === 0) {
      return [];
    }

    const salesRows: EventSalesRow[] = await eventSalesByPrice(db, events.map((event) => event.id));
    const tallies = this.tallyByEvent(salesRows);

    return events.map((event) => {
      const tally = tallies.get(event.id) ?? { units: 0, revenueCents: 0 };

      return {
        eventId: event.id,
        eventName: event.name,
        totalTicketsSold: tally.units,
        totalRevenue: centsToAmount(tally.revenueCents),
        ticketsRemaining: this.ticketsRemaining(event.capacity, tally.units),
        organizerName: event.organizer_name,
      };
    });
  }

  private tallyByEvent(rows: EventSalesRow[]): Map<number, SalesTally> {
    const tallies = new Map<number, SalesTally>();

    for (const row of rows) {
      const units = toCount(row.units_sold);
      const tally = tallies.get(row.event_id) ?? { units: 0, revenueCents: 0 };
      tally.units += units;
      tally.revenueCents += units * toCents(row.unit_price);
      tallies.set(row.event_id, tally);
    }

    return tallies;
  }

  // Oversold events report zero remaining rather than a negative count
  private ticketsRemaining(capacity: number | null, sold: number): number | null {
    if (capacity === null) {
      return null;
    }
    return Math.max(capacity - sold, 0);
  }
}
