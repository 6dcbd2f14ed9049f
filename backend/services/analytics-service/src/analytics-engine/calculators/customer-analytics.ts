import { Knex } from 'knex';
import { customerSalesByEventAndPrice, CustomerEventSalesRow } from '../queries/sales-queries';
import { centsToAmount, toCents, toCount } from '../../utils/decimal';
import { NotFoundError } from '../../errors';
import type { PurchaseStats } from '../../types/analytics.types';

interface EventUnits {
  eventId: number;
  eventName: string;
  units: number;
}

export class CustomerAnalytics {
  async getPurchaseStatistics(db: Knex, customerId: number): Promise<PurchaseStats> {
    const customer: { id: number } | undefined = await db('users')
      .where('id', customerId)
      .first('id');

    if (!customer) {
      throw new NotFoundError('Customer', { customerId });
    }

    // Every order counts here, paid or not
    const orderCounts: Array<{ total: string | number }> = await db('orders')
      .where('customer_id', customerId)
      .select(db.raw('COUNT(*) AS total'));

    const salesRows: CustomerEventSalesRow[] = await customerSalesByEventAndPrice(db, customerId);

    let spentCents = 0;
    const unitsByEvent = new Map<number, EventUnits>();

    for (const row of salesRows) {
      const units = toCount(row.units_sold);
      spentCents += units * toCents(row.unit_price);

      const entry = unitsByEvent.get(row.event_id) ?? {
        eventId: row.event_id,
        eventName: row.event_name,
        units: 0,
      };
      entry.units += units;
      unitsByEvent.set(row.event_id, entry);
    }

    return {
      customerId,
      totalOrdersPlaced: toCount(orderCounts[0]?.total),
      totalAmountSpent: centsToAmount(spentCents),
      mostPurchasedEventName: this.mostPurchased([...unitsByEvent.values()])?.eventName ?? null,
    };
  }

  /**
   * Highest unit count wins; equal counts go to the lowest event id.
   */
  private mostPurchased(events: EventUnits[]): EventUnits | undefined {
    let best: EventUnits | undefined;

    for (const candidate of events) {
      if (candidate.units <= 0) {
        continue;
      }
      if (
        !best ||
        candidate.units > best.units ||
        (candidate.units === best.units && candidate.eventId < best.eventId)
      ) {
        best = candidate;
      }
    }

    return best;
  }
}
