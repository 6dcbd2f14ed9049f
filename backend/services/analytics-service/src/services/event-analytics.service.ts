import { Knex } from 'knex';
import { config, ServiceConfig } from '../config';
import { snapshotTransactionConfig } from '../config/database';
import { createLogger } from '../utils/logger';
import { isAppError } from '../errors';
import {
  customerIdSchema,
  thresholdPercentageSchema,
  topSellingLimitSchema,
  validateArgument,
} from '../schemas/validation';
import {
  CapacityCalculator,
  CustomerAnalytics,
  TicketTypeRanking,
  UpcomingEventsCalculator,
} from '../analytics-engine/calculators';
import type {
  EventSummary,
  LowCapacityEvent,
  PurchaseStats,
  TicketTypeRank,
} from '../types/analytics.types';

export interface EventAnalyticsOptions {
  /** Source of "now" for the upcoming-events cutoff */
  clock?: () => Date;
  defaults?: Partial<ServiceConfig['analytics']>;
}

/**
 * Read-only analytics over events, ticket types, orders and purchases.
 *
 * The service owns no connection: it works through the knex handle it is
 * given. Each operation runs in its own transaction (REPEATABLE READ on
 * PostgreSQL) so that all of its queries see one snapshot, and the pooled
 * connection is released afterwards.
 * Store errors are logged and rethrown unchanged; nothing is retried.
 */
export class EventAnalyticsService {
  private log = createLogger('EventAnalyticsService');
  private readonly clock: () => Date;
  private readonly defaults: ServiceConfig['analytics'];
  private readonly transactionConfig: Knex.TransactionConfig | undefined;

  private readonly upcomingEvents = new UpcomingEventsCalculator();
  private readonly ticketTypeRanking = new TicketTypeRanking();
  private readonly customerAnalytics = new CustomerAnalytics();
  private readonly capacityCalculator = new CapacityCalculator();

  constructor(private readonly db: Knex, options: EventAnalyticsOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.defaults = { ...config.analytics, ...options.defaults };
    this.transactionConfig = snapshotTransactionConfig(db);
  }

  async getUpcomingEventsSummary(): Promise<EventSummary[]> {
    const now = this.clock();

    return this.run('getUpcomingEventsSummary', { now: now.toISOString() }, () =>
      this.withSnapshot((trx) => this.upcomingEvents.summarize(trx, now))
    );
  }

  async getTopSellingTicketTypes(limit: number = this.defaults.topSellingLimit): Promise<TicketTypeRank[]> {
    return this.run('getTopSellingTicketTypes', { limit }, async () => {
      const validLimit = validateArgument(topSellingLimitSchema, limit, 'limit');
      if (validLimit <= 0) {
        return [];
      }
      return this.withSnapshot((trx) => this.ticketTypeRanking.topSelling(trx, validLimit));
    });
  }

  async getCustomerPurchaseStatistics(customerId: number): Promise<PurchaseStats> {
    return this.run('getCustomerPurchaseStatistics', { customerId }, () => {
      const validCustomerId = validateArgument(customerIdSchema, customerId, 'customerId');
      return this.withSnapshot((trx) => this.customerAnalytics.getPurchaseStatistics(trx, validCustomerId));
    });
  }

  async getEventsWithLowCapacityRemaining(
    thresholdPercentage: number = this.defaults.lowCapacityThreshold
  ): Promise<LowCapacityEvent[]> {
    return this.run('getEventsWithLowCapacityRemaining', { thresholdPercentage }, () => {
      const threshold = validateArgument(thresholdPercentageSchema, thresholdPercentage, 'thresholdPercentage');
      return this.withSnapshot((trx) => this.capacityCalculator.findLowCapacityEvents(trx, threshold));
    });
  }

  private withSnapshot<T>(work: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return this.db.transaction(work, this.transactionConfig);
  }

  private async run<T>(
    operation: string,
    context: Record<string, unknown>,
    work: () => Promise<T>
  ): Promise<T> {
    const startedAt = Date.now();

    try {
      const result = await work();
      this.log.debug(`${operation} completed`, {
        ...context,
        durationMs: Date.now() - startedAt,
        resultCount: Array.isArray(result) ? result.length : 1,
      });
      return result;
    } catch (error) {
      if (isAppError(error)) {
        this.log.warn(`${operation} rejected`, { ...context, code: error.code, error: error.message });
      } else {
        this.log.error(`${operation} failed`, { ...context, error });
      }
      throw error;
    }
  }
}
