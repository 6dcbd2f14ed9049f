export interface EventSummary {
  eventId: number;
  eventName: string;
  totalTicketsSold: number;
  totalRevenue: number;
  /** `null` when the event has no capacity set */
  ticketsRemaining: number | null;
  organizerName: string;
}

export interface TicketTypeRank {
  id: number;
  name: string;
  unitsSold: number;
  eventName: string;
}

export interface PurchaseStats {
  customerId: number;
  totalOrdersPlaced: number;
  totalAmountSpent: number;
  mostPurchasedEventName: string | null;
}

export interface LowCapacityEvent {
  id: number;
  name: string;
  capacity: number;
  ticketsSold: number;
  percentageTicketsRemaining: number;
}
