export { UpcomingEventsCalculator } from './upcoming-events-calculator';
export { TicketTypeRanking } from './ticket-type-ranking';
export { CustomerAnalytics } from './customer-analytics';
export { CapacityCalculator } from './capacity-calculator';
