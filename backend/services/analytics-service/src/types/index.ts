export * from './ticketing.types';
export * from './analytics.types';
