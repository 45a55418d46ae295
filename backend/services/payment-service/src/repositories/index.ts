export * from './payment.repository';
export * from './provider-mapping.store';
export { isUniqueViolation } from './db-errors';
