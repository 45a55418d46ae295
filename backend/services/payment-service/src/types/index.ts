export * from './payment.types';
export * from './provider-entities.types';
export * from './provider-mapping.types';
