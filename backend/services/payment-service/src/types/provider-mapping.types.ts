/**
 * Durable record of which provider originated an entity, and the provider's
 * native id for it. Unique on (entityId, entityType).
 */

export const ENTITY_TYPES = [
  'payment',
  'subscription',
  'dispute',
  'payout',
  'invoice',
  'payment_session',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export interface ProviderMapping {
  id: string;
  entityId: string;
  entityType: EntityType;
  providerName: string;
  providerEntityId: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewProviderMapping = Pick<ProviderMapping, 'entityId' | 'entityType' | 'providerName' | 'providerEntityId'>;

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some((type) => type === value);
}
