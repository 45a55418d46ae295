import { NewProviderMapping, ProviderMapping, isEntityType } from '../types';

export const PROVIDER_MAPPINGS_TABLE = 'provider_mappings';

export interface ProviderMappingRow {
  id: string;
  entity_id: string;
  entity_type: string;
  provider_name: string;
  provider_entity_id: string;
  created_at: Date | string;
  updated_at: Date | string;
}

export type ProviderMappingInsert = Pick<
  ProviderMappingRow,
  'entity_id' | 'entity_type' | 'provider_name' | 'provider_entity_id'
>;

export function mapProviderMappingRow(row: ProviderMappingRow): ProviderMapping {
  if (!isEntityType(row.entity_type)) {
    throw new Error(`Unknown entity type in provider mapping ${row.id}: ${row.entity_type}`);
  }

  return {
    id: row.id,
    entityId: row.entity_id,
    entityType: row.entity_type,
    providerName: row.provider_name,
    providerEntityId: row.provider_entity_id,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function toProviderMappingInsert(mapping: NewProviderMapping): ProviderMappingInsert {
  return {
    entity_id: mapping.entityId,
    entity_type: mapping.entityType,
    provider_name: mapping.providerName,
    provider_entity_id: mapping.providerEntityId,
  };
}
