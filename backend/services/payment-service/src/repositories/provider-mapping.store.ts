import { Knex } from 'knex';
import { PersistenceError } from '../errors';
import {
  PROVIDER_MAPPINGS_TABLE,
  ProviderMappingRow,
  mapProviderMappingRow,
  toProviderMappingInsert,
} from '../models/provider-mapping.model';
import { EntityType, NewProviderMapping, ProviderMapping } from '../types';
import { rethrowAsConflict } from './db-errors';

/**
 * Durable entity -> provider assignments. One mapping per (entityId, entityType).
 */
export interface ProviderMappingStore {
  getByEntity(entityId: string, entityType: EntityType): Promise<ProviderMapping | null>;
  /** @throws ConflictError when the entity already has a mapping */
  create(mapping: NewProviderMapping): Promise<ProviderMapping>;
}

export class KnexProviderMappingStore implements ProviderMappingStore {
  constructor(private readonly db: Knex) {}

  async getByEntity(entityId: string, entityType: EntityType): Promise<ProviderMapping | null> {
    const row = await this.db<ProviderMappingRow>(PROVIDER_MAPPINGS_TABLE)
      .where({ entity_id: entityId, entity_type: entityType })
      .first();
    return row ? mapProviderMappingRow(row) : null;
  }

  async create(mapping: NewProviderMapping): Promise<ProviderMapping> {
    let rows: ProviderMappingRow[];
    try {
      rows = await this.db<ProviderMappingRow>(PROVIDER_MAPPINGS_TABLE)
        .insert(toProviderMappingInsert(mapping))
        .returning('*');
    } catch (error) {
      rethrowAsConflict(error, `${mapping.entityType} ${mapping.entityId} is already mapped to a provider`);
    }

    const row = rows[0];
    if (!row) {
      throw new PersistenceError('create provider mapping', 'insert returned no row');
    }
    return mapProviderMappingRow(row);
  }
}
