import { Knex } from 'knex';

/**
 * Migration: payment orchestration baseline
 *
 * payments, refunds and the entity -> provider mapping table.
 */
export async function up(knex: Knex): Promise<void> {
  console.log('🔧 Creating payment orchestration tables...');

  await knex.raw('CREATE EXTENSION IF NOT EXISTS "pgcrypto"');

  await knex.schema.createTable('payments', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('customer_id', 255).notNullable();
    table.bigInteger('amount').notNullable();
    table.string('currency', 3).notNullable();
    table.string('status', 32).notNullable();
    table.string('payment_method', 255).notNullable();
    table.text('description');
    table.string('provider_name', 64).notNullable();
    table.string('provider_charge_id', 255).notNullable();
    table.string('capture_method', 16).notNullable().defaultTo('automatic');
    table.bigInteger('captured_amount').notNullable().defaultTo(0);
    table.string('idempotency_key', 255).notNullable();
    table.jsonb('metadata').notNullable().defaultTo('{}');
    table.timestamps(true, true);

    table.unique(['idempotency_key'], { indexName: 'uq_payments_idempotency_key' });
    table.index(['provider_charge_id'], 'idx_payments_provider_charge_id');
    table.index(['customer_id'], 'idx_payments_customer_id');
  });

  console.log('✅ Created payments');

  await knex.raw(`
    ALTER TABLE payments
    ADD CONSTRAINT chk_payments_amount_positive CHECK (amount > 0)
  `);

  await knex.schema.createTable('refunds', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.uuid('payment_id').notNullable().references('id').inTable('payments').onDelete('CASCADE');
    table.bigInteger('amount').notNullable();
    table.text('reason');
    table.string('status', 32).notNullable();
    table.string('provider_name', 64).notNullable();
    table.string('provider_refund_id', 255).notNullable();
    table.jsonb('metadata').notNullable().defaultTo('{}');
    table.timestamps(true, true);

    table.index(['payment_id'], 'idx_refunds_payment_id');
  });

  console.log('✅ Created refunds');

  await knex.schema.createTable('provider_mappings', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('entity_id', 255).notNullable();
    table.string('entity_type', 32).notNullable();
    table.string('provider_name', 64).notNullable();
    table.string('provider_entity_id', 255).notNullable();
    table.timestamps(true, true);

    table.unique(['entity_id', 'entity_type'], { indexName: 'uq_provider_mappings_entity' });
    table.index(['provider_name'], 'idx_provider_mappings_provider_name');
  });

  console.log('✅ Created provider_mappings');
  console.log('✅ Migration complete: payment orchestration baseline');
}

export async function down(knex: Knex): Promise<void> {
  console.log('🔄 Rolling back payment orchestration baseline...');

  await knex.schema.dropTableIfExists('provider_mappings');
  await knex.schema.dropTableIfExists('refunds');
  await knex.schema.dropTableIfExists('payments');

  console.log('✅ Rollback complete');
}
