import { Knex } from 'knex';
import { NotFoundError, PersistenceError } from '../errors';
import {
  PAYMENTS_TABLE,
  PaymentRow,
  REFUNDS_TABLE,
  RefundRow,
  mapPaymentRow,
  mapRefundRow,
  toPaymentInsert,
  toRefundInsert,
} from '../models/payment.model';
import { NewPayment, NewRefund, Payment, PaymentStatus, Refund } from '../types';
import { rethrowAsConflict } from './db-errors';

/**
 * Storage for payments and their refunds.
 *
 * withTransaction hands the callback a repository bound to one transaction;
 * everything done through it commits or rolls back together.
 */
export interface PaymentRepository {
  create(payment: NewPayment): Promise<Payment>;
  update(payment: Payment): Promise<Payment>;
  /**
   * Moves the payment to `to` only if it is still in `from`.
   * Resolves null when another writer changed the status first.
   */
  transitionStatus(id: string, from: PaymentStatus, to: PaymentStatus): Promise<Payment | null>;
  getById(id: string): Promise<Payment | null>;
  createRefund(refund: NewRefund): Promise<Refund>;
  getRefundById(id: string): Promise<Refund | null>;
  findByProviderChargeId(providerName: string, providerChargeId: string): Promise<Payment | null>;
  findByIdempotencyKey(idempotencyKey: string): Promise<Payment | null>;
  withTransaction<T>(fn: (tx: PaymentRepository) => Promise<T>): Promise<T>;
}

export class KnexPaymentRepository implements PaymentRepository {
  constructor(private readonly db: Knex) {}

  async create(payment: NewPayment): Promise<Payment> {
    let rows: PaymentRow[];
    try {
      rows = await this.db<PaymentRow>(PAYMENTS_TABLE).insert(toPaymentInsert(payment)).returning('*');
    } catch (error) {
      rethrowAsConflict(error, `payment with idempotency key ${payment.idempotencyKey} already exists`);
    }

    const row = rows[0];
    if (!row) {
      throw new PersistenceError('create payment', 'insert returned no row');
    }
    return mapPaymentRow(row);
  }

  async update(payment: Payment): Promise<Payment> {
    const rows: PaymentRow[] = await this.db<PaymentRow>(PAYMENTS_TABLE)
      .where({ id: payment.id })
      .update({
        status: payment.status,
        captured_amount: payment.capturedAmount,
        description: payment.description,
        metadata: JSON.stringify(payment.metadata),
        updated_at: new Date(),
      })
      .returning('*');

    const row = rows[0];
    if (!row) {
      throw new NotFoundError('Payment', payment.id);
    }
    return mapPaymentRow(row);
  }

  async transitionStatus(id: string, from: PaymentStatus, to: PaymentStatus): Promise<Payment | null> {
    const rows: PaymentRow[] = await this.db<PaymentRow>(PAYMENTS_TABLE)
      .where({ id, status: from })
      .update({ status: to, updated_at: new Date() })
      .returning('*');

    const row = rows[0];
    return row ? mapPaymentRow(row) : null;
  }

  async getById(id: string): Promise<Payment | null> {
    const row = await this.db<PaymentRow>(PAYMENTS_TABLE).where({ id }).first();
    return row ? mapPaymentRow(row) : null;
  }

  async createRefund(refund: NewRefund): Promise<Refund> {
    const rows: RefundRow[] = await this.db<RefundRow>(REFUNDS_TABLE)
      .insert(toRefundInsert(refund))
      .returning('*');

    const row = rows[0];
    if (!row) {
      throw new PersistenceError('create refund', 'insert returned no row');
    }
    return mapRefundRow(row);
  }

  async getRefundById(id: string): Promise<Refund | null> {
    const row = await this.db<RefundRow>(REFUNDS_TABLE).where({ id }).first();
    return row ? mapRefundRow(row) : null;
  }

  async findByProviderChargeId(providerName: string, providerChargeId: string): Promise<Payment | null> {
    const row = await this.db<PaymentRow>(PAYMENTS_TABLE)
      .where({ provider_name: providerName, provider_charge_id: providerChargeId })
      .first();
    return row ? mapPaymentRow(row) : null;
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<Payment | null> {
    const row = await this.db<PaymentRow>(PAYMENTS_TABLE).where({ idempotency_key: idempotencyKey }).first();
    return row ? mapPaymentRow(row) : null;
  }

  async withTransaction<T>(fn: (tx: PaymentRepository) => Promise<T>): Promise<T> {
    return this.db.transaction((trx) => fn(new KnexPaymentRepository(trx)));
  }
}
