import { ConflictError, NotFoundError } from '../../src/errors';
import { PaymentRepository } from '../../src/repositories/payment.repository';
import { ProviderMappingStore } from '../../src/repositories/provider-mapping.store';
import {
  EntityType,
  NewPayment,
  NewProviderMapping,
  NewRefund,
  Payment,
  PaymentStatus,
  ProviderMapping,
  Refund,
} from '../../src/types';

interface PaymentTables {
  payments: Map<string, Payment>;
  refunds: Map<string, Refund>;
}

interface StatusExpectation {
  id: string;
  status: PaymentStatus;
}

/** What a transaction wrote, applied to the live tables on commit */
interface TransactionWrites {
  payments: Set<string>;
  refunds: Set<string>;
  expectations: StatusExpectation[];
}

function cloneTables(tables: PaymentTables): PaymentTables {
  return {
    payments: new Map(Array.from(tables.payments, ([id, payment]) => [id, { ...payment }])),
    refunds: new Map(Array.from(tables.refunds, ([id, refund]) => [id, { ...refund }])),
  };
}

/**
 * Payment repository over plain maps. A transaction works on a copy of the
 * tables and merges its writes on commit, so a rejected callback leaves
 * nothing behind. Commit re-checks the idempotency key index and every
 * conditional status change against the live tables, the way row locks and
 * unique indexes make a concurrent transaction fail.
 */
export class InMemoryPaymentRepository implements PaymentRepository {
  private readonly tables: PaymentTables = { payments: new Map(), refunds: new Map() };
  private sequence = 0;

  /** Set to make the next create() (inside or outside a transaction) fail */
  failNextCreate: Error | null = null;
  failNextCreateRefund: Error | null = null;

  get payments(): Payment[] {
    return Array.from(this.tables.payments.values());
  }

  get refunds(): Refund[] {
    return Array.from(this.tables.refunds.values());
  }

  async create(payment: NewPayment): Promise<Payment> {
    return this.createIn(this.tables, payment);
  }

  async update(payment: Payment): Promise<Payment> {
    return this.updateIn(this.tables, payment);
  }

  async transitionStatus(id: string, from: PaymentStatus, to: PaymentStatus): Promise<Payment | null> {
    return this.transitionIn(this.tables, id, from, to);
  }

  async getById(id: string): Promise<Payment | null> {
    const payment = this.tables.payments.get(id);
    return payment ? { ...payment } : null;
  }

  async createRefund(refund: NewRefund): Promise<Refund> {
    return this.createRefundIn(this.tables, refund);
  }

  async getRefundById(id: string): Promise<Refund | null> {
    return this.tables.refunds.get(id) ?? null;
  }

  async findByProviderChargeId(providerName: string, providerChargeId: string): Promise<Payment | null> {
    return (
      this.payments.find(
        (payment) => payment.providerName === providerName && payment.providerChargeId === providerChargeId
      ) ?? null
    );
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<Payment | null> {
    return this.payments.find((payment) => payment.idempotencyKey === idempotencyKey) ?? null;
  }

  async withTransaction<T>(fn: (tx: PaymentRepository) => Promise<T>): Promise<T> {
    const working = cloneTables(this.tables);
    const writes: TransactionWrites = { payments: new Set(), refunds: new Set(), expectations: [] };

    const tx: PaymentRepository = {
      create: async (payment) => {
        const created = this.createIn(working, payment);
        writes.payments.add(created.id);
        return created;
      },
      update: async (payment) => {
        const updated = this.updateIn(working, payment);
        writes.payments.add(updated.id);
        return updated;
      },
      transitionStatus: async (id, from, to) => {
        const moved = this.transitionIn(working, id, from, to);
        if (moved) {
          writes.payments.add(id);
          writes.expectations.push({ id, status: from });
        }
        return moved;
      },
      getById: async (id) => working.payments.get(id) ?? null,
      createRefund: async (refund) => {
        const created = this.createRefundIn(working, refund);
        writes.refunds.add(created.id);
        return created;
      },
      getRefundById: async (id) => working.refunds.get(id) ?? null,
      findByProviderChargeId: (providerName, chargeId) => this.findByProviderChargeId(providerName, chargeId),
      findByIdempotencyKey: (key) => this.findByIdempotencyKey(key),
      withTransaction: (inner) => inner(tx),
    };

    const result = await fn(tx);
    this.commit(working, writes);
    return result;
  }

  private commit(working: PaymentTables, writes: TransactionWrites): void {
    for (const expectation of writes.expectations) {
      const live = this.tables.payments.get(expectation.id);
      if (!live || live.status !== expectation.status) {
        throw new ConflictError(`payment ${expectation.id} was changed by a concurrent transaction`);
      }
    }

    for (const id of writes.payments) {
      const payment = working.payments.get(id);
      if (payment && !this.tables.payments.has(id)) {
        this.assertKeyFree(this.tables, payment.idempotencyKey);
      }
    }

    for (const id of writes.payments) {
      const payment = working.payments.get(id);
      if (payment) {
        this.tables.payments.set(id, payment);
      }
    }
    for (const id of writes.refunds) {
      const refund = working.refunds.get(id);
      if (refund) {
        this.tables.refunds.set(id, refund);
      }
    }
  }

  private assertKeyFree(tables: PaymentTables, idempotencyKey: string): void {
    for (const existing of tables.payments.values()) {
      if (existing.idempotencyKey === idempotencyKey) {
        throw new ConflictError(`payment with idempotency key ${idempotencyKey} already exists`);
      }
    }
  }

  private createIn(tables: PaymentTables, payment: NewPayment): Payment {
    if (this.failNextCreate) {
      const error = this.failNextCreate;
      this.failNextCreate = null;
      throw error;
    }
    this.assertKeyFree(tables, payment.idempotencyKey);

    this.sequence += 1;
    const now = new Date();
    const created: Payment = { ...payment, id: `pay_${this.sequence}`, createdAt: now, updatedAt: now };
    tables.payments.set(created.id, created);
    return { ...created };
  }

  private updateIn(tables: PaymentTables, payment: Payment): Payment {
    if (!tables.payments.has(payment.id)) {
      throw new NotFoundError('Payment', payment.id);
    }
    const updated: Payment = { ...payment, updatedAt: new Date() };
    tables.payments.set(updated.id, updated);
    return { ...updated };
  }

  private transitionIn(tables: PaymentTables, id: string, from: PaymentStatus, to: PaymentStatus): Payment | null {
    const payment = tables.payments.get(id);
    if (!payment || payment.status !== from) {
      return null;
    }
    const updated: Payment = { ...payment, status: to, updatedAt: new Date() };
    tables.payments.set(id, updated);
    return { ...updated };
  }

  private createRefundIn(tables: PaymentTables, refund: NewRefund): Refund {
    if (this.failNextCreateRefund) {
      const error = this.failNextCreateRefund;
      this.failNextCreateRefund = null;
      throw error;
    }

    this.sequence += 1;
    const now = new Date();
    const created: Refund = { ...refund, id: `rf_${this.sequence}`, createdAt: now, updatedAt: now };
    tables.refunds.set(created.id, created);
    return { ...created };
  }
}

export class InMemoryProviderMappingStore implements ProviderMappingStore {
  private readonly mappings = new Map<string, ProviderMapping>();
  private sequence = 0;

  failWrites: Error | null = null;
  readonly reads: Array<[string, EntityType]> = [];

  get size(): number {
    return this.mappings.size;
  }

  async getByEntity(entityId: string, entityType: EntityType): Promise<ProviderMapping | null> {
    this.reads.push([entityId, entityType]);
    return this.mappings.get(keyOf(entityId, entityType)) ?? null;
  }

  async create(mapping: NewProviderMapping): Promise<ProviderMapping> {
    if (this.failWrites) {
      throw this.failWrites;
    }
    const key = keyOf(mapping.entityId, mapping.entityType);
    if (this.mappings.has(key)) {
      throw new ConflictError(`${mapping.entityType} ${mapping.entityId} is already mapped to a provider`);
    }

    this.sequence += 1;
    const now = new Date();
    const created: ProviderMapping = { ...mapping, id: `map_${this.sequence}`, createdAt: now, updatedAt: now };
    this.mappings.set(key, created);
    return created;
  }
}

function keyOf(entityId: string, entityType: EntityType): string {
  return `${entityType}:${entityId}`;
}
