import {
  CaptureMethod,
  Metadata,
  NewPayment,
  NewRefund,
  Payment,
  PaymentStatus,
  Refund,
  RefundStatus,
} from '../types';

export const PAYMENTS_TABLE = 'payments';
export const REFUNDS_TABLE = 'refunds';

/**
 * Row as returned by pg. BIGINT columns arrive as strings.
 */
export interface PaymentRow {
  id: string;
  customer_id: string;
  amount: string | number;
  currency: string;
  status: string;
  payment_method: string;
  description: string | null;
  provider_name: string;
  provider_charge_id: string;
  capture_method: string;
  captured_amount: string | number;
  idempotency_key: string;
  metadata: unknown;
  created_at: Date | string;
  updated_at: Date | string;
}

export interface RefundRow {
  id: string;
  payment_id: string;
  amount: string | number;
  reason: string | null;
  status: string;
  provider_name: string;
  provider_refund_id: string;
  metadata: unknown;
  created_at: Date | string;
  updated_at: Date | string;
}

export type PaymentInsert = Omit<PaymentRow, 'id' | 'created_at' | 'updated_at' | 'metadata'> & { metadata: string };
export type RefundInsert = Omit<RefundRow, 'id' | 'created_at' | 'updated_at' | 'metadata'> & { metadata: string };

const REFUND_STATUSES: readonly RefundStatus[] = ['pending', 'succeeded', 'failed'];

export function mapPaymentRow(row: PaymentRow): Payment {
  return {
    id: row.id,
    customerId: row.customer_id,
    amount: toInteger(row.amount),
    currency: row.currency,
    status: toPaymentStatus(row.status),
    paymentMethod: row.payment_method,
    description: row.description ?? '',
    providerName: row.provider_name,
    providerChargeId: row.provider_charge_id,
    captureMethod: toCaptureMethod(row.capture_method),
    capturedAmount: toInteger(row.captured_amount),
    idempotencyKey: row.idempotency_key,
    metadata: parseMetadata(row.metadata),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function mapRefundRow(row: RefundRow): Refund {
  return {
    id: row.id,
    paymentId: row.payment_id,
    amount: toInteger(row.amount),
    reason: row.reason ?? '',
    status: toRefundStatus(row.status),
    providerName: row.provider_name,
    providerRefundId: row.provider_refund_id,
    metadata: parseMetadata(row.metadata),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function toPaymentInsert(payment: NewPayment): PaymentInsert {
  return {
    customer_id: payment.customerId,
    amount: payment.amount,
    currency: payment.currency,
    status: payment.status,
    payment_method: payment.paymentMethod,
    description: payment.description,
    provider_name: payment.providerName,
    provider_charge_id: payment.providerChargeId,
    capture_method: payment.captureMethod,
    captured_amount: payment.capturedAmount,
    idempotency_key: payment.idempotencyKey,
    metadata: JSON.stringify(payment.metadata),
  };
}

export function toRefundInsert(refund: NewRefund): RefundInsert {
  return {
    payment_id: refund.paymentId,
    amount: refund.amount,
    reason: refund.reason,
    status: refund.status,
    provider_name: refund.providerName,
    provider_refund_id: refund.providerRefundId,
    metadata: JSON.stringify(refund.metadata),
  };
}

// =============================================================================
// COLUMN PARSERS
// =============================================================================

function toInteger(value: string | number): number {
  return typeof value === 'number' ? value : parseInt(value, 10);
}

export function toPaymentStatus(value: string): PaymentStatus {
  const status = Object.values(PaymentStatus).find((candidate) => candidate === value);
  if (status === undefined) {
    throw new Error(`Unknown payment status: ${value}`);
  }
  return status;
}

function toCaptureMethod(value: string): CaptureMethod {
  return value === CaptureMethod.MANUAL ? CaptureMethod.MANUAL : CaptureMethod.AUTOMATIC;
}

function toRefundStatus(value: string): RefundStatus {
  const status = REFUND_STATUSES.find((candidate) => candidate === value);
  if (status === undefined) {
    throw new Error(`Unknown refund status: ${value}`);
  }
  return status;
}

/**
 * jsonb columns come back parsed; json text columns as strings
 */
export function parseMetadata(value: unknown): Metadata {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return {};
}
