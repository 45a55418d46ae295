/**
 * Payment Types
 *
 * The uniform charge/refund envelope every provider speaks, and the locally
 * persisted Payment and Refund records.
 */

export type Metadata = Record<string, unknown>;

export enum PaymentStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  REQUIRES_ACTION = 'requires_action',
  REQUIRES_CAPTURE = 'requires_capture',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELED = 'canceled',
  REFUNDED = 'refunded',
  PARTIALLY_REFUNDED = 'partially_refunded',
  DISPUTED = 'disputed',
}

export enum CaptureMethod {
  AUTOMATIC = 'automatic',
  MANUAL = 'manual',
}

export type PaymentMethodType = 'card' | 'bank_transfer' | 'ewallet' | 'virtual_account' | 'qr_code' | 'upi' | 'direct_debit';

export interface NextAction {
  type: 'redirect' | 'use_client_secret' | 'display_qr_code';
  redirectUrl?: string;
  clientSecret?: string;
  qrCode?: string;
}

export interface ChargeRequest {
  customerId: string;
  /** Minor currency units */
  amount: number;
  currency: string;
  paymentMethod: string;
  description?: string;
  captureMethod?: CaptureMethod;
  returnUrl?: string;
  /** Caller-supplied deduplication key */
  idempotencyKey?: string;
  metadata?: Metadata;
}

export interface ChargeResponse {
  id: string;
  customerId: string;
  amount: number;
  currency: string;
  status: PaymentStatus;
  paymentMethod: string;
  description?: string;
  providerName: string;
  providerChargeId: string;
  captureMethod?: CaptureMethod;
  capturedAmount?: number;
  nextAction?: NextAction;
  metadata?: Metadata;
  createdAt: Date;
}

export interface RefundRequest {
  paymentId: string;
  amount: number;
  currency: string;
  reason?: string;
  metadata?: Metadata;
}

export interface RefundResponse {
  id: string;
  paymentId: string;
  amount: number;
  currency: string;
  status: string;
  reason?: string;
  providerName: string;
  providerRefundId: string;
  metadata?: Metadata;
  createdAt: Date;
}

export interface Payment {
  id: string;
  customerId: string;
  amount: number;
  currency: string;
  status: PaymentStatus;
  paymentMethod: string;
  description: string;
  providerName: string;
  providerChargeId: string;
  captureMethod: CaptureMethod;
  capturedAmount: number;
  idempotencyKey: string;
  metadata: Metadata;
  createdAt: Date;
  updatedAt: Date;
}

export type NewPayment = Omit<Payment, 'id' | 'createdAt' | 'updatedAt'>;

export type RefundStatus = 'pending' | 'succeeded' | 'failed';

export interface Refund {
  id: string;
  paymentId: string;
  amount: number;
  reason: string;
  status: RefundStatus;
  providerName: string;
  providerRefundId: string;
  metadata: Metadata;
  createdAt: Date;
  updatedAt: Date;
}

export type NewRefund = Omit<Refund, 'id' | 'createdAt' | 'updatedAt'>;
