/**
 * Provider Entity Types
 *
 * Subscriptions, plans, disputes, customers and the optional-feature entities
 * (invoices, payouts, payment sessions, stored payment methods, balances).
 */

import { CaptureMethod, Metadata, NextAction, PaymentStatus } from './payment.types';

// =============================================================================
// SUBSCRIPTIONS & PLANS
// =============================================================================

export type SubscriptionStatus = 'active' | 'past_due' | 'canceled' | 'incomplete' | 'trialing' | 'unpaid' | 'paused';

export type BillingInterval = 'day' | 'week' | 'month' | 'year';

export interface Plan {
  id: string;
  name: string;
  amount: number;
  currency: string;
  interval: BillingInterval;
  intervalCount: number;
  trialDays?: number;
  metadata?: Metadata;
}

export interface Subscription {
  id: string;
  customerId: string;
  planId: string;
  status: SubscriptionStatus;
  quantity: number;
  currentPeriodStart: Date;
  currentPeriodEnd: Date;
  cancelAtPeriodEnd: boolean;
  canceledAt?: Date;
  providerName?: string;
  metadata?: Metadata;
}

export interface CreateSubscriptionRequest {
  customerId: string;
  planId: string;
  quantity?: number;
  trialDays?: number;
  paymentMethodId?: string;
  metadata?: Metadata;
}

export interface UpdateSubscriptionRequest {
  planId?: string;
  quantity?: number;
  cancelAtPeriodEnd?: boolean;
  metadata?: Metadata;
}

export interface CancelSubscriptionRequest {
  cancelAtPeriodEnd: boolean;
  reason?: string;
}

// =============================================================================
// DISPUTES
// =============================================================================

export type DisputeStatus = 'open' | 'under_review' | 'won' | 'lost' | 'accepted' | 'closed';

export interface Dispute {
  id: string;
  paymentId: string;
  customerId: string;
  amount: number;
  currency: string;
  reason: string;
  status: DisputeStatus;
  evidenceDueBy?: Date;
  providerName?: string;
  metadata?: Metadata;
  createdAt: Date;
}

export interface CreateDisputeRequest {
  paymentId: string;
  customerId: string;
  amount: number;
  currency: string;
  reason: string;
  metadata?: Metadata;
}

export interface UpdateDisputeRequest {
  status?: DisputeStatus;
  metadata?: Metadata;
}

export interface SubmitEvidenceRequest {
  type: string;
  description: string;
  files?: string[];
}

export interface Evidence {
  id: string;
  disputeId: string;
  type: string;
  description: string;
  files: string[];
  submittedAt: Date;
}

export interface DisputeStats {
  total: number;
  open: number;
  won: number;
  lost: number;
}

// =============================================================================
// CUSTOMERS
// =============================================================================

export interface Customer {
  id: string;
  externalId: string;
  email: string;
  name?: string;
  phone?: string;
  metadata?: Metadata;
}

export interface CreateCustomerRequest {
  externalId: string;
  email: string;
  name?: string;
  phone?: string;
  metadata?: Metadata;
}

export interface UpdateCustomerRequest {
  email?: string;
  name?: string;
  phone?: string;
  metadata?: Metadata;
}

// =============================================================================
// INVOICES
// =============================================================================

export type InvoiceStatus = 'draft' | 'pending' | 'paid' | 'expired' | 'canceled' | 'void';

export interface Invoice {
  id: string;
  externalId?: string;
  providerId: string;
  providerName: string;
  customerId: string;
  customerEmail?: string;
  amount: number;
  currency: string;
  status: InvoiceStatus;
  description?: string;
  invoiceUrl?: string;
  dueDate?: Date;
  paidAt?: Date;
  metadata?: Metadata;
  createdAt: Date;
}

export interface CreateInvoiceRequest {
  externalId?: string;
  customerId: string;
  customerEmail?: string;
  amount: number;
  currency: string;
  description?: string;
  dueDate?: Date;
  successRedirectUrl?: string;
  failureRedirectUrl?: string;
  paymentMethods?: string[];
  sendEmail?: boolean;
  metadata?: Metadata;
}

export interface ListInvoicesRequest {
  customerId?: string;
  status?: InvoiceStatus;
  limit?: number;
  offset?: number;
}

// =============================================================================
// PAYOUTS
// =============================================================================

export type PayoutStatus = 'pending' | 'processing' | 'succeeded' | 'failed' | 'canceled' | 'reversed';

export type DestinationType = 'bank_account' | 'card' | 'ewallet';

export interface Payout {
  id: string;
  referenceId: string;
  providerId: string;
  providerName: string;
  amount: number;
  currency: string;
  status: PayoutStatus;
  description?: string;
  destinationType: DestinationType;
  destinationAccount: string;
  destinationName?: string;
  destinationChannel?: string;
  failureReason?: string;
  estimatedArrival?: Date;
  metadata?: Metadata;
  createdAt: Date;
}

export interface CreatePayoutRequest {
  referenceId: string;
  amount: number;
  currency: string;
  description?: string;
  destinationType: DestinationType;
  destinationAccount: string;
  destinationName?: string;
  destinationBank?: string;
  destinationChannel?: string;
  metadata?: Metadata;
}

export interface ListPayoutsRequest {
  referenceId?: string;
  status?: PayoutStatus;
  limit?: number;
  offset?: number;
}

export interface PayoutChannel {
  code: string;
  name: string;
  category: string;
  currency: string;
  minAmount: number;
  maxAmount: number;
}

// =============================================================================
// PAYMENT SESSIONS
// =============================================================================

export interface PaymentSession {
  id: string;
  externalId?: string;
  providerId: string;
  providerName: string;
  amount: number;
  currency: string;
  status: PaymentStatus;
  captureMethod: CaptureMethod;
  customerId?: string;
  paymentMethodId?: string;
  description?: string;
  clientSecret?: string;
  nextAction?: NextAction;
  capturedAmount: number;
  metadata?: Metadata;
  createdAt: Date;
}

export interface CreatePaymentSessionRequest {
  externalId?: string;
  amount: number;
  currency: string;
  customerId?: string;
  paymentMethodId?: string;
  description?: string;
  captureMethod?: CaptureMethod;
  returnUrl?: string;
  metadata?: Metadata;
}

export interface UpdatePaymentSessionRequest {
  amount?: number;
  currency?: string;
  description?: string;
  paymentMethodId?: string;
  metadata?: Metadata;
}

export interface ConfirmPaymentSessionRequest {
  paymentMethodId?: string;
  returnUrl?: string;
}

export interface ListPaymentSessionsRequest {
  customerId?: string;
  status?: PaymentStatus;
  limit?: number;
  offset?: number;
}

// =============================================================================
// PAYMENT METHODS & BALANCE
// =============================================================================

export interface PaymentMethod {
  id: string;
  customerId: string;
  providerName: string;
  providerPaymentMethodId: string;
  type: string;
  last4?: string;
  brand?: string;
  expMonth?: number;
  expYear?: number;
  isDefault: boolean;
  metadata?: Metadata;
}

export interface CreatePaymentMethodRequest {
  /** Provider to store the method with; first available when omitted */
  provider?: string;
  customerId: string;
  paymentMethodId: string;
  type: string;
  isDefault?: boolean;
  metadata?: Metadata;
}

export interface Balance {
  available: number;
  pending: number;
  currency: string;
  providerName: string;
}
