import {
  Balance,
  CancelSubscriptionRequest,
  ChargeRequest,
  ChargeResponse,
  ConfirmPaymentSessionRequest,
  CreateCustomerRequest,
  CreateDisputeRequest,
  CreateInvoiceRequest,
  CreatePaymentMethodRequest,
  CreatePaymentSessionRequest,
  CreatePayoutRequest,
  CreateSubscriptionRequest,
  Customer,
  Dispute,
  DisputeStats,
  Evidence,
  Invoice,
  ListInvoicesRequest,
  ListPaymentSessionsRequest,
  ListPayoutsRequest,
  PaymentMethod,
  PaymentMethodType,
  PaymentSession,
  Payout,
  PayoutChannel,
  Plan,
  RefundRequest,
  RefundResponse,
  SubmitEvidenceRequest,
  Subscription,
  UpdateCustomerRequest,
  UpdateDisputeRequest,
  UpdatePaymentSessionRequest,
  UpdateSubscriptionRequest,
} from '../types';

export interface ProviderCapabilities {
  readonly supportsInvoices: boolean;
  readonly supportsPayouts: boolean;
  readonly supportsPaymentSessions: boolean;
  readonly supports3DS: boolean;
  readonly supportsManualCapture: boolean;
  readonly supportsBalance: boolean;
  readonly supportedCurrencies: readonly string[];
  readonly supportedPaymentMethods: readonly PaymentMethodType[];
}

/**
 * Operation contract every payment provider implements.
 *
 * Optional feature groups are not part of this interface; a provider
 * publishes them through extensions() and callers go through the
 * CapabilityRegistry.
 */
export interface PaymentProvider {
  /** Canonical name, e.g. "stripe". Routing and mappings key off this. */
  name(): string;
  capabilities(): ProviderCapabilities;
  extensions(): ProviderExtensions;

  charge(req: ChargeRequest, signal?: AbortSignal): Promise<ChargeResponse>;
  refund(req: RefundRequest, signal?: AbortSignal): Promise<RefundResponse>;

  // Subscriptions
  createSubscription(req: CreateSubscriptionRequest, signal?: AbortSignal): Promise<Subscription>;
  updateSubscription(subscriptionId: string, req: UpdateSubscriptionRequest, signal?: AbortSignal): Promise<Subscription>;
  cancelSubscription(subscriptionId: string, req: CancelSubscriptionRequest, signal?: AbortSignal): Promise<Subscription>;
  getSubscription(subscriptionId: string, signal?: AbortSignal): Promise<Subscription>;
  listSubscriptions(customerId: string, signal?: AbortSignal): Promise<Subscription[]>;

  // Plans
  createPlan(plan: Plan, signal?: AbortSignal): Promise<Plan>;
  updatePlan(planId: string, plan: Plan, signal?: AbortSignal): Promise<Plan>;
  deletePlan(planId: string, signal?: AbortSignal): Promise<void>;
  getPlan(planId: string, signal?: AbortSignal): Promise<Plan>;
  listPlans(signal?: AbortSignal): Promise<Plan[]>;

  // Disputes
  createDispute(req: CreateDisputeRequest, signal?: AbortSignal): Promise<Dispute>;
  updateDispute(disputeId: string, req: UpdateDisputeRequest, signal?: AbortSignal): Promise<Dispute>;
  submitDisputeEvidence(disputeId: string, req: SubmitEvidenceRequest, signal?: AbortSignal): Promise<Evidence>;
  getDispute(disputeId: string, signal?: AbortSignal): Promise<Dispute>;
  listDisputes(customerId: string, signal?: AbortSignal): Promise<Dispute[]>;
  getDisputeStats(signal?: AbortSignal): Promise<DisputeStats>;

  // Customers
  createCustomer(req: CreateCustomerRequest, signal?: AbortSignal): Promise<string>;
  updateCustomer(customerId: string, req: UpdateCustomerRequest, signal?: AbortSignal): Promise<void>;
  getCustomer(customerId: string, signal?: AbortSignal): Promise<Customer>;
  deleteCustomer(customerId: string, signal?: AbortSignal): Promise<void>;

  /** Cheap liveness probe; callers bound it with a short timeout */
  isAvailable(signal?: AbortSignal): Promise<boolean>;
}

// =============================================================================
// OPTIONAL CAPABILITIES
// =============================================================================

export interface InvoiceProvider {
  createInvoice(req: CreateInvoiceRequest, signal?: AbortSignal): Promise<Invoice>;
  getInvoice(invoiceId: string, signal?: AbortSignal): Promise<Invoice>;
  listInvoices(req: ListInvoicesRequest, signal?: AbortSignal): Promise<Invoice[]>;
  cancelInvoice(invoiceId: string, signal?: AbortSignal): Promise<Invoice>;
}

export interface PayoutProvider {
  createPayout(req: CreatePayoutRequest, signal?: AbortSignal): Promise<Payout>;
  getPayout(payoutId: string, signal?: AbortSignal): Promise<Payout>;
  listPayouts(req: ListPayoutsRequest, signal?: AbortSignal): Promise<Payout[]>;
  cancelPayout(payoutId: string, signal?: AbortSignal): Promise<Payout>;
  getPayoutChannels(currency: string, signal?: AbortSignal): Promise<PayoutChannel[]>;
}

export interface PaymentSessionProvider {
  createPaymentSession(req: CreatePaymentSessionRequest, signal?: AbortSignal): Promise<PaymentSession>;
  getPaymentSession(sessionId: string, signal?: AbortSignal): Promise<PaymentSession>;
  updatePaymentSession(sessionId: string, req: UpdatePaymentSessionRequest, signal?: AbortSignal): Promise<PaymentSession>;
  confirmPaymentSession(sessionId: string, req: ConfirmPaymentSessionRequest, signal?: AbortSignal): Promise<PaymentSession>;
  capturePaymentSession(sessionId: string, amount?: number, signal?: AbortSignal): Promise<PaymentSession>;
  cancelPaymentSession(sessionId: string, signal?: AbortSignal): Promise<PaymentSession>;
  listPaymentSessions(req: ListPaymentSessionsRequest, signal?: AbortSignal): Promise<PaymentSession[]>;
}

export interface PaymentMethodProvider {
  createPaymentMethod(req: CreatePaymentMethodRequest, signal?: AbortSignal): Promise<PaymentMethod>;
  getPaymentMethod(paymentMethodId: string, signal?: AbortSignal): Promise<PaymentMethod>;
  listPaymentMethods(customerId: string, type?: string, signal?: AbortSignal): Promise<PaymentMethod[]>;
  attachPaymentMethod(paymentMethodId: string, customerId: string, signal?: AbortSignal): Promise<void>;
  detachPaymentMethod(paymentMethodId: string, signal?: AbortSignal): Promise<void>;
  expirePaymentMethod(paymentMethodId: string, signal?: AbortSignal): Promise<PaymentMethod>;
}

export interface BalanceProvider {
  getBalance(currency: string, signal?: AbortSignal): Promise<Balance>;
}

export interface CaptureProvider {
  capturePayment(providerChargeId: string, amount?: number, signal?: AbortSignal): Promise<void>;
}

export interface VoidProvider {
  voidPayment(providerChargeId: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Optional capability implementations a provider publishes, keyed by name
 */
export interface ProviderExtensions {
  invoice?: InvoiceProvider;
  payout?: PayoutProvider;
  paymentSession?: PaymentSessionProvider;
  paymentMethod?: PaymentMethodProvider;
  balance?: BalanceProvider;
  capture?: CaptureProvider;
  void?: VoidProvider;
}

export type CapabilityName = keyof ProviderExtensions;

export const EMPTY_CAPABILITIES: ProviderCapabilities = Object.freeze({
  supportsInvoices: false,
  supportsPayouts: false,
  supportsPaymentSessions: false,
  supports3DS: false,
  supportsManualCapture: false,
  supportsBalance: false,
  supportedCurrencies: Object.freeze([]),
  supportedPaymentMethods: Object.freeze([]),
});

/**
 * Build an immutable capability set
 */
export function defineCapabilities(caps: Partial<ProviderCapabilities>): ProviderCapabilities {
  return Object.freeze({
    ...EMPTY_CAPABILITIES,
    ...caps,
    supportedCurrencies: Object.freeze([...(caps.supportedCurrencies ?? [])]),
    supportedPaymentMethods: Object.freeze([...(caps.supportedPaymentMethods ?? [])]),
  });
}
