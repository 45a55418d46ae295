/**
 * Multi-Provider Selector
 *
 * Routes each operation to one of the configured payment providers:
 * - new money movements by currency preference, falling back to the first
 *   available provider in configured order
 * - follow-up operations on an entity (refund, cancel, capture, ...) to the
 *   provider that created it, via the in-memory cache and the durable
 *   provider mapping store
 * - listings fan out across every available provider
 *
 * The entity caches are plain Maps touched only between awaits on the
 * event loop, so no locking is involved.
 */

import { abortReason } from '@paymesh/shared';
import { ConfigurationError, NoAvailableProviderError, NotFoundError, NotSupportedError, ProviderUnavailableError, toError } from '../errors';
import { ProviderMappingStore } from '../repositories/provider-mapping.store';
import { AlertSink, alertMappingWriteFailed } from '../services/alerting.service';
import { MetricNames, MetricsSink, NoopMetricsSink } from '../services/metrics.service';
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
  ENTITY_TYPES,
  EntityType,
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
import { logger, Logger } from '../utils/logger';
import { probeAvailability } from './availability';
import { CapabilityRegistry } from './capability-registry';
import { preferredProviderFor } from './currency-routing';
import { CapabilityName, PaymentProvider, ProviderCapabilities, defineCapabilities } from './provider.interface';

export const SELECTOR_NAME = 'multi-provider';

export interface MultiProviderSelectorOptions {
  /** In routing order */
  providers: readonly PaymentProvider[];
  mappingStore: ProviderMappingStore;
  availabilityTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsSink;
  alerts: AlertSink;
}

export interface ProviderStats {
  totalProviders: number;
  cachedMappings: Record<EntityType, number>;
  providerAvailability: Record<string, boolean>;
}

interface EntityIds {
  entityId: string;
  providerEntityId: string;
}

interface FanOutOptions {
  capability?: CapabilityName;
  /** Resource name for the NotFoundError raised on an empty result; omit to allow empty results */
  notFound?: string;
}

export class MultiProviderSelector {
  private readonly providers: readonly PaymentProvider[];
  private readonly providersByName = new Map<string, PaymentProvider>();
  private readonly registry: CapabilityRegistry;
  private readonly mappingStore: ProviderMappingStore;
  private readonly availabilityTimeoutMs: number;
  private readonly log: Logger;
  private readonly metrics: MetricsSink;
  private readonly alerts: AlertSink;

  // entity type -> entity id -> provider name
  private readonly entityCache = new Map<EntityType, Map<string, string>>();

  constructor(options: MultiProviderSelectorOptions) {
    for (const provider of options.providers) {
      const name = provider.name();
      if (this.providersByName.has(name)) {
        throw new ConfigurationError(`duplicate payment provider: ${name}`);
      }
      this.providersByName.set(name, provider);
    }

    this.providers = [...options.providers];
    this.registry = new CapabilityRegistry(this.providers);
    this.mappingStore = options.mappingStore;
    this.availabilityTimeoutMs = options.availabilityTimeoutMs ?? 2000;
    this.log = options.logger ?? logger.child({ component: 'MultiProviderSelector' });
    this.metrics = options.metrics ?? new NoopMetricsSink();
    this.alerts = options.alerts;

    for (const type of ENTITY_TYPES) {
      this.entityCache.set(type, new Map());
    }
  }

  name(): string {
    return SELECTOR_NAME;
  }

  get capabilityRegistry(): CapabilityRegistry {
    return this.registry;
  }

  /**
   * Union of every configured provider's capabilities
   */
  capabilities(): ProviderCapabilities {
    const currencies = new Set<string>();
    const methods = new Set<PaymentMethodType>();
    const caps = {
      supportsInvoices: false,
      supportsPayouts: false,
      supportsPaymentSessions: false,
      supports3DS: false,
      supportsManualCapture: false,
      supportsBalance: false,
    };

    for (const provider of this.providers) {
      const providerCaps = provider.capabilities();
      caps.supportsInvoices = caps.supportsInvoices || providerCaps.supportsInvoices;
      caps.supportsPayouts = caps.supportsPayouts || providerCaps.supportsPayouts;
      caps.supportsPaymentSessions = caps.supportsPaymentSessions || providerCaps.supportsPaymentSessions;
      caps.supports3DS = caps.supports3DS || providerCaps.supports3DS;
      caps.supportsManualCapture = caps.supportsManualCapture || providerCaps.supportsManualCapture;
      caps.supportsBalance = caps.supportsBalance || providerCaps.supportsBalance;
      providerCaps.supportedCurrencies.forEach((currency) => currencies.add(currency));
      providerCaps.supportedPaymentMethods.forEach((method) => methods.add(method));
    }

    return defineCapabilities({
      ...caps,
      supportedCurrencies: Array.from(currencies),
      supportedPaymentMethods: Array.from(methods),
    });
  }

  // ===========================================================================
  // SELECTION
  // ===========================================================================

  getProvider(name: string): PaymentProvider | undefined {
    return this.providersByName.get(name);
  }

  /**
   * The preferred provider when configured and up, else the first available one
   *
   * @throws NoAvailableProviderError
   */
  async selectAvailableProvider(preferredName?: string, signal?: AbortSignal): Promise<PaymentProvider> {
    const provider = await this.findAvailableProvider(preferredName, signal);
    if (!provider) {
      throw new NoAvailableProviderError();
    }
    return provider;
  }

  /**
   * @throws NoAvailableProviderError
   */
  async selectProviderByCurrency(currency: string, signal?: AbortSignal): Promise<PaymentProvider> {
    const provider = await this.findAvailableProvider(preferredProviderFor(currency), signal);
    if (!provider) {
      throw new NoAvailableProviderError(currency);
    }
    return provider;
  }

  async isAvailable(signal?: AbortSignal): Promise<boolean> {
    return (await this.findAvailableProvider(undefined, signal)) !== undefined;
  }

  /**
   * @throws the signal's abort reason once the caller gives up, rather than
   * reporting every provider as unavailable
   */
  private async findAvailableProvider(
    preferredName: string | undefined,
    signal?: AbortSignal
  ): Promise<PaymentProvider | undefined> {
    throwIfAborted(signal);

    if (preferredName) {
      const preferred = this.providersByName.get(preferredName);
      if (preferred && (await this.probe(preferred, signal))) {
        return preferred;
      }
      throwIfAborted(signal);
    }

    for (const provider of this.providers) {
      if (provider.name() === preferredName) {
        continue; // already probed
      }
      if (await this.probe(provider, signal)) {
        return provider;
      }
      throwIfAborted(signal);
    }

    this.log.warn({ preferredName }, 'No payment provider available');
    return undefined;
  }

  private probe(provider: PaymentProvider, signal?: AbortSignal): Promise<boolean> {
    return probeAvailability(provider, this.availabilityTimeoutMs, signal);
  }

  // ===========================================================================
  // ENTITY AFFINITY
  // ===========================================================================

  /**
   * The provider that created an entity. Never substitutes another provider.
   *
   * @throws NotFoundError when no mapping exists
   * @throws ProviderUnavailableError when the mapped provider is not configured
   */
  async resolveEntityProvider(entityType: EntityType, entityId: string): Promise<PaymentProvider> {
    const cache = this.cacheFor(entityType);
    const cached = cache.get(entityId);
    if (cached !== undefined) {
      const provider = this.providersByName.get(cached);
      if (provider) {
        return provider;
      }
    }

    const mapping = await this.mappingStore.getByEntity(entityId, entityType);
    if (!mapping) {
      throw new NotFoundError(`${entityType} provider mapping`, entityId);
    }

    const provider = this.providersByName.get(mapping.providerName);
    if (!provider) {
      throw new ProviderUnavailableError(mapping.providerName);
    }

    cache.set(entityId, mapping.providerName);
    return provider;
  }

  /**
   * Cache and durably record which provider owns an entity.
   * A failed write is logged, counted and alerted, then rethrown.
   */
  async recordEntity(
    entityType: EntityType,
    entityId: string,
    provider: PaymentProvider,
    providerEntityId: string
  ): Promise<void> {
    const providerName = provider.name();
    this.cacheFor(entityType).set(entityId, providerName);

    try {
      await this.mappingStore.create({ entityId, entityType, providerName, providerEntityId });
    } catch (error) {
      const cause = toError(error);
      this.log.error(
        { entityType, entityId, provider: providerName, providerEntityId, error: cause.message },
        'Failed to persist provider mapping'
      );
      this.metrics.increment(MetricNames.MAPPING_WRITE_FAILURES, {
        entity_type: entityType,
        provider: providerName,
      });
      await alertMappingWriteFailed(this.alerts, {
        entityType,
        entityId,
        provider: providerName,
        error: cause.message,
      }).catch((alertError: unknown) => {
        this.log.error({ error: toError(alertError).message }, 'Failed to raise mapping alert');
      });
      throw error;
    }
  }

  clearCache(): void {
    for (const cache of this.entityCache.values()) {
      cache.clear();
    }
  }

  async getProviderStats(signal?: AbortSignal): Promise<ProviderStats> {
    const cachedMappings: Record<EntityType, number> = {
      payment: this.cacheFor('payment').size,
      subscription: this.cacheFor('subscription').size,
      dispute: this.cacheFor('dispute').size,
      payout: this.cacheFor('payout').size,
      invoice: this.cacheFor('invoice').size,
      payment_session: this.cacheFor('payment_session').size,
    };

    const availability = await Promise.all(
      this.providers.map(async (provider) => [provider.name(), await this.probe(provider, signal)] as const)
    );

    return {
      totalProviders: this.providers.length,
      cachedMappings,
      providerAvailability: Object.fromEntries(availability),
    };
  }

  private cacheFor(entityType: EntityType): Map<string, string> {
    let cache = this.entityCache.get(entityType);
    if (!cache) {
      cache = new Map();
      this.entityCache.set(entityType, cache);
    }
    return cache;
  }

  // ===========================================================================
  // GENERIC ENTITY ROUTING
  // ===========================================================================

  /**
   * Run a creating call and record the new entity's provider. The entity is
   * returned even when the mapping write fails, since it exists remotely.
   */
  private async createEntity<T>(
    kind: EntityType,
    provider: PaymentProvider,
    create: () => Promise<T>,
    idsOf: (entity: T) => EntityIds
  ): Promise<T> {
    const entity = await create();
    const { entityId, providerEntityId } = idsOf(entity);

    if (entityId) {
      try {
        await this.recordEntity(kind, entityId, provider, providerEntityId || entityId);
      } catch (error) {
        this.log.warn(
          { entityType: kind, entityId, provider: provider.name(), error: toError(error).message },
          'Returning entity without a durable provider mapping'
        );
      }
    }

    return entity;
  }

  private async withEntityProvider<T>(
    kind: EntityType,
    entityId: string,
    operation: (provider: PaymentProvider) => Promise<T>
  ): Promise<T> {
    const provider = await this.resolveEntityProvider(kind, entityId);
    return operation(provider);
  }

  /**
   * Query every available provider (optionally only those with a capability)
   * and concatenate the results in configured order. Failing providers are skipped.
   */
  private async fanOut<T>(
    operation: string,
    query: (provider: PaymentProvider) => Promise<T[]>,
    options: FanOutOptions,
    signal?: AbortSignal
  ): Promise<T[]> {
    const capability = options.capability;
    const candidates = capability
      ? this.providers.filter((provider) => this.registry.supports(provider.name(), capability))
      : this.providers;

    const results = await Promise.all(
      candidates.map(async (provider): Promise<T[]> => {
        if (!(await this.probe(provider, signal))) {
          return [];
        }
        try {
          return await query(provider);
        } catch (error) {
          this.log.warn(
            { operation, provider: provider.name(), error: toError(error).message },
            'Skipping provider that failed during fan-out'
          );
          this.metrics.increment(MetricNames.FANOUT_ERRORS, { operation, provider: provider.name() });
          return [];
        }
      })
    );

    const merged = results.flat();
    if (merged.length === 0 && options.notFound) {
      throw new NotFoundError(options.notFound);
    }
    return merged;
  }

  /**
   * Try each available provider with the capability until one succeeds
   */
  private async firstSuccessful<T>(
    operation: string,
    capability: CapabilityName,
    attempt: (provider: PaymentProvider) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let lastError: unknown;
    let tried = 0;

    for (const provider of this.providers) {
      if (!this.registry.supports(provider.name(), capability) || !(await this.probe(provider, signal))) {
        continue;
      }
      tried++;
      try {
        return await attempt(provider);
      } catch (error) {
        lastError = error;
        this.log.debug({ operation, provider: provider.name(), error: toError(error).message }, 'Provider attempt failed');
      }
    }

    if (tried === 0) {
      throw new NotSupportedError(SELECTOR_NAME, capability);
    }
    throw lastError;
  }

  // ===========================================================================
  // PAYMENTS
  // ===========================================================================

  async charge(req: ChargeRequest, signal?: AbortSignal): Promise<ChargeResponse> {
    const provider = await this.selectProviderByCurrency(req.currency, signal);
    return this.createEntity(
      'payment',
      provider,
      async () => ({ ...(await provider.charge(req, signal)), providerName: provider.name() }),
      (response) => ({ entityId: response.id, providerEntityId: response.providerChargeId })
    );
  }

  async refund(req: RefundRequest, signal?: AbortSignal): Promise<RefundResponse> {
    return this.withEntityProvider('payment', req.paymentId, async (provider) => ({
      ...(await provider.refund(req, signal)),
      providerName: provider.name(),
    }));
  }

  async capturePayment(paymentId: string, amount?: number, signal?: AbortSignal): Promise<void> {
    return this.withEntityProvider('payment', paymentId, (provider) =>
      this.registry.require(provider.name(), 'capture').capturePayment(paymentId, amount, signal)
    );
  }

  async voidPayment(paymentId: string, signal?: AbortSignal): Promise<void> {
    return this.withEntityProvider('payment', paymentId, (provider) =>
      this.registry.require(provider.name(), 'void').voidPayment(paymentId, signal)
    );
  }

  // ===========================================================================
  // SUBSCRIPTIONS & PLANS
  // ===========================================================================

  async createSubscription(req: CreateSubscriptionRequest, signal?: AbortSignal): Promise<Subscription> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return this.createEntity(
      'subscription',
      provider,
      () => provider.createSubscription(req, signal),
      (subscription) => ({ entityId: subscription.id, providerEntityId: subscription.id })
    );
  }

  async updateSubscription(
    subscriptionId: string,
    req: UpdateSubscriptionRequest,
    signal?: AbortSignal
  ): Promise<Subscription> {
    return this.withEntityProvider('subscription', subscriptionId, (provider) =>
      provider.updateSubscription(subscriptionId, req, signal)
    );
  }

  async cancelSubscription(
    subscriptionId: string,
    req: CancelSubscriptionRequest,
    signal?: AbortSignal
  ): Promise<Subscription> {
    return this.withEntityProvider('subscription', subscriptionId, (provider) =>
      provider.cancelSubscription(subscriptionId, req, signal)
    );
  }

  async getSubscription(subscriptionId: string, signal?: AbortSignal): Promise<Subscription> {
    return this.withEntityProvider('subscription', subscriptionId, (provider) =>
      provider.getSubscription(subscriptionId, signal)
    );
  }

  async listSubscriptions(customerId: string, signal?: AbortSignal): Promise<Subscription[]> {
    return this.fanOut(
      'listSubscriptions',
      (provider) => provider.listSubscriptions(customerId, signal),
      { notFound: 'Subscriptions' },
      signal
    );
  }

  async createPlan(plan: Plan, signal?: AbortSignal): Promise<Plan> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.createPlan(plan, signal);
  }

  async updatePlan(planId: string, plan: Plan, signal?: AbortSignal): Promise<Plan> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.updatePlan(planId, plan, signal);
  }

  async deletePlan(planId: string, signal?: AbortSignal): Promise<void> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.deletePlan(planId, signal);
  }

  async getPlan(planId: string, signal?: AbortSignal): Promise<Plan> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.getPlan(planId, signal);
  }

  async listPlans(signal?: AbortSignal): Promise<Plan[]> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.listPlans(signal);
  }

  // ===========================================================================
  // DISPUTES
  // ===========================================================================

  async createDispute(req: CreateDisputeRequest, signal?: AbortSignal): Promise<Dispute> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return this.createEntity(
      'dispute',
      provider,
      () => provider.createDispute(req, signal),
      (dispute) => ({ entityId: dispute.id, providerEntityId: dispute.id })
    );
  }

  async updateDispute(disputeId: string, req: UpdateDisputeRequest, signal?: AbortSignal): Promise<Dispute> {
    return this.withEntityProvider('dispute', disputeId, (provider) => provider.updateDispute(disputeId, req, signal));
  }

  async submitDisputeEvidence(disputeId: string, req: SubmitEvidenceRequest, signal?: AbortSignal): Promise<Evidence> {
    return this.withEntityProvider('dispute', disputeId, (provider) =>
      provider.submitDisputeEvidence(disputeId, req, signal)
    );
  }

  async getDispute(disputeId: string, signal?: AbortSignal): Promise<Dispute> {
    return this.withEntityProvider('dispute', disputeId, (provider) => provider.getDispute(disputeId, signal));
  }

  async listDisputes(customerId: string, signal?: AbortSignal): Promise<Dispute[]> {
    return this.fanOut(
      'listDisputes',
      (provider) => provider.listDisputes(customerId, signal),
      { notFound: 'Disputes' },
      signal
    );
  }

  async getDisputeStats(signal?: AbortSignal): Promise<DisputeStats> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.getDisputeStats(signal);
  }

  // ===========================================================================
  // CUSTOMERS
  // ===========================================================================

  async createCustomer(req: CreateCustomerRequest, signal?: AbortSignal): Promise<string> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.createCustomer(req, signal);
  }

  async updateCustomer(customerId: string, req: UpdateCustomerRequest, signal?: AbortSignal): Promise<void> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.updateCustomer(customerId, req, signal);
  }

  async getCustomer(customerId: string, signal?: AbortSignal): Promise<Customer> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.getCustomer(customerId, signal);
  }

  async deleteCustomer(customerId: string, signal?: AbortSignal): Promise<void> {
    const provider = await this.selectAvailableProvider(undefined, signal);
    return provider.deleteCustomer(customerId, signal);
  }

  // ===========================================================================
  // PAYMENT METHODS
  // ===========================================================================

  async createPaymentMethod(req: CreatePaymentMethodRequest, signal?: AbortSignal): Promise<PaymentMethod> {
    const provider = await this.selectAvailableProvider(req.provider, signal);
    return this.registry.require(provider.name(), 'paymentMethod').createPaymentMethod(req, signal);
  }

  async getPaymentMethod(paymentMethodId: string, signal?: AbortSignal): Promise<PaymentMethod> {
    return this.firstSuccessful(
      'getPaymentMethod',
      'paymentMethod',
      (provider) => this.registry.require(provider.name(), 'paymentMethod').getPaymentMethod(paymentMethodId, signal),
      signal
    );
  }

  async listPaymentMethods(customerId: string, type?: string, signal?: AbortSignal): Promise<PaymentMethod[]> {
    return this.fanOut(
      'listPaymentMethods',
      (provider) =>
        this.registry.require(provider.name(), 'paymentMethod').listPaymentMethods(customerId, type, signal),
      { capability: 'paymentMethod' },
      signal
    );
  }

  async attachPaymentMethod(paymentMethodId: string, customerId: string, signal?: AbortSignal): Promise<void> {
    return this.firstSuccessful(
      'attachPaymentMethod',
      'paymentMethod',
      (provider) =>
        this.registry.require(provider.name(), 'paymentMethod').attachPaymentMethod(paymentMethodId, customerId, signal),
      signal
    );
  }

  async detachPaymentMethod(paymentMethodId: string, signal?: AbortSignal): Promise<void> {
    return this.firstSuccessful(
      'detachPaymentMethod',
      'paymentMethod',
      (provider) => this.registry.require(provider.name(), 'paymentMethod').detachPaymentMethod(paymentMethodId, signal),
      signal
    );
  }

  async expirePaymentMethod(paymentMethodId: string, signal?: AbortSignal): Promise<PaymentMethod> {
    return this.firstSuccessful(
      'expirePaymentMethod',
      'paymentMethod',
      (provider) => this.registry.require(provider.name(), 'paymentMethod').expirePaymentMethod(paymentMethodId, signal),
      signal
    );
  }

  // ===========================================================================
  // INVOICES
  // ===========================================================================

  async createInvoice(req: CreateInvoiceRequest, signal?: AbortSignal): Promise<Invoice> {
    const provider = await this.selectProviderByCurrency(req.currency, signal);
    const invoices = this.registry.require(provider.name(), 'invoice');
    return this.createEntity(
      'invoice',
      provider,
      () => invoices.createInvoice(req, signal),
      (invoice) => ({ entityId: invoice.id, providerEntityId: invoice.providerId })
    );
  }

  async getInvoice(invoiceId: string, signal?: AbortSignal): Promise<Invoice> {
    return this.withEntityProvider('invoice', invoiceId, (provider) =>
      this.registry.require(provider.name(), 'invoice').getInvoice(invoiceId, signal)
    );
  }

  async listInvoices(req: ListInvoicesRequest, signal?: AbortSignal): Promise<Invoice[]> {
    return this.fanOut(
      'listInvoices',
      (provider) => this.registry.require(provider.name(), 'invoice').listInvoices(req, signal),
      { capability: 'invoice', notFound: 'Invoices' },
      signal
    );
  }

  async cancelInvoice(invoiceId: string, signal?: AbortSignal): Promise<Invoice> {
    return this.withEntityProvider('invoice', invoiceId, (provider) =>
      this.registry.require(provider.name(), 'invoice').cancelInvoice(invoiceId, signal)
    );
  }

  // ===========================================================================
  // PAYOUTS & BALANCE
  // ===========================================================================

  async createPayout(req: CreatePayoutRequest, signal?: AbortSignal): Promise<Payout> {
    const provider = await this.selectProviderByCurrency(req.currency, signal);
    const payouts = this.registry.require(provider.name(), 'payout');
    return this.createEntity(
      'payout',
      provider,
      () => payouts.createPayout(req, signal),
      (payout) => ({ entityId: payout.id, providerEntityId: payout.providerId })
    );
  }

  async getPayout(payoutId: string, signal?: AbortSignal): Promise<Payout> {
    return this.withEntityProvider('payout', payoutId, (provider) =>
      this.registry.require(provider.name(), 'payout').getPayout(payoutId, signal)
    );
  }

  async listPayouts(req: ListPayoutsRequest, signal?: AbortSignal): Promise<Payout[]> {
    return this.fanOut(
      'listPayouts',
      (provider) => this.registry.require(provider.name(), 'payout').listPayouts(req, signal),
      { capability: 'payout', notFound: 'Payouts' },
      signal
    );
  }

  async cancelPayout(payoutId: string, signal?: AbortSignal): Promise<Payout> {
    return this.withEntityProvider('payout', payoutId, (provider) =>
      this.registry.require(provider.name(), 'payout').cancelPayout(payoutId, signal)
    );
  }

  async getPayoutChannels(currency: string, signal?: AbortSignal): Promise<PayoutChannel[]> {
    const provider = await this.selectProviderByCurrency(currency, signal);
    return this.registry.require(provider.name(), 'payout').getPayoutChannels(currency, signal);
  }

  async getBalance(currency: string, signal?: AbortSignal): Promise<Balance> {
    const provider = await this.selectProviderByCurrency(currency, signal);
    return this.registry.require(provider.name(), 'balance').getBalance(currency, signal);
  }

  // ===========================================================================
  // PAYMENT SESSIONS
  // ===========================================================================

  async createPaymentSession(req: CreatePaymentSessionRequest, signal?: AbortSignal): Promise<PaymentSession> {
    const provider = await this.selectProviderByCurrency(req.currency, signal);
    const sessions = this.registry.require(provider.name(), 'paymentSession');
    return this.createEntity(
      'payment_session',
      provider,
      () => sessions.createPaymentSession(req, signal),
      (session) => ({ entityId: session.id, providerEntityId: session.providerId })
    );
  }

  async getPaymentSession(sessionId: string, signal?: AbortSignal): Promise<PaymentSession> {
    return this.withEntityProvider('payment_session', sessionId, (provider) =>
      this.registry.require(provider.name(), 'paymentSession').getPaymentSession(sessionId, signal)
    );
  }

  async updatePaymentSession(
    sessionId: string,
    req: UpdatePaymentSessionRequest,
    signal?: AbortSignal
  ): Promise<PaymentSession> {
    return this.withEntityProvider('payment_session', sessionId, (provider) =>
      this.registry.require(provider.name(), 'paymentSession').updatePaymentSession(sessionId, req, signal)
    );
  }

  async confirmPaymentSession(
    sessionId: string,
    req: ConfirmPaymentSessionRequest,
    signal?: AbortSignal
  ): Promise<PaymentSession> {
    return this.withEntityProvider('payment_session', sessionId, (provider) =>
      this.registry.require(provider.name(), 'paymentSession').confirmPaymentSession(sessionId, req, signal)
    );
  }

  async capturePaymentSession(sessionId: string, amount?: number, signal?: AbortSignal): Promise<PaymentSession> {
    return this.withEntityProvider('payment_session', sessionId, (provider) =>
      this.registry.require(provider.name(), 'paymentSession').capturePaymentSession(sessionId, amount, signal)
    );
  }

  async cancelPaymentSession(sessionId: string, signal?: AbortSignal): Promise<PaymentSession> {
    return this.withEntityProvider('payment_session', sessionId, (provider) =>
      this.registry.require(provider.name(), 'paymentSession').cancelPaymentSession(sessionId, signal)
    );
  }

  async listPaymentSessions(req: ListPaymentSessionsRequest, signal?: AbortSignal): Promise<PaymentSession[]> {
    return this.fanOut(
      'listPaymentSessions',
      (provider) => this.registry.require(provider.name(), 'paymentSession').listPaymentSessions(req, signal),
      { capability: 'paymentSession', notFound: 'Payment sessions' },
      signal
    );
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}
