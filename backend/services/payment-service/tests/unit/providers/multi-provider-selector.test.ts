import {
  ConfigurationError,
  NoAvailableProviderError,
  NotFoundError,
  NotSupportedError,
  ProviderUnavailableError,
} from '../../../src/errors';
import { MultiProviderSelector } from '../../../src/providers/multi-provider-selector';
import { preferredProviderFor } from '../../../src/providers/currency-routing';
import { MetricNames } from '../../../src/services/metrics.service';
import { Invoice, PaymentMethod } from '../../../src/types';
import { InMemoryProviderMappingStore } from '../../fakes/in-memory-stores';
import { MockProvider } from '../../fakes/mock-provider';
import { RecordingAlertSink, RecordingMetricsSink } from '../../fakes/recording-sinks';

function invoiceFixture(id: string, providerName: string): Invoice {
  return {
    id,
    providerId: `${providerName}-${id}`,
    providerName,
    customerId: 'cus_1',
    amount: 150000,
    currency: 'IDR',
    status: 'pending',
    createdAt: new Date('2026-01-15T10:00:00.000Z'),
  };
}

function invoiceExtension(providerName: string) {
  return {
    createInvoice: jest.fn(async () => invoiceFixture('inv_1', providerName)),
    getInvoice: jest.fn(async (invoiceId: string) => invoiceFixture(invoiceId, providerName)),
    listInvoices: jest.fn(async () => [invoiceFixture('inv_1', providerName)]),
    cancelInvoice: jest.fn(async (invoiceId: string) => ({ ...invoiceFixture(invoiceId, providerName), status: 'canceled' as const })),
  };
}

function paymentMethodFixture(providerName: string): PaymentMethod {
  return {
    id: 'pm_1',
    customerId: 'cus_1',
    providerName,
    providerPaymentMethodId: `${providerName}_pm_1`,
    type: 'card',
    isDefault: false,
  };
}

function paymentMethodExtension(providerName: string) {
  return {
    createPaymentMethod: jest.fn(async () => paymentMethodFixture(providerName)),
    getPaymentMethod: jest.fn(async () => paymentMethodFixture(providerName)),
    listPaymentMethods: jest.fn(async () => [paymentMethodFixture(providerName)]),
    attachPaymentMethod: jest.fn(async () => undefined),
    detachPaymentMethod: jest.fn(async () => undefined),
    expirePaymentMethod: jest.fn(async () => paymentMethodFixture(providerName)),
  };
}

describe('MultiProviderSelector', () => {
  let store: InMemoryProviderMappingStore;
  let metrics: RecordingMetricsSink;
  let alerts: RecordingAlertSink;

  beforeEach(() => {
    store = new InMemoryProviderMappingStore();
    metrics = new RecordingMetricsSink();
    alerts = new RecordingAlertSink();
  });

  function createSelector(providers: MockProvider[]): MultiProviderSelector {
    return new MultiProviderSelector({ providers, mappingStore: store, metrics, alerts, availabilityTimeoutMs: 100 });
  }

  describe('construction', () => {
    test('rejects two providers with the same name', () => {
      expect(() => createSelector([new MockProvider('stripe'), new MockProvider('stripe')])).toThrow(ConfigurationError);
    });

    test('reports the union of provider capabilities', () => {
      const selector = createSelector([
        new MockProvider('stripe', { capabilities: { supports3DS: true, supportedCurrencies: ['USD', 'EUR'] } }),
        new MockProvider('xendit', {
          capabilities: { supportsInvoices: true, supportedCurrencies: ['IDR', 'USD'], supportedPaymentMethods: ['ewallet'] },
        }),
      ]);

      const caps = selector.capabilities();
      expect(caps.supports3DS).toBe(true);
      expect(caps.supportsInvoices).toBe(true);
      expect(caps.supportsPayouts).toBe(false);
      expect(caps.supportedCurrencies).toEqual(['USD', 'EUR', 'IDR']);
      expect(caps.supportedPaymentMethods).toEqual(['ewallet']);
      expect(selector.name()).toBe('multi-provider');
    });
  });

  describe('currency routing', () => {
    test('maps currencies to their preferred provider case-insensitively', () => {
      expect(preferredProviderFor('usd')).toBe('stripe');
      expect(preferredProviderFor(' IDR ')).toBe('xendit');
      expect(preferredProviderFor('INR')).toBe('razorpay');
      expect(preferredProviderFor('sgd')).toBe('airwallex');
      expect(preferredProviderFor('JPY')).toBeUndefined();
      expect(preferredProviderFor('constructor')).toBeUndefined();
    });

    test('picks the preferred provider regardless of configured order', async () => {
      const selector = createSelector([new MockProvider('xendit'), new MockProvider('stripe')]);

      const provider = await selector.selectProviderByCurrency('usd');

      expect(provider.name()).toBe('stripe');
    });

    test('falls back to the first available provider in order without re-probing the preferred one', async () => {
      const stripe = new MockProvider('stripe', { available: false });
      const razorpay = new MockProvider('razorpay', { available: false });
      const xendit = new MockProvider('xendit');
      const selector = createSelector([stripe, razorpay, xendit]);

      const provider = await selector.selectProviderByCurrency('USD');

      expect(provider.name()).toBe('xendit');
      expect(stripe.isAvailable).toHaveBeenCalledTimes(1);
      expect(razorpay.isAvailable).toHaveBeenCalledTimes(1);
    });

    test('uses configured order for currencies without a preference', async () => {
      const selector = createSelector([new MockProvider('airwallex'), new MockProvider('stripe')]);

      const provider = await selector.selectProviderByCurrency('JPY');

      expect(provider.name()).toBe('airwallex');
    });

    test('treats a throwing availability probe as unavailable', async () => {
      const stripe = new MockProvider('stripe');
      stripe.isAvailable.mockRejectedValueOnce(new Error('dns failure'));
      const selector = createSelector([stripe, new MockProvider('xendit')]);

      const provider = await selector.selectProviderByCurrency('USD');

      expect(provider.name()).toBe('xendit');
    });

    test('throws NoAvailableProviderError naming the currency when everything is down', async () => {
      const selector = createSelector([
        new MockProvider('stripe', { available: false }),
        new MockProvider('xendit', { available: false }),
      ]);

      await expect(selector.selectProviderByCurrency('USD')).rejects.toThrow(
        'no available payment provider for currency: USD'
      );
      await expect(selector.selectAvailableProvider()).rejects.toBeInstanceOf(NoAvailableProviderError);
      await expect(selector.isAvailable()).resolves.toBe(false);
    });

    test('rejects with the abort reason when the caller already gave up', async () => {
      const stripe = new MockProvider('stripe');
      const selector = createSelector([stripe, new MockProvider('xendit')]);
      const controller = new AbortController();
      const cancelled = new Error('request cancelled');
      controller.abort(cancelled);

      await expect(selector.selectProviderByCurrency('USD', controller.signal)).rejects.toBe(cancelled);
      expect(stripe.isAvailable).not.toHaveBeenCalled();
    });

    test('stops checking providers and rejects with the abort reason when cancelled mid-check', async () => {
      const stripe = new MockProvider('stripe');
      const xendit = new MockProvider('xendit');
      stripe.isAvailable.mockImplementationOnce(() => new Promise<boolean>(() => undefined));
      const selector = createSelector([stripe, xendit]);
      const controller = new AbortController();
      const cancelled = new Error('request cancelled');

      const selection = selector.selectProviderByCurrency('USD', controller.signal);
      controller.abort(cancelled);

      await expect(selection).rejects.toBe(cancelled);
      expect(xendit.isAvailable).not.toHaveBeenCalled();
    });

    test('honours an explicit preferred provider', async () => {
      const selector = createSelector([new MockProvider('stripe'), new MockProvider('xendit')]);

      const provider = await selector.selectAvailableProvider('xendit');

      expect(provider.name()).toBe('xendit');
    });
  });

  describe('entity affinity', () => {
    test('routes follow-up calls to the creating provider after the cache is cleared', async () => {
      const stripe = new MockProvider('stripe');
      const xendit = new MockProvider('xendit');
      const selector = createSelector([stripe, xendit]);

      const subscription = await selector.createSubscription({ customerId: 'cus_1', planId: 'plan_basic' });
      selector.clearCache();
      const fetched = await selector.getSubscription(subscription.id);

      expect(fetched.id).toBe(subscription.id);
      expect(stripe.getSubscription).toHaveBeenCalledWith(subscription.id, undefined);
      expect(xendit.getSubscription).not.toHaveBeenCalled();
      expect(store.reads).toEqual([[subscription.id, 'subscription']]);
    });

    test('serves repeat lookups from the cache', async () => {
      const selector = createSelector([new MockProvider('stripe')]);

      const subscription = await selector.createSubscription({ customerId: 'cus_1', planId: 'plan_basic' });
      await selector.getSubscription(subscription.id);
      await selector.cancelSubscription(subscription.id, { cancelAtPeriodEnd: false });

      expect(store.reads).toEqual([]);
    });

    test('throws NotFoundError for an entity without a mapping', async () => {
      const selector = createSelector([new MockProvider('stripe')]);

      await expect(selector.resolveEntityProvider('dispute', 'dp_missing')).rejects.toThrow(
        'dispute provider mapping with ID dp_missing not found'
      );
    });

    test('never substitutes another provider when the mapped one is not configured', async () => {
      await store.create({
        entityId: 'sub_legacy',
        entityType: 'subscription',
        providerName: 'airwallex',
        providerEntityId: 'aw_sub_9',
      });
      const stripe = new MockProvider('stripe');
      const selector = createSelector([stripe]);

      await expect(selector.getSubscription('sub_legacy')).rejects.toBeInstanceOf(ProviderUnavailableError);
      expect(stripe.getSubscription).not.toHaveBeenCalled();
    });

    test('keys the mapping by entity id and stores the provider native id', async () => {
      const xendit = new MockProvider('xendit', {
        capabilities: { supportsInvoices: true },
        extensions: { invoice: invoiceExtension('xendit') },
      });
      const selector = createSelector([new MockProvider('stripe'), xendit]);

      await selector.createInvoice({ customerId: 'cus_1', amount: 150000, currency: 'IDR' });

      await expect(store.getByEntity('inv_1', 'invoice')).resolves.toMatchObject({
        entityId: 'inv_1',
        entityType: 'invoice',
        providerName: 'xendit',
        providerEntityId: 'xendit-inv_1',
      });
    });

    test('records a charge against the provider that processed it', async () => {
      const selector = createSelector([new MockProvider('stripe')]);

      const charge = await selector.charge({
        customerId: 'cus_1',
        amount: 2500,
        currency: 'USD',
        paymentMethod: 'pm_card_visa',
      });

      expect(charge.providerName).toBe('stripe');
      await expect(store.getByEntity(charge.id, 'payment')).resolves.toMatchObject({
        providerName: 'stripe',
        providerEntityId: charge.providerChargeId,
      });
    });
  });

  describe('mapping write failures', () => {
    test('recordEntity logs, counts, alerts and rethrows', async () => {
      const stripe = new MockProvider('stripe');
      const selector = createSelector([stripe]);
      store.failWrites = new Error('connection reset');

      await expect(selector.recordEntity('payout', 'po_1', stripe, 'stripe_po_1')).rejects.toThrow('connection reset');

      expect(metrics.count(MetricNames.MAPPING_WRITE_FAILURES, { entity_type: 'payout', provider: 'stripe' })).toBe(1);
      const [alert] = alerts.ofType('provider_mapping.write_failed');
      expect(alert.severity).toBe('error');
      expect(alert.message).toBe('Could not persist payout po_1 -> stripe: connection reset');
    });

    test('a creating call still returns the entity and the cache keeps it routable', async () => {
      const stripe = new MockProvider('stripe');
      const selector = createSelector([stripe, new MockProvider('xendit')]);
      store.failWrites = new Error('connection reset');

      const dispute = await selector.createDispute({
        paymentId: 'pay_1',
        customerId: 'cus_1',
        amount: 2500,
        currency: 'USD',
        reason: 'fraudulent',
      });
      const fetched = await selector.getDispute(dispute.id);

      expect(fetched.id).toBe(dispute.id);
      expect(stripe.getDispute).toHaveBeenCalledWith(dispute.id, undefined);
      expect(alerts.ofType('provider_mapping.write_failed')).toHaveLength(1);
    });

    test('an alert sink failure does not replace the original error', async () => {
      const stripe = new MockProvider('stripe');
      const selector = createSelector([stripe]);
      store.failWrites = new Error('connection reset');
      alerts.failWith = new Error('pager offline');

      await expect(selector.recordEntity('payment', 'pay_1', stripe, 'ch_1')).rejects.toThrow('connection reset');
    });
  });

  describe('fan-out', () => {
    test('concatenates results and skips a provider that fails', async () => {
      const stripe = new MockProvider('stripe');
      const xendit = new MockProvider('xendit');
      const selector = createSelector([stripe, xendit]);
      await stripe.createSubscription({ customerId: 'cus_1', planId: 'plan_basic' });
      xendit.listSubscriptions.mockRejectedValueOnce(new Error('502 bad gateway'));

      const subscriptions = await selector.listSubscriptions('cus_1');

      expect(subscriptions.map((subscription) => subscription.id)).toEqual(['stripe_sub_1']);
      expect(metrics.count(MetricNames.FANOUT_ERRORS, { operation: 'listSubscriptions', provider: 'xendit' })).toBe(1);
    });

    test('does not query unavailable providers', async () => {
      const stripe = new MockProvider('stripe');
      const xendit = new MockProvider('xendit', { available: false });
      const selector = createSelector([stripe, xendit]);
      await stripe.createDispute({ paymentId: 'pay_1', customerId: 'cus_1', amount: 100, currency: 'USD', reason: 'duplicate' });

      const disputes = await selector.listDisputes('cus_1');

      expect(disputes).toHaveLength(1);
      expect(xendit.listDisputes).not.toHaveBeenCalled();
    });

    test('throws NotFoundError when no provider has anything', async () => {
      const selector = createSelector([new MockProvider('stripe'), new MockProvider('xendit')]);

      await expect(selector.listSubscriptions('cus_nobody')).rejects.toThrow('Subscriptions not found');
    });

    test('only asks providers with the capability and allows empty payment method lists', async () => {
      const stripe = new MockProvider('stripe');
      const selector = createSelector([stripe]);

      await expect(selector.listPaymentMethods('cus_1')).resolves.toEqual([]);
    });
  });

  describe('optional capabilities', () => {
    test('rejects a capability the routed provider lacks', async () => {
      const selector = createSelector([new MockProvider('stripe')]);

      const result = selector.createInvoice({ customerId: 'cus_1', amount: 1000, currency: 'USD' });

      await expect(result).rejects.toBeInstanceOf(NotSupportedError);
      await expect(result).rejects.toThrow('feature not supported by provider: stripe does not support invoice');
    });

    test('requires both the flag and a registered implementation', async () => {
      const flagOnly = new MockProvider('stripe', { capabilities: { supportsPayouts: true } });
      const implOnly = new MockProvider('stripe', { extensions: { invoice: invoiceExtension('stripe') } });

      await expect(createSelector([flagOnly]).createPayout({
        referenceId: 'ref_1',
        amount: 5000,
        currency: 'USD',
        destinationType: 'bank_account',
        destinationAccount: '000123',
      })).rejects.toBeInstanceOf(NotSupportedError);
      await expect(
        createSelector([implOnly]).createInvoice({ customerId: 'cus_1', amount: 1000, currency: 'USD' })
      ).rejects.toBeInstanceOf(NotSupportedError);
    });

    test('routes invoice follow-ups through the mapping', async () => {
      const invoices = invoiceExtension('xendit');
      const xendit = new MockProvider('xendit', { capabilities: { supportsInvoices: true }, extensions: { invoice: invoices } });
      const selector = createSelector([new MockProvider('stripe'), xendit]);

      const invoice = await selector.createInvoice({ customerId: 'cus_1', amount: 150000, currency: 'IDR' });
      selector.clearCache();
      const canceled = await selector.cancelInvoice(invoice.id);

      expect(canceled.status).toBe('canceled');
      expect(invoices.cancelInvoice).toHaveBeenCalledWith('inv_1', undefined);
    });

    test('payment method lookups take the first provider that answers', async () => {
      const stripeMethods = paymentMethodExtension('stripe');
      stripeMethods.getPaymentMethod.mockRejectedValueOnce(new Error('no such payment method'));
      const xenditMethods = paymentMethodExtension('xendit');
      const selector = createSelector([
        new MockProvider('stripe', { extensions: { paymentMethod: stripeMethods } }),
        new MockProvider('xendit', { extensions: { paymentMethod: xenditMethods } }),
      ]);

      const method = await selector.getPaymentMethod('pm_1');

      expect(method.providerName).toBe('xendit');
      expect(stripeMethods.getPaymentMethod).toHaveBeenCalledTimes(1);
    });

    test('payment method lookups rethrow the last error when every provider fails', async () => {
      const stripeMethods = paymentMethodExtension('stripe');
      stripeMethods.detachPaymentMethod.mockRejectedValueOnce(new Error('already detached'));
      const selector = createSelector([new MockProvider('stripe', { extensions: { paymentMethod: stripeMethods } })]);

      await expect(selector.detachPaymentMethod('pm_1')).rejects.toThrow('already detached');
    });

    test('payment method lookups without any capable provider are not supported', async () => {
      const selector = createSelector([new MockProvider('stripe')]);

      await expect(selector.getPaymentMethod('pm_1')).rejects.toThrow(
        'feature not supported by provider: multi-provider does not support paymentMethod'
      );
    });

    test('creates a stored payment method with the requested provider', async () => {
      const xenditMethods = paymentMethodExtension('xendit');
      const selector = createSelector([
        new MockProvider('stripe', { extensions: { paymentMethod: paymentMethodExtension('stripe') } }),
        new MockProvider('xendit', { extensions: { paymentMethod: xenditMethods } }),
      ]);

      const method = await selector.createPaymentMethod({
        provider: 'xendit',
        customerId: 'cus_1',
        paymentMethodId: 'tok_1',
        type: 'ewallet',
      });

      expect(method.providerName).toBe('xendit');
      expect(xenditMethods.createPaymentMethod).toHaveBeenCalledTimes(1);
    });
  });

  test('reports provider statistics', async () => {
    const selector = createSelector([new MockProvider('stripe'), new MockProvider('xendit', { available: false })]);
    await selector.createSubscription({ customerId: 'cus_1', planId: 'plan_basic' });

    const stats = await selector.getProviderStats();

    expect(stats.totalProviders).toBe(2);
    expect(stats.cachedMappings.subscription).toBe(1);
    expect(stats.cachedMappings.payment).toBe(0);
    expect(stats.providerAvailability).toEqual({ stripe: true, xendit: false });
  });

  test('rejects lookups of unknown entities with NotFoundError', async () => {
    const selector = createSelector([new MockProvider('stripe')]);

    await expect(selector.getPayout('po_missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});
