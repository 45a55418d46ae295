import { Knex } from 'knex';
import {
  CircuitBreakerRegistry,
  CircuitBreakerStats,
  CircuitState,
  WebhookSignatureVerifier,
} from '@paymesh/shared';
import { AppConfig, getAppConfig } from './config';
import { closeDatabase, createKnex, getPool, migrateLatest, query } from './config/database';
import { ConfigurationError, toError } from './errors';
import { MultiProviderSelector } from './providers/multi-provider-selector';
import { PaymentProvider } from './providers/provider.interface';
import { KnexPaymentRepository, PaymentRepository } from './repositories/payment.repository';
import { KnexProviderMappingStore, ProviderMappingStore } from './repositories/provider-mapping.store';
import { AlertChannel, AlertSink, AlertingService, alertCircuitStateChanged } from './services/alerting.service';
import { MetricNames, MetricsSink, NoopMetricsSink } from './services/metrics.service';
import { PaymentService, PaymentServiceRetryPolicy } from './services/payment.service';
import { createContextLogger, Logger } from './utils/logger';

export interface PaymentOrchestratorOptions {
  /** Every provider implementation available to this process; PROVIDER_ORDER picks and orders them */
  providers: readonly PaymentProvider[];
  config?: AppConfig;
  mappingStore?: ProviderMappingStore;
  paymentRepository?: PaymentRepository;
  metrics?: MetricsSink;
  alerts?: AlertSink;
  logger?: Logger;
  retry?: Partial<PaymentServiceRetryPolicy>;
  /** Replaces the default `SELECT 1` against the pg pool */
  databaseProbe?: () => Promise<void>;
}

export interface HealthStatus {
  healthy: boolean;
  database: boolean;
  providers: Record<string, boolean>;
  circuits: CircuitBreakerStats[];
}

export interface PaymentOrchestrator {
  readonly selector: MultiProviderSelector;
  readonly payments: PaymentService;
  readonly breakers: CircuitBreakerRegistry;
  readonly webhooks: WebhookSignatureVerifier;
  healthCheck(signal?: AbortSignal): Promise<HealthStatus>;
  /** Applies pending schema migrations through the knex connection */
  migrate(): Promise<void>;
  /** Waits for pending compensations, then releases database connections */
  close(): Promise<void>;
}

/**
 * Providers named in PROVIDER_ORDER, in that order
 */
export function orderProviders(
  providers: readonly PaymentProvider[],
  order: readonly string[],
  log?: Logger
): PaymentProvider[] {
  const byName = new Map(providers.map((provider) => [provider.name(), provider]));
  const ordered: PaymentProvider[] = [];

  for (const name of order) {
    const provider = byName.get(name);
    if (provider) {
      ordered.push(provider);
    } else {
      log?.warn({ provider: name }, 'Provider listed in PROVIDER_ORDER has no implementation');
    }
  }

  for (const name of byName.keys()) {
    if (!order.includes(name)) {
      log?.info({ provider: name }, 'Provider not listed in PROVIDER_ORDER, disabled');
    }
  }

  return ordered;
}

export function createPaymentOrchestrator(options: PaymentOrchestratorOptions): PaymentOrchestrator {
  const config = options.config ?? getAppConfig();
  const log = options.logger ?? createContextLogger({ component: 'PaymentOrchestrator' });
  const metrics = options.metrics ?? new NoopMetricsSink();
  const alerts =
    options.alerts ??
    new AlertingService({
      channels: config.alerting.channels.map((channel) =>
        channel === 'webhook' ? AlertChannel.WEBHOOK : AlertChannel.LOG
      ),
      webhookUrl: config.alerting.webhookUrl,
      metrics,
    });

  const providers = orderProviders(options.providers, config.providers.order, log);
  if (providers.length === 0) {
    throw new ConfigurationError('no payment provider enabled', [
      { field: 'PROVIDER_ORDER', message: 'must name at least one configured provider' },
    ]);
  }

  let db: Knex | undefined;
  const knexInstance = (): Knex => {
    if (!db) {
      db = createKnex(config.database);
    }
    return db;
  };

  const breakerLog = log.child({ component: 'CircuitBreakers' });
  const breakers = new CircuitBreakerRegistry({
    maxFailures: config.circuitBreaker.maxFailures,
    timeout: config.circuitBreaker.timeout,
    halfOpenMax: config.circuitBreaker.halfOpenMax,
    onStateChange: (circuit, from, to) => {
      const entry = { circuit, from, to };
      if (to === CircuitState.OPEN) {
        breakerLog.warn(entry, 'Circuit breaker opened');
      } else {
        breakerLog.info(entry, 'Circuit breaker state changed');
      }
      metrics.increment(MetricNames.CIRCUIT_STATE_CHANGES, { circuit, to });
      alertCircuitStateChanged(alerts, entry).catch((error: unknown) => {
        breakerLog.error({ circuit, error: toError(error).message }, 'Failed to raise circuit breaker alert');
      });
    },
  });

  const selector = new MultiProviderSelector({
    providers,
    mappingStore: options.mappingStore ?? new KnexProviderMappingStore(knexInstance()),
    availabilityTimeoutMs: config.providers.availabilityTimeoutMs,
    logger: log.child({ component: 'MultiProviderSelector' }),
    metrics,
    alerts,
  });

  const payments = new PaymentService({
    selector,
    repository: options.paymentRepository ?? new KnexPaymentRepository(knexInstance()),
    breakers,
    alerts,
    metrics,
    logger: log.child({ component: 'PaymentService' }),
    retry: options.retry,
    compensationTimeoutMs: config.compensation.timeoutMs,
  });

  const webhooks = new WebhookSignatureVerifier(config.providers.webhookSecrets);

  const databaseProbe =
    options.databaseProbe ??
    (async (): Promise<void> => {
      await query('SELECT 1', [], getPool(config.database));
    });

  log.info(
    {
      providers: providers.map((provider) => provider.name()),
      webhookProviders: providers.map((provider) => provider.name()).filter((name) => webhooks.hasSecret(name)),
    },
    'Payment orchestrator initialized'
  );

  return {
    selector,
    payments,
    breakers,
    webhooks,

    async healthCheck(signal?: AbortSignal): Promise<HealthStatus> {
      let database = true;
      try {
        await databaseProbe();
      } catch (error) {
        database = false;
        log.error({ error: toError(error).message }, 'Database health check failed');
      }

      const { providerAvailability } = await selector.getProviderStats(signal);
      const anyProvider = Object.values(providerAvailability).some(Boolean);

      return {
        healthy: database && anyProvider,
        database,
        providers: providerAvailability,
        circuits: breakers.getAllStats(),
      };
    },

    async migrate(): Promise<void> {
      await migrateLatest(knexInstance());
    },

    async close(): Promise<void> {
      await payments.drainCompensations();
      if (db) {
        await db.destroy();
        db = undefined;
      }
      await closeDatabase();
      log.info('Payment orchestrator closed');
    },
  };
}
