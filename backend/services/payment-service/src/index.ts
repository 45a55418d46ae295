/**
 * @paymesh/payment-service
 *
 * Multi-provider payment orchestration: currency routing across providers,
 * durable entity-to-provider mappings, idempotent charges with compensation,
 * refunds, and capability-gated provider features.
 */

export * from './types';
export * from './errors';
export * from './providers';
export * from './repositories';

export {
  PaymentService,
  COMPENSATION_REFUND_REASON,
  buildChargeResponse,
  buildRefundResponse,
} from './services/payment.service';
export type { PaymentServiceOptions, PaymentServiceRetryPolicy } from './services/payment.service';

export {
  AlertingService,
  AlertChannel,
  AlertSeverity,
  alertCompensationFailed,
  alertRefundNotRecorded,
  alertMappingWriteFailed,
  alertCircuitStateChanged,
} from './services/alerting.service';
export type { Alert, AlertSink, AlertConfig, AlertingServiceOptions } from './services/alerting.service';

export { MetricNames, PrometheusMetricsSink, NoopMetricsSink } from './services/metrics.service';
export type { MetricLabels, MetricsSink } from './services/metrics.service';

export { createPaymentOrchestrator, orderProviders } from './orchestrator';
export type { PaymentOrchestrator, PaymentOrchestratorOptions, HealthStatus } from './orchestrator';

export { validateConfig, getConfig, getAppConfig, buildAppConfig, resetConfig, KNOWN_PROVIDERS } from './config';
export type { AppConfig, DatabaseConfig, EnvConfig } from './config';
export { createKnex, migrateLatest, migrationSource, closeDatabase } from './config/database';

export { logger } from './utils/logger';
