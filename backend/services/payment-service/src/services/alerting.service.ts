/**
 * Alerting Service for Orchestration Failures
 *
 * Raises operator alerts for events that need a human:
 * - Compensating refunds that failed (money moved, no local record)
 * - Provider mappings that could not be persisted
 * - Circuit breakers opening and closing
 */

import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { logger, Logger } from '../utils/logger';
import { MetricNames, MetricsSink, NoopMetricsSink } from './metrics.service';

// =============================================================================
// TYPES
// =============================================================================

export enum AlertSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

export enum AlertChannel {
  LOG = 'log',
  WEBHOOK = 'webhook',
}

export interface Alert {
  id: string;
  type: string;
  severity: AlertSeverity;
  title: string;
  message: string;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Receiver for operator alerts. Injected, never global.
 */
export interface AlertSink {
  sendAlert(alert: Alert): Promise<void>;
}

export interface AlertConfig {
  channels: AlertChannel[];
  webhookUrl?: string;
  webhookTimeoutMs: number;
}

export interface AlertingServiceOptions extends Partial<AlertConfig> {
  logger?: Logger;
  metrics?: MetricsSink;
  httpClient?: AxiosInstance;
}

// =============================================================================
// ALERT SERVICE
// =============================================================================

export class AlertingService implements AlertSink {
  private readonly config: AlertConfig;
  private readonly log: Logger;
  private readonly metrics: MetricsSink;
  private readonly httpClient: AxiosInstance;

  // In-memory counters for rate limiting alerts
  private alertCounts: Map<string, { count: number; windowStart: number }> = new Map();
  static readonly ALERT_WINDOW_MS = 5 * 60 * 1000; // 5 minutes
  static readonly MAX_ALERTS_PER_WINDOW = 10;

  constructor(options: AlertingServiceOptions = {}) {
    this.config = {
      channels: options.channels && options.channels.length > 0 ? options.channels : [AlertChannel.LOG],
      webhookUrl: options.webhookUrl,
      webhookTimeoutMs: options.webhookTimeoutMs ?? 5000,
    };
    this.log = options.logger ?? logger.child({ component: 'AlertingService' });
    this.metrics = options.metrics ?? new NoopMetricsSink();
    this.httpClient = options.httpClient ?? axios.create({ timeout: this.config.webhookTimeoutMs });
  }

  /**
   * Send an alert to every configured channel. Channel failures are logged, not thrown.
   * Critical alerts are never rate limited.
   */
  async sendAlert(alert: Alert): Promise<void> {
    if (alert.severity !== AlertSeverity.CRITICAL && !this.shouldSendAlert(alert.type)) {
      this.log.debug({ type: alert.type }, 'Alert rate limited');
      return;
    }

    this.metrics.increment(MetricNames.ALERTS_SENT, {
      type: alert.type,
      severity: alert.severity,
    });

    const deliveries: Promise<void>[] = [];

    for (const channel of this.config.channels) {
      switch (channel) {
        case AlertChannel.LOG:
          this.sendLogAlert(alert);
          break;
        case AlertChannel.WEBHOOK:
          if (this.config.webhookUrl) {
            deliveries.push(this.sendWebhookAlert(alert, this.config.webhookUrl));
          }
          break;
      }
    }

    await Promise.all(deliveries);
  }

  /**
   * At most MAX_ALERTS_PER_WINDOW alerts of one type per window
   */
  private shouldSendAlert(alertType: string): boolean {
    const now = Date.now();
    const existing = this.alertCounts.get(alertType);

    if (!existing || now - existing.windowStart > AlertingService.ALERT_WINDOW_MS) {
      this.alertCounts.set(alertType, { count: 1, windowStart: now });
      return true;
    }

    if (existing.count >= AlertingService.MAX_ALERTS_PER_WINDOW) {
      return false;
    }

    existing.count++;
    return true;
  }

  private sendLogAlert(alert: Alert): void {
    const context = {
      alertId: alert.id,
      type: alert.type,
      severity: alert.severity,
      metadata: alert.metadata,
    };
    const message = `[ALERT] ${alert.title}: ${alert.message}`;

    switch (alert.severity) {
      case AlertSeverity.CRITICAL:
        this.log.fatal(context, message);
        break;
      case AlertSeverity.ERROR:
        this.log.error(context, message);
        break;
      case AlertSeverity.WARNING:
        this.log.warn(context, message);
        break;
      default:
        this.log.info(context, message);
    }
  }

  private async sendWebhookAlert(alert: Alert, url: string): Promise<void> {
    try {
      await this.httpClient.post(url, {
        ...alert,
        timestamp: alert.timestamp.toISOString(),
      });
    } catch (error) {
      this.log.error({ error, alertId: alert.id }, 'Failed to send webhook alert');
    }
  }
}

// =============================================================================
// ORCHESTRATION ALERTS
// =============================================================================

/**
 * A charge succeeded, persisting it failed, and the compensating refund failed
 * too. The customer has been charged with no local record.
 */
export async function alertCompensationFailed(
  sink: AlertSink,
  params: {
    provider: string;
    providerChargeId: string;
    amount: number;
    currency: string;
    customerId: string;
    error: string;
  }
): Promise<void> {
  await sink.sendAlert({
    id: uuidv4(),
    type: 'payment.compensation_failed',
    severity: AlertSeverity.CRITICAL,
    title: 'Compensating Refund Failed',
    message: `Charge ${params.providerChargeId} on ${params.provider} was not persisted and could not be refunded: ${params.error}`,
    metadata: {
      ...params,
      action: 'Refund the charge manually with the provider',
    },
    timestamp: new Date(),
  });
}

/**
 * The provider refunded the payment but the refund could not be recorded.
 * The payment stays claimed so it cannot be refunded a second time.
 */
export async function alertRefundNotRecorded(
  sink: AlertSink,
  params: {
    provider: string;
    paymentId: string;
    providerRefundId: string;
    amount: number;
    currency: string;
    error: string;
  }
): Promise<void> {
  await sink.sendAlert({
    id: uuidv4(),
    type: 'refund.persistence_failed',
    severity: AlertSeverity.CRITICAL,
    title: 'Refund Not Recorded',
    message: `Refund ${params.providerRefundId} on ${params.provider} for payment ${params.paymentId} was issued but not recorded: ${params.error}`,
    metadata: {
      ...params,
      action: 'Record the refund and mark the payment refunded manually',
    },
    timestamp: new Date(),
  });
}

export async function alertMappingWriteFailed(
  sink: AlertSink,
  params: {
    entityType: string;
    entityId: string;
    provider: string;
    error: string;
  }
): Promise<void> {
  await sink.sendAlert({
    id: uuidv4(),
    type: 'provider_mapping.write_failed',
    severity: AlertSeverity.ERROR,
    title: 'Provider Mapping Not Persisted',
    message: `Could not persist ${params.entityType} ${params.entityId} -> ${params.provider}: ${params.error}`,
    metadata: params,
    timestamp: new Date(),
  });
}

export async function alertCircuitStateChanged(
  sink: AlertSink,
  params: {
    circuit: string;
    from: string;
    to: string;
  }
): Promise<void> {
  await sink.sendAlert({
    id: uuidv4(),
    type: 'circuit_breaker.state_changed',
    severity: params.to === 'OPEN' ? AlertSeverity.WARNING : AlertSeverity.INFO,
    title: 'Circuit Breaker State Changed',
    message: `Circuit ${params.circuit} moved from ${params.from} to ${params.to}`,
    metadata: params,
    timestamp: new Date(),
  });
}
