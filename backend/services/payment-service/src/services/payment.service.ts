/**
 * Payment Service
 *
 * Idempotent, transactionally consistent charges and refunds on top of the
 * multi-provider selector.
 *
 * A charge is sent to the provider inside a repository transaction and the
 * payment row is written in the same transaction. If the provider accepted
 * the charge but the row could not be committed, a compensating refund is
 * started in the background and the caller gets a PersistenceError. A row
 * that lost the idempotency key race to the same provider charge is not
 * compensated: the winner's row is returned.
 *
 * A refund first claims the payment (succeeded -> processing) so only one
 * refund reaches the provider per payment.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CircuitBreakerRegistry,
  CircuitOpenError,
  RetryOptions,
  RetryPresets,
  withRetry,
} from '@paymesh/shared';
import {
  ConflictError,
  FieldError,
  NotFoundError,
  PersistenceError,
  ProviderError,
  ProviderUnavailableError,
  ValidationError,
  toError,
} from '../errors';
import { MultiProviderSelector } from '../providers/multi-provider-selector';
import { PaymentProvider } from '../providers/provider.interface';
import { PaymentRepository } from '../repositories/payment.repository';
import {
  CaptureMethod,
  ChargeRequest,
  ChargeResponse,
  Payment,
  PaymentStatus,
  Refund,
  RefundRequest,
  RefundResponse,
} from '../types';
import { logger, Logger } from '../utils/logger';
import { AlertSink, alertCompensationFailed, alertRefundNotRecorded } from './alerting.service';
import { MetricNames, MetricsSink, NoopMetricsSink } from './metrics.service';

export const COMPENSATION_REFUND_REASON = 'Transaction rollback due to persistence failure';

export interface PaymentServiceRetryPolicy {
  charge: RetryOptions;
  refund: RetryOptions;
  capture: RetryOptions;
}

export interface PaymentServiceOptions {
  selector: MultiProviderSelector;
  repository: PaymentRepository;
  breakers: CircuitBreakerRegistry;
  alerts: AlertSink;
  metrics?: MetricsSink;
  logger?: Logger;
  retry?: Partial<PaymentServiceRetryPolicy>;
  compensationTimeoutMs?: number;
  generateIdempotencyKey?: () => string;
}

export class PaymentService {
  private readonly selector: MultiProviderSelector;
  private readonly repository: PaymentRepository;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly alerts: AlertSink;
  private readonly metrics: MetricsSink;
  private readonly log: Logger;
  private readonly retry: PaymentServiceRetryPolicy;
  private readonly compensationTimeoutMs: number;
  private readonly generateIdempotencyKey: () => string;

  private readonly pendingCompensations = new Set<Promise<void>>();

  constructor(options: PaymentServiceOptions) {
    this.selector = options.selector;
    this.repository = options.repository;
    this.breakers = options.breakers;
    this.alerts = options.alerts;
    this.metrics = options.metrics ?? new NoopMetricsSink();
    this.log = options.logger ?? logger.child({ component: 'PaymentService' });
    this.retry = {
      charge: options.retry?.charge ?? RetryPresets.aggressive,
      refund: options.retry?.refund ?? RetryPresets.refund,
      capture: options.retry?.capture ?? RetryPresets.standard,
    };
    this.compensationTimeoutMs = options.compensationTimeoutMs ?? 30000;
    this.generateIdempotencyKey = options.generateIdempotencyKey ?? uuidv4;
  }

  // ===========================================================================
  // CHARGES
  // ===========================================================================

  async createCharge(req: ChargeRequest, signal?: AbortSignal): Promise<ChargeResponse> {
    const startTime = Date.now();
    validateChargeRequest(req);

    const attemptKey = this.generateIdempotencyKey();

    if (req.idempotencyKey) {
      const existing = await this.repository.findByIdempotencyKey(req.idempotencyKey);
      if (existing) {
        this.log.info(
          { paymentId: existing.id, idempotencyKey: req.idempotencyKey },
          'Returning existing payment for idempotency key'
        );
        return buildChargeResponse(existing);
      }
    }

    const provider = await this.selector.selectProviderByCurrency(req.currency, signal);
    const providerName = provider.name();
    const idempotencyKey = req.idempotencyKey || attemptKey;

    let charged: ChargeResponse | undefined;
    let payment: Payment;

    try {
      payment = await this.repository.withTransaction(async (tx) => {
        try {
          charged = await this.callProvider(
            provider,
            'charge',
            this.retry.charge,
            () => provider.charge({ ...req, idempotencyKey }, signal),
            signal
          );
        } catch (error) {
          this.metrics.increment(MetricNames.CHARGES_TOTAL, { provider: providerName, status: 'provider_error' });
          throw new ProviderError({
            provider: providerName,
            operation: 'charge',
            cause: error,
            retryable: error instanceof CircuitOpenError,
          });
        }

        return tx.create({
          customerId: req.customerId,
          amount: req.amount,
          currency: req.currency,
          status: charged.status,
          paymentMethod: req.paymentMethod,
          description: req.description ?? '',
          providerName,
          providerChargeId: charged.providerChargeId || charged.id,
          captureMethod: charged.captureMethod ?? req.captureMethod ?? CaptureMethod.AUTOMATIC,
          capturedAmount: capturedAmountOf(charged, req.amount),
          idempotencyKey,
          metadata: req.metadata ?? {},
        });
      });
    } catch (error) {
      if (error instanceof ProviderError || charged === undefined) {
        throw error;
      }
      const accepted: ChargeResponse = charged;
      const providerChargeId = accepted.providerChargeId || accepted.id;

      if (error instanceof ConflictError) {
        // the provider replays a repeated key, so a concurrent request may have stored this very charge
        const existing = await this.repository.findByIdempotencyKey(idempotencyKey);
        if (existing && existing.providerName === providerName && existing.providerChargeId === providerChargeId) {
          this.log.info(
            { paymentId: existing.id, idempotencyKey, providerChargeId },
            'Charge already stored by a concurrent request with the same idempotency key'
          );
          return buildChargeResponse(existing);
        }
      }

      this.metrics.increment(MetricNames.CHARGES_TOTAL, { provider: providerName, status: 'persistence_error' });
      this.log.error(
        {
          provider: providerName,
          providerChargeId,
          amount: req.amount,
          currency: req.currency,
          error: toError(error).message,
        },
        'Charge succeeded but could not be persisted, starting compensation'
      );
      this.startCompensation(provider, accepted, req);
      throw new PersistenceError('store payment', error);
    }

    try {
      await this.selector.recordEntity('payment', payment.id, provider, payment.providerChargeId);
    } catch (error) {
      // recordEntity already logged and alerted; the payment row still names its provider
      this.log.warn({ paymentId: payment.id, error: toError(error).message }, 'Charge completed without a provider mapping');
    }

    this.metrics.increment(MetricNames.CHARGES_TOTAL, { provider: providerName, status: payment.status });
    this.metrics.observe(MetricNames.OPERATION_DURATION, (Date.now() - startTime) / 1000, {
      operation: 'charge',
      provider: providerName,
    });
    this.log.info(
      { paymentId: payment.id, provider: providerName, amount: payment.amount, currency: payment.currency },
      'Charge created'
    );

    return buildChargeResponse(payment);
  }

  /**
   * Resolves once every compensating refund started so far has settled
   */
  async drainCompensations(): Promise<void> {
    while (this.pendingCompensations.size > 0) {
      await Promise.all(Array.from(this.pendingCompensations));
    }
  }

  get pendingCompensationCount(): number {
    return this.pendingCompensations.size;
  }

  private startCompensation(provider: PaymentProvider, charged: ChargeResponse, req: ChargeRequest): void {
    const task = this.compensate(provider, charged, req).finally(() => {
      this.pendingCompensations.delete(task);
    });
    this.pendingCompensations.add(task);
  }

  /**
   * One refund attempt, bounded by compensationTimeoutMs. Never rejects.
   */
  private async compensate(provider: PaymentProvider, charged: ChargeResponse, req: ChargeRequest): Promise<void> {
    const providerName = provider.name();
    const providerChargeId = charged.providerChargeId || charged.id;
    const log = this.log.child({ operation: 'compensation', provider: providerName, providerChargeId });
    const timeout = AbortSignal.timeout(this.compensationTimeoutMs);

    try {
      await this.breakers
        .forOperation(providerName, 'refund')
        .execute(
          () =>
            provider.refund(
              {
                paymentId: providerChargeId,
                amount: req.amount,
                currency: req.currency,
                reason: COMPENSATION_REFUND_REASON,
              },
              timeout
            ),
          timeout
        );

      this.metrics.increment(MetricNames.COMPENSATIONS_TOTAL, { provider: providerName, outcome: 'refunded' });
      log.warn({ amount: req.amount, currency: req.currency }, 'Compensating refund issued for unpersisted charge');
    } catch (error) {
      const cause = toError(error);
      this.metrics.increment(MetricNames.COMPENSATIONS_TOTAL, { provider: providerName, outcome: 'failed' });
      this.metrics.increment(MetricNames.CLEANUP_ERRORS, { provider: providerName });
      log.fatal(
        { amount: req.amount, currency: req.currency, customerId: req.customerId, error: cause.message },
        'Compensating refund failed, charge is neither recorded nor reversed'
      );

      try {
        await alertCompensationFailed(this.alerts, {
          provider: providerName,
          providerChargeId,
          amount: req.amount,
          currency: req.currency,
          customerId: req.customerId,
          error: cause.message,
        });
      } catch (alertError) {
        log.error({ error: toError(alertError).message }, 'Failed to raise compensation alert');
      }
    }
  }

  // ===========================================================================
  // REFUNDS
  // ===========================================================================

  async createRefund(req: RefundRequest, signal?: AbortSignal): Promise<RefundResponse> {
    const startTime = Date.now();
    validateRefundRequest(req);

    const payment = await this.getPayment(req.paymentId);

    if (payment.status !== PaymentStatus.SUCCEEDED) {
      throw new ConflictError(`payment ${payment.id} cannot be refunded in status ${payment.status}`);
    }
    if (req.amount > payment.amount) {
      throw new ValidationError(`refund amount ${req.amount} exceeds payment amount ${payment.amount}`, [
        { field: 'amount', message: `must not exceed ${payment.amount}` },
      ]);
    }
    if (req.currency && req.currency.toUpperCase() !== payment.currency.toUpperCase()) {
      throw new ValidationError(`refund currency ${req.currency} does not match payment currency ${payment.currency}`, [
        { field: 'currency', message: `must be ${payment.currency}` },
      ]);
    }

    const provider = await this.resolvePaymentProvider(payment);
    const providerName = provider.name();

    await this.claimForRefund(payment.id);

    let refunded: RefundResponse;
    try {
      refunded = await this.callProvider(
        provider,
        'refund',
        this.retry.refund,
        () =>
          provider.refund(
            {
              paymentId: payment.providerChargeId,
              amount: req.amount,
              currency: payment.currency,
              reason: req.reason,
              metadata: req.metadata,
            },
            signal
          ),
        signal
      );
    } catch (error) {
      this.metrics.increment(MetricNames.REFUNDS_TOTAL, { provider: providerName, status: 'provider_error' });
      await this.releaseRefundClaim(payment.id);
      throw new ProviderError({
        provider: providerName,
        operation: 'refund',
        cause: error,
        retryable: error instanceof CircuitOpenError,
      });
    }

    const providerRefundId = refunded.providerRefundId || refunded.id;
    let refund: Refund;
    try {
      refund = await this.repository.withTransaction(async (tx) => {
        const settled = await tx.transitionStatus(payment.id, PaymentStatus.PROCESSING, PaymentStatus.REFUNDED);
        if (!settled) {
          throw new ConflictError(`payment ${payment.id} is no longer claimed for refund`);
        }
        return tx.createRefund({
          paymentId: payment.id,
          amount: req.amount,
          reason: req.reason ?? '',
          status: 'succeeded',
          providerName,
          providerRefundId,
          metadata: req.metadata ?? {},
        });
      });
    } catch (error) {
      const cause = toError(error);
      this.metrics.increment(MetricNames.REFUNDS_TOTAL, { provider: providerName, status: 'persistence_error' });
      this.log.fatal(
        { paymentId: payment.id, provider: providerName, providerRefundId, amount: req.amount, error: cause.message },
        'Refund issued by provider but could not be persisted, payment left in processing'
      );

      try {
        await alertRefundNotRecorded(this.alerts, {
          provider: providerName,
          paymentId: payment.id,
          providerRefundId,
          amount: req.amount,
          currency: payment.currency,
          error: cause.message,
        });
      } catch (alertError) {
        this.log.error({ paymentId: payment.id, error: toError(alertError).message }, 'Failed to raise refund alert');
      }
      throw new PersistenceError('store refund', error);
    }

    this.metrics.increment(MetricNames.REFUNDS_TOTAL, { provider: providerName, status: refund.status });
    this.metrics.observe(MetricNames.OPERATION_DURATION, (Date.now() - startTime) / 1000, {
      operation: 'refund',
      provider: providerName,
    });
    this.log.info({ paymentId: payment.id, refundId: refund.id, amount: refund.amount }, 'Refund created');

    return buildRefundResponse(refund, payment.currency);
  }

  // ===========================================================================
  // PAYMENT LIFECYCLE
  // ===========================================================================

  /**
   * @throws NotFoundError
   */
  async getPayment(paymentId: string): Promise<Payment> {
    const payment = await this.repository.getById(paymentId);
    if (!payment) {
      throw new NotFoundError('Payment', paymentId);
    }
    return payment;
  }

  /**
   * Capture an authorized (requires_capture) payment, fully or partially
   */
  async capturePayment(paymentId: string, amount?: number, signal?: AbortSignal): Promise<Payment> {
    const payment = await this.getPayment(paymentId);
    assertAwaitingCapture(payment, 'captured');

    if (amount !== undefined && (!Number.isInteger(amount) || amount <= 0 || amount > payment.amount)) {
      throw new ValidationError('invalid capture amount', [
        { field: 'amount', message: `must be a positive integer no greater than ${payment.amount}` },
      ]);
    }

    const provider = await this.resolvePaymentProvider(payment);
    const capturer = this.selector.capabilityRegistry.require(provider.name(), 'capture');

    try {
      await this.callProvider(
        provider,
        'capture',
        this.retry.capture,
        () => capturer.capturePayment(payment.providerChargeId, amount, signal),
        signal
      );
    } catch (error) {
      throw new ProviderError({ provider: provider.name(), operation: 'capture', cause: error });
    }

    const updated = await this.persistStatus(payment, {
      status: PaymentStatus.SUCCEEDED,
      capturedAmount: amount ?? payment.amount,
    });
    this.log.info({ paymentId, capturedAmount: updated.capturedAmount }, 'Payment captured');
    return updated;
  }

  /**
   * Release an authorization that was never captured
   */
  async voidPayment(paymentId: string, signal?: AbortSignal): Promise<Payment> {
    const payment = await this.getPayment(paymentId);
    assertAwaitingCapture(payment, 'voided');

    const provider = await this.resolvePaymentProvider(payment);
    const voider = this.selector.capabilityRegistry.require(provider.name(), 'void');

    try {
      await this.callProvider(
        provider,
        'void',
        this.retry.capture,
        () => voider.voidPayment(payment.providerChargeId, signal),
        signal
      );
    } catch (error) {
      throw new ProviderError({ provider: provider.name(), operation: 'void', cause: error });
    }

    const updated = await this.persistStatus(payment, { status: PaymentStatus.CANCELED });
    this.log.info({ paymentId }, 'Payment voided');
    return updated;
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  /**
   * The provider that owns a payment: its durable mapping, or when the
   * mapping was never written, the provider recorded on the payment itself
   */
  private async resolvePaymentProvider(payment: Payment): Promise<PaymentProvider> {
    try {
      return await this.selector.resolveEntityProvider('payment', payment.id);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
    }

    const provider = this.selector.getProvider(payment.providerName);
    if (!provider) {
      throw new ProviderUnavailableError(payment.providerName);
    }
    this.log.warn(
      { paymentId: payment.id, provider: payment.providerName },
      'No provider mapping for payment, using the provider recorded on it'
    );
    return provider;
  }

  /**
   * Provider call guarded by the provider:operation breaker and retried.
   * An open circuit is never retried.
   */
  private callProvider<T>(
    provider: PaymentProvider,
    operation: string,
    policy: RetryOptions,
    call: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const breaker = this.breakers.forOperation(provider.name(), operation);
    const isRetryable = policy.isRetryable;

    return withRetry(() => breaker.execute(call, signal), {
      ...policy,
      signal,
      isRetryable: (error, attempt) =>
        !(error instanceof CircuitOpenError) && (isRetryable ? isRetryable(error, attempt) : true),
      onRetry: (error, attempt, delay) => {
        this.log.warn(
          { provider: provider.name(), operation, attempt, delay, error: toError(error).message },
          'Provider call failed, retrying'
        );
      },
    });
  }

  /**
   * @throws ConflictError when the payment is no longer succeeded, e.g. a
   * concurrent refund claimed it first
   */
  private async claimForRefund(paymentId: string): Promise<void> {
    let claimed: Payment | null;
    try {
      claimed = await this.repository.transitionStatus(paymentId, PaymentStatus.SUCCEEDED, PaymentStatus.PROCESSING);
    } catch (error) {
      throw new PersistenceError('claim payment for refund', error);
    }
    if (!claimed) {
      throw new ConflictError(`payment ${paymentId} is already being refunded or is no longer refundable`);
    }
  }

  /**
   * Hands a claimed payment back after the provider refused the refund
   */
  private async releaseRefundClaim(paymentId: string): Promise<void> {
    try {
      const released = await this.repository.transitionStatus(
        paymentId,
        PaymentStatus.PROCESSING,
        PaymentStatus.SUCCEEDED
      );
      if (!released) {
        this.log.warn({ paymentId }, 'Refund claim was already released');
      }
    } catch (error) {
      this.log.error(
        { paymentId, error: toError(error).message },
        'Failed to release refund claim, payment left in processing'
      );
    }
  }

  private async persistStatus(
    payment: Payment,
    changes: Pick<Payment, 'status'> & Partial<Pick<Payment, 'capturedAmount'>>
  ): Promise<Payment> {
    try {
      return await this.repository.update({ ...payment, ...changes });
    } catch (error) {
      this.log.error(
        { paymentId: payment.id, status: changes.status, error: toError(error).message },
        'Provider accepted the change but the payment could not be updated'
      );
      throw new PersistenceError('update payment', error);
    }
  }
}

// =============================================================================
// VALIDATION & MAPPING
// =============================================================================

function validateChargeRequest(req: ChargeRequest): void {
  const errors: FieldError[] = [];

  if (!Number.isInteger(req.amount) || req.amount <= 0) {
    errors.push({ field: 'amount', message: 'must be a positive integer in minor units' });
  }
  if (!req.currency || !req.currency.trim()) {
    errors.push({ field: 'currency', message: 'is required' });
  }
  if (!req.paymentMethod || !req.paymentMethod.trim()) {
    errors.push({ field: 'paymentMethod', message: 'is required' });
  }
  if (!req.customerId || !req.customerId.trim()) {
    errors.push({ field: 'customerId', message: 'is required' });
  }

  if (errors.length > 0) {
    throw new ValidationError('invalid charge request', errors);
  }
}

function validateRefundRequest(req: RefundRequest): void {
  const errors: FieldError[] = [];

  if (!Number.isInteger(req.amount) || req.amount <= 0) {
    errors.push({ field: 'amount', message: 'must be a positive integer in minor units' });
  }
  if (!req.paymentId || !req.paymentId.trim()) {
    errors.push({ field: 'paymentId', message: 'is required' });
  }

  if (errors.length > 0) {
    throw new ValidationError('invalid refund request', errors);
  }
}

function assertAwaitingCapture(payment: Payment, action: string): void {
  if (payment.status !== PaymentStatus.REQUIRES_CAPTURE) {
    throw new ConflictError(`payment ${payment.id} cannot be ${action} in status ${payment.status}`);
  }
}

function capturedAmountOf(charged: ChargeResponse, requested: number): number {
  if (charged.capturedAmount !== undefined) {
    return charged.capturedAmount;
  }
  return charged.status === PaymentStatus.SUCCEEDED ? requested : 0;
}

export function buildChargeResponse(payment: Payment): ChargeResponse {
  return {
    id: payment.id,
    customerId: payment.customerId,
    amount: payment.amount,
    currency: payment.currency,
    status: payment.status,
    paymentMethod: payment.paymentMethod,
    description: payment.description,
    providerName: payment.providerName,
    providerChargeId: payment.providerChargeId,
    captureMethod: payment.captureMethod,
    capturedAmount: payment.capturedAmount,
    metadata: payment.metadata,
    createdAt: payment.createdAt,
  };
}

export function buildRefundResponse(refund: Refund, currency: string): RefundResponse {
  return {
    id: refund.id,
    paymentId: refund.paymentId,
    amount: refund.amount,
    currency,
    status: refund.status,
    reason: refund.reason,
    providerName: refund.providerName,
    providerRefundId: refund.providerRefundId,
    metadata: refund.metadata,
    createdAt: refund.createdAt,
  };
}
