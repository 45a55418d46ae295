import { buildAppConfig, validateConfig } from '../../../src/config';
import { ConfigurationError } from '../../../src/errors';

describe('validateConfig', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function issuesOf(env: NodeJS.ProcessEnv): unknown {
    try {
      validateConfig(env);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return error.issues;
      }
      throw error;
    }
    throw new Error('expected ConfigurationError');
  }

  test('applies defaults to an empty environment', () => {
    const cfg = validateConfig({});

    expect(cfg.NODE_ENV).toBe('development');
    expect(cfg.PROVIDER_ORDER).toEqual(['stripe', 'xendit', 'razorpay', 'airwallex']);
    expect(cfg.PROVIDER_AVAILABILITY_TIMEOUT_MS).toBe(2000);
    expect(cfg.DB_PORT).toBe(5432);
    expect(cfg.CIRCUIT_BREAKER_MAX_FAILURES).toBe(5);
    expect(cfg.CIRCUIT_BREAKER_TIMEOUT_MS).toBe(30000);
    expect(cfg.CIRCUIT_BREAKER_HALF_OPEN_MAX).toBe(3);
    expect(cfg.COMPENSATION_TIMEOUT_MS).toBe(30000);
    expect(cfg.ALERT_CHANNELS).toEqual(['log']);
  });

  test('normalises the provider order', () => {
    const cfg = validateConfig({ PROVIDER_ORDER: ' Xendit, stripe,,xendit ' });

    expect(cfg.PROVIDER_ORDER).toEqual(['xendit', 'stripe']);
  });

  test('rejects an empty provider order', () => {
    expect(issuesOf({ PROVIDER_ORDER: ' , ' })).toEqual([
      { field: 'PROVIDER_ORDER', message: 'at least one provider must be listed' },
    ]);
  });

  test('rejects malformed numbers and unknown alert channels', () => {
    const issues = issuesOf({ DB_PORT: 'five', ALERT_CHANNELS: 'log,pager' });

    expect(issues).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ field: 'DB_PORT' }),
        expect.objectContaining({ field: 'ALERT_CHANNELS.1' }),
      ])
    );
  });

  test('requires a webhook URL for the webhook alert channel', () => {
    expect(issuesOf({ ALERT_CHANNELS: 'log,webhook' })).toEqual([
      { field: 'ALERT_WEBHOOK_URL', message: 'required when the webhook alert channel is enabled' },
    ]);
  });

  test('enforces production requirements', () => {
    expect(
      issuesOf({
        NODE_ENV: 'production',
        PROVIDER_ORDER: 'stripe,xendit',
        STRIPE_WEBHOOK_SECRET: 'test-secret',
      })
    ).toEqual([
      { field: 'XENDIT_WEBHOOK_SECRET', message: 'required in production for every enabled provider' },
      { field: 'DB_SSL', message: 'must be enabled in production' },
      { field: 'DB_PASSWORD', message: 'is required in production' },
    ]);
  });

  test('accepts a complete production environment', () => {
    const cfg = validateConfig({
      NODE_ENV: 'production',
      PROVIDER_ORDER: 'stripe',
      STRIPE_WEBHOOK_SECRET: 'test-secret',
      DB_SSL: 'require',
      DB_PASSWORD: 'test-password',
    });

    expect(cfg.PROVIDER_ORDER).toEqual(['stripe']);
  });

  test('prints every issue before throwing', () => {
    expect(() => validateConfig({ DB_PORT: '0' })).toThrow('Invalid configuration');
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('DB_PORT'));
  });
});

describe('buildAppConfig', () => {
  test('nests the validated environment', () => {
    const app = buildAppConfig(
      validateConfig({
        NODE_ENV: 'production',
        PROVIDER_ORDER: 'razorpay',
        RAZORPAY_WEBHOOK_SECRET: 'test-secret',
        DB_SSL: 'true',
        DB_PASSWORD: 'test-password',
        ALERT_CHANNELS: 'webhook',
        ALERT_WEBHOOK_URL: 'https://alerts.example.com/hook',
      })
    );

    expect(app.database.ssl).toEqual({ rejectUnauthorized: true });
    expect(app.providers.order).toEqual(['razorpay']);
    expect(app.providers.webhookSecrets.razorpay).toBe('test-secret');
    expect(app.providers.webhookSecrets.stripe).toBeUndefined();
    expect(app.alerting).toEqual({ channels: ['webhook'], webhookUrl: 'https://alerts.example.com/hook' });
    expect(app.compensation.timeoutMs).toBe(30000);
  });

  test('disables TLS when DB_SSL is false', () => {
    expect(buildAppConfig(validateConfig({})).database.ssl).toBe(false);
  });
});
