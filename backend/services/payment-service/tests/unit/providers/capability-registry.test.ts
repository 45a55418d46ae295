import { NotSupportedError } from '../../../src/errors';
import { CapabilityRegistry } from '../../../src/providers/capability-registry';
import { CaptureProvider, VoidProvider } from '../../../src/providers/provider.interface';
import { MockProvider } from '../../fakes/mock-provider';

const capture: CaptureProvider = { capturePayment: async () => undefined };
const release: VoidProvider = { voidPayment: async () => undefined };

describe('CapabilityRegistry', () => {
  test('returns the registered implementation when the flag is on', () => {
    const registry = new CapabilityRegistry([
      new MockProvider('stripe', { capabilities: { supportsManualCapture: true }, extensions: { capture, void: release } }),
    ]);

    expect(registry.require('stripe', 'capture')).toBe(capture);
    expect(registry.require('stripe', 'void')).toBe(release);
    expect(registry.supports('stripe', 'capture')).toBe(true);
  });

  test('ignores an implementation whose flag is off', () => {
    const registry = new CapabilityRegistry([new MockProvider('stripe', { extensions: { capture } })]);

    expect(registry.supports('stripe', 'capture')).toBe(false);
    expect(() => registry.require('stripe', 'capture')).toThrow(NotSupportedError);
  });

  test('names the provider and capability in the error', () => {
    const registry = new CapabilityRegistry([new MockProvider('razorpay')]);

    try {
      registry.require('razorpay', 'balance');
      throw new Error('expected NotSupportedError');
    } catch (error) {
      expect(error).toBeInstanceOf(NotSupportedError);
      expect(error).toMatchObject({ provider: 'razorpay', capability: 'balance', statusCode: 501 });
    }
  });

  test('treats unknown providers as unsupported', () => {
    const registry = new CapabilityRegistry();

    expect(registry.supports('adyen', 'invoice')).toBe(false);
  });
});
