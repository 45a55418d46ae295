import { NotSupportedError } from '../errors';
import {
  CapabilityName,
  PaymentProvider,
  ProviderCapabilities,
  ProviderExtensions,
} from './provider.interface';

type CapabilityFlag = {
  [K in keyof ProviderCapabilities]: ProviderCapabilities[K] extends boolean ? K : never;
}[keyof ProviderCapabilities];

/**
 * Capabilities gated by a flag in ProviderCapabilities. Stored payment
 * methods have no flag; a registered implementation is enough.
 */
const CAPABILITY_FLAGS: Record<CapabilityName, CapabilityFlag | null> = {
  invoice: 'supportsInvoices',
  payout: 'supportsPayouts',
  paymentSession: 'supportsPaymentSessions',
  paymentMethod: null,
  balance: 'supportsBalance',
  capture: 'supportsManualCapture',
  void: 'supportsManualCapture',
};

interface RegisteredProvider {
  capabilities: ProviderCapabilities;
  extensions: ProviderExtensions;
}

/**
 * Provider name -> optional capability implementations
 */
export class CapabilityRegistry {
  private readonly entries = new Map<string, RegisteredProvider>();

  constructor(providers: readonly PaymentProvider[] = []) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  register(provider: PaymentProvider): void {
    this.entries.set(provider.name(), {
      capabilities: provider.capabilities(),
      extensions: { ...provider.extensions() },
    });
  }

  supports(provider: string, capability: CapabilityName): boolean {
    return this.lookup(provider, capability) !== undefined;
  }

  /**
   * @throws NotSupportedError when the flag is off or nothing is registered
   */
  require<K extends CapabilityName>(provider: string, capability: K): NonNullable<ProviderExtensions[K]> {
    const implementation = this.lookup(provider, capability);
    if (implementation === undefined) {
      throw new NotSupportedError(provider, capability);
    }
    return implementation;
  }

  private lookup<K extends CapabilityName>(
    provider: string,
    capability: K
  ): NonNullable<ProviderExtensions[K]> | undefined {
    const entry = this.entries.get(provider);
    if (!entry) {
      return undefined;
    }

    const flag = CAPABILITY_FLAGS[capability];
    if (flag !== null && !entry.capabilities[flag]) {
      return undefined;
    }

    return entry.extensions[capability] ?? undefined;
  }
}
