export * from './provider.interface';
export { CapabilityRegistry } from './capability-registry';
export { probeAvailability } from './availability';
export { CURRENCY_PROVIDER_PREFERENCES, preferredProviderFor } from './currency-routing';
export { MultiProviderSelector, SELECTOR_NAME } from './multi-provider-selector';
export type { MultiProviderSelectorOptions, ProviderStats } from './multi-provider-selector';
