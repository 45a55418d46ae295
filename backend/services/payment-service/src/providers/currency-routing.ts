/**
 * Preferred provider per ISO 4217 currency
 */
export const CURRENCY_PROVIDER_PREFERENCES: Readonly<Record<string, string>> = Object.freeze({
  // North America & Europe
  USD: 'stripe',
  EUR: 'stripe',
  GBP: 'stripe',
  CAD: 'stripe',

  // Southeast Asia
  IDR: 'xendit',
  PHP: 'xendit',
  VND: 'xendit',
  THB: 'xendit',
  MYR: 'xendit',

  // India
  INR: 'razorpay',

  // Asia Pacific
  HKD: 'airwallex',
  CNY: 'airwallex',
  AUD: 'airwallex',
  NZD: 'airwallex',
  SGD: 'airwallex',
});

/**
 * Case-insensitive lookup; undefined when the currency has no preference
 */
export function preferredProviderFor(currency: string): string | undefined {
  const key = currency.trim().toUpperCase();
  return Object.prototype.hasOwnProperty.call(CURRENCY_PROVIDER_PREFERENCES, key)
    ? CURRENCY_PROVIDER_PREFERENCES[key]
    : undefined;
}
