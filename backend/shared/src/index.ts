// ============================================================================
// RESILIENCE
// ============================================================================

// Retry with exponential backoff, circuit breakers
export * from './resilience';

// ============================================================================
// SECURITY
// ============================================================================

// Webhook signature verification
export * from './hmac';
