import { UsageEvent } from './schemas';

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

const FIVE_MINUTES_MS = 5 * 60 * 1000;
const THIRTY_DAYS_MS = 30 * 24 * 60 * 60 * 1000;

// alphanumeric, dashes, underscores
const VALID_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate a single usage event beyond schema validation
 */
export function validateEvent(event: UsageEvent, now: number = Date.now()): ValidationResult {
  // allow 5 min of clock skew
  if (event.timestamp > now + FIVE_MINUTES_MS) {
    return { valid: false, reason: 'Timestamp is in the future' };
  }

  if (event.timestamp < now - THIRTY_DAYS_MS) {
    return { valid: false, reason: 'Timestamp is older than 30 days' };
  }

  if (!VALID_ID_PATTERN.test(event.transaction_id)) {
    return { valid: false, reason: 'Invalid transaction_id format' };
  }

  if (!VALID_ID_PATTERN.test(event.customer_id)) {
    return { valid: false, reason: 'Invalid customer_id format' };
  }

  for (const [key, value] of Object.entries(event.properties)) {
    if (typeof value === 'string' && value.length > 1000) {
      return { valid: false, reason: `Property "${key}" value exceeds 1000 characters` };
    }
  }

  return { valid: true };
}
