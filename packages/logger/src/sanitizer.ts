/**
 * @readycheck/logger - Sensitive Data Sanitizer
 * Masks sensitive fields in log output
 */

export const SENSITIVE_KEYS = [
  'password',
  'passphrase',
  'secret',
  'token',
  'authorization',
  'private_key',
  'privatekey',
  'database_url',
  'redis_url',
  'mongodb_uri',
  'rabbitmq_url',
] as const;

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return !lowerKey.endsWith('path') && SENSITIVE_KEYS.some((k) => lowerKey.includes(k));
}

/**
 * Masked form of one field: sensitive keys are hidden, nested objects
 * are walked. Long values keep their first and last 4 chars.
 * Key paths (privateKeyPath) are not secrets and pass through.
 */
export function maskEntry(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return typeof value === 'string' && value.length > 8
      ? `${value.slice(0, 4)}****${value.slice(-4)}`
      : '****';
  }
  return maskSensitiveData(value);
}

/** Recursively mask sensitive data in objects */
export function maskSensitiveData(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map(maskSensitiveData);
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    masked[key] = maskEntry(key, value);
  }
  return masked;
}
