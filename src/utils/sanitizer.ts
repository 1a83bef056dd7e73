/**
 * Masks credentials in values that end up in log output
 */

export const SENSITIVE_KEYS = [
  'password',
  'secret',
  'credential',
  'token',
  'authorization',
  'database_url',
  'databaseurl',
  'private_key',
] as const;

export function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((k) => lowerKey.includes(k));
}

/**
 * Partially reveals long strings (first 4 and last 4 chars), hides the rest.
 */
export function maskValue(value: unknown): string {
  if (typeof value === 'string' && value.length > 8) {
    return `${value.slice(0, 4)}****${value.slice(-4)}`;
  }
  return '****';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively mask sensitive data in plain objects and arrays.
 * Errors, dates and other class instances pass through untouched.
 */
export function maskSensitiveData(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(maskSensitiveData);
  }

  if (!isPlainObject(obj)) return obj;

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      masked[key] = maskValue(value);
    } else {
      masked[key] = maskSensitiveData(value);
    }
  }
  return masked;
}

/**
 * Hide password literals in SQL text, e.g. CREATE ROLE ... PASSWORD '...'.
 */
export function redactSql(sqlText: string): string {
  return sqlText.replace(/PASSWORD\s+'(?:[^']|'')*'/gi, "PASSWORD '****'");
}

/**
 * Hide the password part of every connection URL in a text.
 */
export function redactConnectionString(text: string): string {
  return text.replace(
    /([a-z][a-z0-9+.-]*:\/\/[^:/@\s]+):[^@\s]*@/gi,
    '$1:****@'
  );
}
