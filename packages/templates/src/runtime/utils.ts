/**
 * Runtime Utilities
 *
 * Safe property access and HTML escaping used by the evaluator and filters.
 */

import { SafeString } from './safe-string';

// Cache hasOwnProperty reference for performance
const hasOwnProperty = Object.prototype.hasOwnProperty;

// Keys that would reach into the prototype chain if ever written or read
const BLOCKED_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Security-aware property lookup that prevents prototype pollution attacks.
 *
 * Only returns own properties, never inherited properties.
 *
 * @example
 * ```typescript
 * lookupProperty({ foo: 'bar' }, 'foo'); // 'bar'
 * lookupProperty({ foo: 'bar' }, 'toString'); // undefined
 * lookupProperty({ foo: 'bar' }, '__proto__'); // undefined
 * ```
 */
export function lookupProperty<T>(parent: Readonly<Record<string, T>>, propertyName: string): T | undefined {
  if (BLOCKED_KEYS.has(propertyName)) {
    return undefined;
  }
  if (hasOwnProperty.call(parent, propertyName)) {
    return parent[propertyName];
  }
  return undefined;
}

/**
 * Whether a key may be written into a template-created mapping
 */
export function isSafeKey(key: string): boolean {
  return !BLOCKED_KEYS.has(key);
}

/**
 * Escape characters for HTML output.
 */
const escapeMap: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&#34;',
  "'": '&#39;',
};

const escapeTest = /[&<>"']/;
const escapeRegex = /[&<>"']/g;

/**
 * Escapes HTML entities for safe output in HTML contexts.
 *
 * SafeString instances pass through unchanged.
 *
 * @example
 * ```typescript
 * escapeHtml('<script>alert("x")</script>');
 * // '&lt;script&gt;alert(&#34;x&#34;)&lt;/script&gt;'
 * ```
 */
export function escapeHtml(value: string | SafeString): string {
  if (value instanceof SafeString) {
    return value.toString();
  }

  // Fast path: if no special characters, return original string
  if (!escapeTest.test(value)) {
    return value;
  }

  return value.replace(escapeRegex, (char) => escapeMap[char] ?? char);
}
