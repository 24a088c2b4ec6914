export type CanonicalValue =
  | string
  | number
  | boolean
  | null
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

const NON_ASCII = /[\u0080-\uffff]/g;

function escapeNonAscii(text: string): string {
  return text.replace(NON_ASCII, (char) => '\\u' + char.charCodeAt(0).toString(16).padStart(4, '0'));
}

/**
 * Shortest round-trip digits, switching to exponent form below 1e-4 with a signed,
 * two-digit exponent (`1e-05`, `2.5e-07`).
 */
function encodeNumber(value: number): string {
  if (!Number.isFinite(value)) return 'null';
  if (Number.isInteger(value) || Math.abs(value) >= 1e-4) return String(value);

  const [mantissa, exponent] = value.toExponential().split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  return `${mantissa}e${sign}${exponent.replace(/^[+-]/, '').padStart(2, '0')}`;
}

function encodeString(value: string): string {
  return escapeNonAscii(JSON.stringify(value));
}

/**
 * Deterministic JSON used for every hashed or signed payload: keys sorted, `", "` and
 * `": "` separators, non-ASCII escaped. Changing the output forks the chain.
 */
export function canonicalize(value: CanonicalValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return encodeString(value);
  if (typeof value === 'number') return encodeNumber(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(', ') + ']';
  }

  const entries = Object.keys(value)
    .sort()
    .map((key) => `${encodeString(key)}: ${canonicalize(value[key])}`);
  return '{' + entries.join(', ') + '}';
}
