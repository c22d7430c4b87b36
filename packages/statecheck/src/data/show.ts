/**
 * Render a value for failure reports and error messages.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  } else if (typeof value === 'bigint') {
    return `${value}n`;
  } else if (Array.isArray(value)) {
    if (value.length > 10) {
      const preview = value.slice(0, 10).map(formatValue).join(', ');
      return `[${preview}, ... (${value.length} items total)]`;
    }
    return `[${value.map(formatValue).join(', ')}]`;
  } else if (value instanceof Map) {
    const entries = [...value.entries()].map(
      ([k, v]) => `${formatValue(k)} => ${formatValue(v)}`
    );
    return `Map(${entries.join(', ')})`;
  } else if (value && typeof value === 'object') {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === 'bigint' ? `${v}n` : v
    );
  }
  return String(value);
}
