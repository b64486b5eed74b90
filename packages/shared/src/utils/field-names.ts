import { HEADER_LIMITS } from '../constants/limits';

/**
 * Make a list of field names unique and non-empty.
 *
 * Empty names become `Column_<position>` (1-based). Repeats keep the first
 * occurrence and number the rest `_2`, `_3`… left to right, skipping any
 * suffixed name that is already taken.
 */
export function uniquifyFieldNames(
  names: readonly string[],
  placeholderPrefix: string = HEADER_LIMITS.PLACEHOLDER_PREFIX,
): string[] {
  const withPlaceholders = names.map((name, i) => (name === '' ? `${placeholderPrefix}_${i + 1}` : name));
  const taken = new Set<string>();
  const result: string[] = [];

  for (const name of withPlaceholders) {
    let candidate = name;
    let suffix = 2;
    while (taken.has(candidate)) {
      candidate = `${name}_${suffix}`;
      suffix++;
    }
    taken.add(candidate);
    result.push(candidate);
  }

  return result;
}

/**
 * Stable client id from upstream identity parts:
 * `<country>_<client_name>_<product>[_<form_variant>]`
 */
export function buildClientId(parts: {
  country: string | null;
  client_name: string | null;
  product: string | null;
  form_variant?: string | null;
}): string {
  const sanitize = (s: string | null | undefined): string => (s || 'Unknown').replace(/[^a-zA-Z0-9]/g, '_');
  const ids = [sanitize(parts.country), sanitize(parts.client_name), sanitize(parts.product)];
  if (parts.form_variant) ids.push(sanitize(parts.form_variant));
  return ids.join('_');
}
