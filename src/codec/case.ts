/**
 * Converts a camelCase key to the snake_case the API expects.
 * Keys that are already snake_case come back unchanged.
 */
export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (char) => `_${char.toLowerCase()}`);
}

/**
 * Converts an API param name such as `card[exp_month]` to camelCase (`card[expMonth]`).
 */
export function toCamelCase(param: string): string {
  return param.replace(/_([a-z\d])/g, (_, char: string) => char.toUpperCase());
}
