/**
 * Glob matching for tool allow-lists.
 */

/**
 * Simple glob matching supporting * wildcard.
 * e.g., "polygon_*" matches "polygon_news", "polygon_crypto_rsi"
 */
export function globMatch(pattern: string, value: string): boolean {
  if (pattern === value) return true;
  if (!isWildcard(pattern)) return false;

  // Convert glob pattern to regex
  const regexStr = '^' + pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*') + '$';
  return new RegExp(regexStr).test(value);
}

export function isWildcard(pattern: string): boolean {
  return pattern.includes('*');
}

/**
 * Check if a tool name matches any pattern in a list.
 */
export function matchesAnyPattern(toolName: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => globMatch(pattern, toolName));
}
