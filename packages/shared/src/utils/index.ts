import type { ExternalPlatform } from '../types/index.js';

// ============================================
// STRING UTILITIES
// ============================================

/**
 * Truncate text to a maximum length, appending an ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

/**
 * Display name for a platform
 */
export function formatPlatformName(platform: ExternalPlatform): string {
  switch (platform) {
    case 'groupme':
      return 'GroupMe';
    case 'teams':
      return 'Teams';
    case 'signal':
      return 'Signal';
    case 'slack':
      return 'Slack';
  }
}

/**
 * Check whether a string is an absolute http(s) URL
 */
export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
