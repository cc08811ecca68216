/**
 * Topic Key Utility
 *
 * Single source of truth for turning a topic into a filesystem-safe key,
 * used for research cache files and run directory names.
 */

/**
 * Generate a filesystem-safe key from a topic.
 *
 * Transformations:
 * 1. Normalize Unicode and remove diacritics (é → e)
 * 2. Replace whitespace runs with underscores
 * 3. Drop everything except letters, digits, underscores and hyphens
 *    (letters and digits from any script, so 能源储存 stays 能源储存)
 * 4. Collapse repeated underscores, trim leading/trailing ones
 *
 * Case is preserved, so the key stays readable in directory listings.
 * Distinct non-Latin topics get distinct keys.
 *
 * @example
 * toTopicKey('Renewable Energy Storage')
 * // → "Renewable_Energy_Storage"
 *
 * @example
 * toTopicKey('Café culture: 2024?')
 * // → "Cafe_culture_2024"
 */
export function toTopicKey(topic: string): string {
  const key = topic
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // Remove diacritics
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}_-]/gu, '')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .normalize('NFC');
  return key.length > 0 ? key : 'untitled';
}

/**
 * Best-effort inverse of toTopicKey, for run directories without a manifest.
 *
 * @example
 * topicFromKey('Renewable_Energy_Storage') // → "Renewable Energy Storage"
 */
export function topicFromKey(key: string): string {
  return key.replace(/_/g, ' ').trim();
}
