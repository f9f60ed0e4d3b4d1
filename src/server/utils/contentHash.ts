import crypto from 'crypto';

/**
 * Compute a content hash for a fetched page based on its key fields
 * Used for change detection between document versions
 *
 * @returns SHA-256 hash of the page content
 */
export function computeContentHash(title: string, text: string, url: string): string {
  const normalizedTitle = (title || '').trim();
  const normalizedText = (text || '').trim();
  const normalizedUrl = (url || '').trim();

  const contentString = `${normalizedTitle}|${normalizedText}|${normalizedUrl}`;

  return crypto.createHash('sha256').update(contentString, 'utf8').digest('hex');
}
