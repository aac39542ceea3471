const ENTITIES: Record<string, string> = {
  '&quot;': '"',
  '&#x27;': "'",
  '&#39;': "'",
  '&#x2F;': '/',
  '&lt;': '<',
  '&gt;': '>',
  '&amp;': '&',
};

/** HN item text is HTML; flatten it to plain lines for the terminal. */
export function htmlToText(html: string): string {
  return html
    .replace(/<p>/gi, '\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&(?:quot|#x27|#39|#x2F|lt|gt|amp);/g, (entity) => ENTITIES[entity] ?? entity)
    .trim();
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count > 1 ? 's' : ''} ago`;
}

export function formatRelativeTime(iso: string | null, now: Date = new Date()): string {
  if (!iso) return 'Unknown time';

  const totalSeconds = Math.floor((now.getTime() - new Date(iso).getTime()) / 1000);
  const days = Math.floor(totalSeconds / 86_400);

  if (days > 365) return plural(Math.floor(days / 365), 'year');
  if (days > 30) return plural(Math.floor(days / 30), 'month');
  if (days > 0) return plural(days, 'day');
  if (totalSeconds > 3600) return plural(Math.floor(totalSeconds / 3600), 'hour');
  if (totalSeconds > 60) return plural(Math.floor(totalSeconds / 60), 'minute');
  return 'just now';
}

/** `2024-05-01 12:30:00 UTC`; 'Never' for null. */
export function formatDateTime(iso: string | null): string {
  if (!iso) return 'Never';
  return `${new Date(iso).toISOString().replace('T', ' ').slice(0, 19)} UTC`;
}
