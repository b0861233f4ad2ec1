import { isPeriod, type Period } from '../models/Period.js';
import type { TopArtistEntry } from '../models/TopArtist.js';
import { ValidationError } from './ErrorHandler.js';

export const MUSICAL_NOTE = '♪';

const PERIOD_LABELS: Record<Exclude<Period, '12month'>, string> = {
  overall: 'All-Time',
  '7day': 'Weekly',
  '1month': 'Monthly',
  '3month': 'Quarterly',
  '6month': 'Semi-Annual'
};

/**
 * Etiqueta legible del período. "12month" se muestra como el año actual.
 */
export function formatPeriodLabel(period: string, now: Date = new Date()): string {
  if (!isPeriod(period)) {
    throw new ValidationError(`Período desconocido: "${period}"`);
  }
  if (period === '12month') {
    return String(now.getFullYear());
  }
  return PERIOD_LABELS[period];
}

/**
 * "A (50), B (30) & C (10)"
 */
export function formatArtistList(entries: readonly TopArtistEntry[]): string {
  const items = entries.map(entry => `${entry.name} (${entry.playCount})`);

  if (items.length <= 1) {
    return items.join('');
  }

  const last = items[items.length - 1];
  return `${items.slice(0, -1).join(', ')} & ${last}`;
}

/**
 * Texto completo a publicar. Vacío si no hay artistas: el llamador no debe publicar.
 */
export function buildSummaryText(entries: readonly TopArtistEntry[], period: string, now: Date = new Date()): string {
  if (entries.length === 0) {
    return '';
  }

  const label = formatPeriodLabel(period, now);
  return `${MUSICAL_NOTE} My ${label} Top ${entries.length} artists: ${formatArtistList(entries)}`;
}

// Largo en code points (los emoji cuentan como uno)
export const textLength = (text: string): number => Array.from(text).length;

/**
 * Quita artistas del final hasta que el texto entre en maxLength,
 * medido con `measure` (por defecto, code points). null si ni siquiera entra uno.
 */
export function fitSummaryText(
  entries: readonly TopArtistEntry[],
  period: string,
  maxLength: number,
  now: Date = new Date(),
  measure: (text: string) => number = textLength
): string | null {
  for (let count = entries.length; count > 0; count--) {
    const text = buildSummaryText(entries.slice(0, count), period, now);
    if (measure(text) <= maxLength) {
      return text;
    }
  }
  return null;
}
