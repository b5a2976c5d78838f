const TOKEN = /'[^']*'|y{1,4}|M{1,4}|d{1,2}|E{3,4}|H{1,2}|h{1,2}|m{1,2}|s{1,2}|a/g;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function name(date: Date, locale: string, options: Intl.DateTimeFormatOptions): string {
  return new Intl.DateTimeFormat(locale, { ...options, timeZone: 'UTC' }).format(date);
}

/**
 * Formats `date` (in UTC) with an ICU-style pattern such as `yyyy-MM-dd HH:mm`
 * or `EEE, MMM d`. Text in single quotes is copied literally.
 */
export function formatDatePattern(date: Date, pattern: string, locale: string): string {
  return pattern.replace(TOKEN, (token) => {
    if (token.startsWith("'")) return token.slice(1, -1);
    const hours = date.getUTCHours();
    switch (token) {
      case 'yyyy': case 'yyy': case 'y': return String(date.getUTCFullYear());
      case 'yy': return pad(date.getUTCFullYear() % 100, 2);
      case 'MMMM': return name(date, locale, { month: 'long' });
      case 'MMM': return name(date, locale, { month: 'short' });
      case 'MM': return pad(date.getUTCMonth() + 1, 2);
      case 'M': return String(date.getUTCMonth() + 1);
      case 'dd': return pad(date.getUTCDate(), 2);
      case 'd': return String(date.getUTCDate());
      case 'EEEE': return name(date, locale, { weekday: 'long' });
      case 'EEE': return name(date, locale, { weekday: 'short' });
      case 'HH': return pad(hours, 2);
      case 'H': return String(hours);
      case 'hh': return pad(hours % 12 || 12, 2);
      case 'h': return String(hours % 12 || 12);
      case 'mm': return pad(date.getUTCMinutes(), 2);
      case 'm': return String(date.getUTCMinutes());
      case 'ss': return pad(date.getUTCSeconds(), 2);
      case 's': return String(date.getUTCSeconds());
      case 'a': return hours < 12 ? 'AM' : 'PM';
      default: return token;
    }
  });
}

export function toDate(value: unknown): Date | undefined {
  let date: Date | undefined;
  if (typeof value === 'string' && value.length > 0) {
    date = new Date(value);
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    date = new Date(value);
  }
  return date && !Number.isNaN(date.getTime()) ? date : undefined;
}
