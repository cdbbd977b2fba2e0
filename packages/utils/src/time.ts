/**
 * Time Utilities
 */

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

export const DEFAULT_TIMESTAMP_FORMAT = 'YYYYMMDDHHMMSS';

function pad(value: number, width: number = 2): string {
  return value.toString().padStart(width, '0');
}

interface UtcParts {
  year: number;
  month: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
}

function utcParts(date: Date): UtcParts {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hours: date.getUTCHours(),
    minutes: date.getUTCMinutes(),
    seconds: date.getUTCSeconds(),
  };
}

const STRFTIME_DIRECTIVES: Record<string, (p: UtcParts) => string> = {
  Y: p => pad(p.year, 4),
  y: p => pad(p.year % 100),
  m: p => pad(p.month),
  d: p => pad(p.day),
  H: p => pad(p.hours),
  M: p => pad(p.minutes),
  S: p => pad(p.seconds),
  '%': () => '%',
};

function formatStrftime(format: string, parts: UtcParts): string {
  return format.replace(/%(.)/g, (match: string, directive: string) => {
    const render = STRFTIME_DIRECTIVES[directive];
    return render ? render(parts) : match;
  });
}

function formatTokens(format: string, parts: UtcParts): string {
  let out = '';
  let seenHours = false;
  let i = 0;

  while (i < format.length) {
    const rest = format.slice(i);

    if (rest.startsWith('YYYY')) {
      out += pad(parts.year, 4);
      i += 4;
    } else if (rest.startsWith('YY')) {
      out += pad(parts.year % 100);
      i += 2;
    } else if (rest.startsWith('MM')) {
      // MM after an hour token is minutes (YYYYMMDDHHMMSS)
      out += pad(seenHours ? parts.minutes : parts.month);
      i += 2;
    } else if (rest.startsWith('DD')) {
      out += pad(parts.day);
      i += 2;
    } else if (rest.startsWith('HH')) {
      out += pad(parts.hours);
      seenHours = true;
      i += 2;
    } else if (rest.startsWith('mm')) {
      out += pad(parts.minutes);
      i += 2;
    } else if (rest.startsWith('SS') || rest.startsWith('ss')) {
      out += pad(parts.seconds);
      i += 2;
    } else {
      out += format.charAt(i);
      i += 1;
    }
  }

  return out;
}

/**
 * Format a date in UTC.
 *
 * Accepts token patterns (`YYYYMMDDHHMMSS`, `YYYY-MM-DD_HHmmss`) and
 * strftime patterns (`%Y%m%d%H%M%S`).
 */
export function formatTimestamp(
  date: Date,
  format: string = DEFAULT_TIMESTAMP_FORMAT
): string {
  const parts = utcParts(date);
  return format.includes('%')
    ? formatStrftime(format, parts)
    : formatTokens(format, parts);
}
