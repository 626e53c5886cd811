/**
 * Reference-time layouts (`2006-01-02T15:04:05Z07:00`) rendered through date-fns
 */

import { formatInTimeZone } from 'date-fns-tz';

const TIME_ZONE = 'UTC';

/** A layout element: literal text, or a function of the formatted time */
type LayoutPart = string | ((date: Date) => string);

/** Layout elements and the date-fns pattern each stands for, longest first per leading character */
const TOKENS: ReadonlyArray<readonly [string, string]> = [
  ['January', 'MMMM'],
  ['Jan', 'MMM'],
  ['Monday', 'EEEE'],
  ['Mon', 'EEE'],
  ['MST', 'zzz'],
  ['2006', 'yyyy'],
  ['002', 'DDD'],
  ['01', 'MM'],
  ['02', 'dd'],
  ['03', 'hh'],
  ['04', 'mm'],
  ['05', 'ss'],
  ['06', 'yy'],
  ['15', 'HH'],
  ['1', 'M'],
  ['2', 'd'],
  ['3', 'h'],
  ['4', 'm'],
  ['5', 's'],
  ['PM', 'a'],
  ['Z07:00:00', 'XXXXX'],
  ['Z070000', 'XXXX'],
  ['Z07:00', 'XXX'],
  ['Z0700', 'XX'],
  ['Z07', 'X'],
  ['-07:00:00', 'xxxxx'],
  ['-070000', 'xxxx'],
  ['-07:00', 'xxx'],
  ['-0700', 'xx'],
  ['-07', 'x']
];

const pattern =
  (fns: string) =>
  (date: Date): string =>
    formatInTimeZone(date, TIME_ZONE, fns);

const spacePadded =
  (fns: string, width: number) =>
  (date: Date): string =>
    formatInTimeZone(date, TIME_ZONE, fns).padStart(width, ' ');

/**
 * Fractional seconds: `.000` keeps every digit, `.999` drops trailing zeros
 * and the separator when nothing remains
 */
function fraction(separator: string, digit: string, width: number): LayoutPart {
  return (date: Date): string => {
    const digits = formatInTimeZone(date, TIME_ZONE, 'S'.repeat(width));
    if (digit === '0') {
      return separator + digits;
    }
    const trimmed = digits.replace(/0+$/, '');
    return trimmed ? separator + trimmed : '';
  };
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

/**
 * Split a layout into literal text and time elements
 */
export function parseLayout(layout: string): LayoutPart[] {
  const parts: LayoutPart[] = [];
  let i = 0;

  while (i < layout.length) {
    const rest = layout.slice(i);

    if (rest.startsWith('pm')) {
      parts.push(date => formatInTimeZone(date, TIME_ZONE, 'a').toLowerCase());
      i += 2;
      continue;
    }
    if (rest.startsWith('__2')) {
      parts.push(spacePadded('D', 3));
      i += 3;
      continue;
    }
    if (rest.startsWith('_2') && !rest.startsWith('_2006')) {
      parts.push(spacePadded('d', 2));
      i += 2;
      continue;
    }

    const ch = rest[0] ?? '';
    if ((ch === '.' || ch === ',') && (rest[1] === '0' || rest[1] === '9')) {
      const digit = rest[1] === '0' ? '0' : '9';
      let width = 1;
      while (rest[1 + width] === digit) {
        width++;
      }
      if (!isDigit(rest[1 + width])) {
        parts.push(fraction(ch, digit, width));
        i += 1 + width;
        continue;
      }
    }

    const token = TOKENS.find(([element]) => rest.startsWith(element));
    if (token) {
      parts.push(pattern(token[1]));
      i += token[0].length;
      continue;
    }

    const last = parts[parts.length - 1];
    if (typeof last === 'string') {
      parts[parts.length - 1] = last + ch;
    } else {
      parts.push(ch);
    }
    i++;
  }

  return parts;
}

/**
 * Format a time in UTC with a reference-time layout, e.g. `20060102`
 */
export function formatLayout(date: Date, layout: string): string {
  return parseLayout(layout)
    .map(part => (typeof part === 'string' ? part : part(date)))
    .join('');
}
