/**
 * Functions available to templates
 */

import { formatLayout } from './layout';
import { TemplateFunction } from './values';

/**
 * Function table bound to a clock. `time` formats the current UTC time
 * with a reference-time layout such as `20060102`.
 */
export function createFunctions(clock: () => Date): ReadonlyMap<string, TemplateFunction> {
  return new Map<string, TemplateFunction>([
    ['time', (layout: string) => formatLayout(clock(), layout)],
    ['tolower', (s: string) => s.toLowerCase()],
    ['toupper', (s: string) => s.toUpperCase()],
    ['trim', (s: string) => s.trim()],
    ['replace', (s: string, old: string, replacement: string) => s.replaceAll(old, () => replacement)]
  ]);
}
