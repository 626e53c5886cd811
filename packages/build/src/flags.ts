/**
 * Compiler flag rendering
 */

import { TemplateRenderer } from './template';

/** Prefixes of flag categories passed to the toolchain */
export const FLAG_PREFIXES = {
  ASM: '-asmflags=',
  GC: '-gcflags=',
  LD: '-ldflags='
} as const;

/**
 * Render each flag template and prefix the result. Order is kept; the
 * first failing template aborts the batch.
 */
export function processFlags(
  renderer: TemplateRenderer,
  templates: readonly string[],
  prefix: string
): string[] {
  return templates.map(template => prefix + renderer.apply(template));
}

/**
 * Join rendered linker flags into the single `-ldflags=` argument.
 * Returns undefined for an empty list.
 */
export function joinLdflags(rendered: readonly string[]): string | undefined {
  return rendered.length > 0 ? FLAG_PREFIXES.LD + rendered.join(' ') : undefined;
}
