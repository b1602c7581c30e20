import { affixFormatter } from './affixFormatter.js';
import { imageFormatter } from './imageFormatter.js';
import { linkFormatter } from './linkFormatter.js';
import { ratingFormatter } from './ratingFormatter.js';
import type { FormatterDefinition } from './types.js';

/**
 * Formatter strategies available to every rule file.
 */
export const BUILT_IN_FORMATTERS: readonly FormatterDefinition[] = [
  imageFormatter,
  ratingFormatter,
  affixFormatter,
  linkFormatter,
];

/**
 * Named formatter strategies, looked up by rule files.
 */
export class FormatterRegistry {
  private readonly byName = new Map<string, FormatterDefinition>();

  constructor(formatters: readonly FormatterDefinition[] = BUILT_IN_FORMATTERS) {
    for (const formatter of formatters) {
      this.byName.set(formatter.name, formatter);
    }
  }

  get(name: string): FormatterDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  list(): Array<{ name: string; stage: string }> {
    return [...this.byName.values()].map((formatter) => ({
      name: formatter.name,
      stage: formatter.stage,
    }));
  }
}

export function createFormatterRegistry(formatters?: readonly FormatterDefinition[]): FormatterRegistry {
  return new FormatterRegistry(formatters);
}
