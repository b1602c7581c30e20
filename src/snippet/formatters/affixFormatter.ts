import { z } from 'zod';
import { element, escapeHtml } from '../markup.js';
import { defineFormatter } from './types.js';

/**
 * Wraps a literal's text in fixed leading and trailing text,
 * e.g. " - Played 12 times".
 */
export const affixFormatter = defineFormatter({
  name: 'affix',
  stage: 'media',
  options: z.object({
    prefix: z.string().default(''),
    suffix: z.string().default(''),
  }).strict(),
  format(value, options, ctx) {
    if (value.termType !== 'Literal') return undefined;
    return element(
      'span',
      {
        property: ctx.curie,
        lang: value.language,
        datatype: value.datatype !== undefined ? ctx.prefixes.toCurie(value.datatype) : undefined,
      },
      escapeHtml(options.prefix + value.value + options.suffix)
    );
  },
});
