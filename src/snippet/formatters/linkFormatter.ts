import { z } from 'zod';
import { element, escapeHtml } from '../markup.js';
import { defineFormatter } from './types.js';

/**
 * Renders a URL-valued property (IRI or literal) as a hyperlink.
 */
export const linkFormatter = defineFormatter({
  name: 'link',
  stage: 'media',
  options: z.object({
    text: z.string().min(1).optional(),
  }).strict(),
  format(value, options, ctx) {
    if (value.termType === 'BlankNode') return undefined;
    const attrs = value.termType === 'Literal'
      ? { property: ctx.curie, href: value.value }
      : { rel: ctx.curie, href: value.value };
    return element('a', attrs, escapeHtml(options.text ?? value.value));
  },
});
