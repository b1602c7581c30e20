import { z } from 'zod';
import { element, voidElement } from '../markup.js';
import { defineFormatter } from './types.js';

/**
 * Renders an image IRI (or a literal holding a URL) as an `<img>`.
 */
export const imageFormatter = defineFormatter({
  name: 'image',
  stage: 'media',
  options: z.object({
    alt: z.string().default(''),
  }).strict(),
  format(value, options, ctx) {
    if (value.termType === 'BlankNode') return undefined;
    return element('span', { rel: ctx.curie }, voidElement('img', { src: value.value, alt: options.alt }));
  },
});
