import type { z } from 'zod';
import type { Term } from '../../graph/types.js';
import type { BoundFormatter, FormatterContext, FormatterStage } from '../types.js';

/**
 * Raised by a formatter strategy for a value it cannot render.
 */
export class FormatterError extends Error {
  constructor(
    public readonly formatter: string,
    message: string
  ) {
    super(`${formatter}: ${message}`);
    this.name = 'FormatterError';
  }
}

/**
 * A named formatter strategy, referenced from rule files by `name`.
 */
export type FormatterDefinition = {
  name: string;
  stage: FormatterStage;
  /**
   * Validate options and bind them.
   * @throws ZodError when the options are invalid
   */
  bind: (options: unknown) => BoundFormatter;
};

type FormatterSpec<S extends z.ZodType> = {
  name: string;
  stage: FormatterStage;
  /** Schema for the `options` block of a property rule */
  options: S;
  format: (value: Term, options: z.output<S>, ctx: FormatterContext) => string | undefined;
};

export function defineFormatter<S extends z.ZodType>(spec: FormatterSpec<S>): FormatterDefinition {
  return {
    name: spec.name,
    stage: spec.stage,
    bind(raw) {
      const options = spec.options.parse(raw ?? {});
      return {
        name: spec.name,
        stage: spec.stage,
        format: (value, ctx) => spec.format(value, options, ctx),
      };
    },
  };
}
