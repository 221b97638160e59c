/**
 * Formatter Factory
 *
 * Creates the appropriate formatter based on user options.
 * This is the single point where formatters are instantiated.
 */

import type { Formatter, FormatterOptions } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';

/**
 * Supported formatter types
 */
export type FormatterType = 'human' | 'json';

const VALID_FORMATTER_TYPES: readonly FormatterType[] = ['human', 'json'];

export function isFormatterType(value: string): value is FormatterType {
  return VALID_FORMATTER_TYPES.some((type) => type === value);
}

/**
 * Create a formatter instance
 *
 * @throws Error if formatter type is unknown
 *
 * @example
 * ```ts
 * const formatter = createFormatter('human', { noColor: true });
 * ```
 */
export function createFormatter(type: string = 'human', options: FormatterOptions = {}): Formatter {
  if (!isFormatterType(type)) {
    throw new Error(
      `Unknown output type: "${type}". Valid types: ${VALID_FORMATTER_TYPES.join(', ')}`
    );
  }

  switch (type) {
    case 'human':
      return new HumanFormatter(options);

    case 'json':
      return new JsonFormatter(options);
  }
}
