/**
 * @arch propweave.core.domain.schema
 *
 * Naming conventions and their defaults. An empty list always falls back
 * to the default list.
 */
import { z } from 'zod';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';

export const DEFAULT_FIELD_PREFIXES: readonly string[] = [''];
export const DEFAULT_PROPERTY_SUFFIXES: readonly string[] = ['Property'];
export const DEFAULT_GETTER_PREFIXES: readonly string[] = ['get', 'is'];
export const DEFAULT_SETTER_PREFIXES: readonly string[] = ['set'];
export const DEFAULT_IGNORE_MARKER = 'ignoreProperty';

function affixList(defaults: readonly string[]) {
  return z
    .array(z.string())
    .optional()
    .transform((list) => (list && list.length > 0 ? [...new Set(list)] : [...defaults]));
}

export const ConventionOptionsSchema = z.object({
  /** Prefixes stripped from field names ('' keeps the raw name) */
  fieldPrefixes: affixList(DEFAULT_FIELD_PREFIXES),
  /** Suffixes marking accessor methods that return an observable box */
  propertySuffixes: affixList(DEFAULT_PROPERTY_SUFFIXES),
  getterPrefixes: affixList(DEFAULT_GETTER_PREFIXES),
  setterPrefixes: affixList(DEFAULT_SETTER_PREFIXES),
  /** Tag that excludes a field's property, or a single method's contribution */
  ignoreMarker: z.string().min(1).default(DEFAULT_IGNORE_MARKER),
});

export type ConventionOptionsInput = z.input<typeof ConventionOptionsSchema>;
export type ConventionOptions = Readonly<z.output<typeof ConventionOptionsSchema>>;

/**
 * Validate conventions and fill in defaults.
 * @throws ConfigError when the input does not match the schema
 */
export function resolveConventions(input: ConventionOptionsInput = {}): ConventionOptions {
  const result = ConventionOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid naming conventions: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

export const DEFAULT_CONVENTIONS: ConventionOptions = resolveConventions();
