/**
 * Per-container configuration.
 *
 * Every container gets a `DefaultMeta` (or the subclass assigned to its
 * static `Meta`). Overriding a method here customises binding, input
 * wrapping or translation lookup for all fields of that container.
 */

import { createLogger, environmentFromNodeEnv, type Logger } from '@jsonfields/logger';
import { z } from 'zod';
import { InvalidJsonError } from './errors.js';
import type { Field } from './fields/field.js';
import type { BindOptions } from './fields/types.js';
import type { UnboundField } from './fields/unbound-field.js';
import { getTranslations, type Translations } from './i18n/index.js';
import type { BaseJson } from './json/base-json.js';

const metaValuesSchema = z
  .object({
    locales: z.union([z.array(z.string().min(1)), z.literal(false)]).optional(),
    cacheTranslations: z.boolean().optional(),
  })
  .passthrough();

/** Values accepted by `DefaultMeta.updateValues`; unknown keys are copied as they are */
export interface MetaValues {
  locales?: readonly string[] | false;
  cacheTranslations?: boolean;
  logger?: Logger;
  [key: string]: unknown;
}

let defaultLogger: Logger | undefined;

/**
 * The logger a meta uses unless one is assigned. Debug events stay quiet in
 * every environment; production keeps its warn level.
 */
export function createDefaultLogger(
  nodeEnv: string | undefined,
  output?: (line: string) => void,
): Logger {
  const environment = environmentFromNodeEnv(nodeEnv);
  return createLogger({
    environment,
    level: environment === 'production' ? 'warn' : 'info',
    output,
  }).child({ component: 'jsonfields' });
}

function getDefaultLogger(): Logger {
  defaultLogger ??= createDefaultLogger(process.env.NODE_ENV);
  return defaultLogger;
}

export class DefaultMeta {
  /** Shared by every meta; keyed by the locale list */
  static readonly translationsCache = new Map<string, Translations>();

  /** Locales to translate messages into, in order of preference; false disables translation */
  locales: readonly string[] | false = false;
  cacheTranslations = true;
  logger: Logger = getDefaultLogger();

  bindField<F extends Field>(json: BaseJson | null, unboundField: UnboundField<F>, options: BindOptions): F {
    return unboundField.bind(json, options);
  }

  /**
   * Turn container input into an object fields can read.
   * JSON text is parsed; anything else is returned unchanged.
   *
   * @throws {InvalidJsonError} If the text is not valid JSON
   */
  wrapJsondata(_json: BaseJson, input: unknown): unknown {
    if (typeof input !== 'string') {
      return input;
    }
    try {
      const parsed: unknown = JSON.parse(input);
      return parsed;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidJsonError(`Invalid JSON input: ${reason}`, input);
    }
  }

  /** Translations for a container's fields, or null to use the English messages */
  getTranslations(_json: BaseJson): Translations | null {
    const locales = this.locales;
    if (locales === false) {
      return null;
    }

    if (!this.cacheTranslations) {
      return getTranslations(locales, this.logger);
    }

    const key = locales.join('|');
    let translations = DefaultMeta.translationsCache.get(key);
    if (!translations) {
      translations = getTranslations(locales, this.logger);
      DefaultMeta.translationsCache.set(key, translations);
    }
    return translations;
  }

  /**
   * Assign values onto this meta, overriding class defaults.
   *
   * @throws {ZodError} If `locales` or `cacheTranslations` has the wrong shape
   */
  updateValues(values: Readonly<Record<string, unknown>>): void {
    const parsed = metaValuesSchema.parse(values);
    for (const [key, value] of Object.entries(parsed)) {
      if (value !== undefined) {
        Reflect.set(this, key, value);
      }
    }
  }
}
