/**
 * Message translation for field and validator messages.
 *
 * Messages are written in English and looked up verbatim in a catalog.
 * Catalogs live in `locales/<language>.json` next to the package sources.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Logger } from '@jsonfields/logger';
import { z } from 'zod';

export interface Translations {
  gettext(message: string): string;
  ngettext(singular: string, plural: string, n: number): string;
}

/**
 * Passes English messages through untouched
 */
export class DummyTranslations implements Translations {
  gettext(message: string): string {
    return message;
  }

  ngettext(singular: string, plural: string, n: number): string {
    return n === 1 ? singular : plural;
  }
}

const catalogSchema = z.object({
  language: z.string().min(2),
  // "one": singular only for n = 1; "zero-one": singular for 0 and 1
  pluralRule: z.enum(['one', 'zero-one']).default('one'),
  messages: z.record(z.union([z.string(), z.tuple([z.string(), z.string()])])),
});

export type CatalogData = z.infer<typeof catalogSchema>;

export class MessageCatalog implements Translations {
  readonly language: string;
  private readonly pluralRule: CatalogData['pluralRule'];
  private readonly messages: CatalogData['messages'];

  constructor(data: CatalogData) {
    this.language = data.language;
    this.pluralRule = data.pluralRule;
    this.messages = data.messages;
  }

  gettext(message: string): string {
    const translated = this.messages[message];
    if (typeof translated === 'string') return translated;
    return translated ? translated[0] : message;
  }

  ngettext(singular: string, plural: string, n: number): string {
    const useSingular = this.pluralRule === 'one' ? n === 1 : n <= 1;
    const translated = this.messages[singular];
    if (translated === undefined) {
      return useSingular ? singular : plural;
    }
    if (typeof translated === 'string') return translated;
    return useSingular ? translated[0] : translated[1];
  }
}

const LOCALES_DIR = new URL('../../locales/', import.meta.url);

/**
 * Load the catalog for a single language, or null when none ships.
 * A malformed catalog file throws.
 */
export function loadCatalog(language: string): MessageCatalog | null {
  if (!/^[a-z]{2,3}$/.test(language)) {
    return null;
  }

  let text: string;
  try {
    text = readFileSync(fileURLToPath(new URL(`${language}.json`, LOCALES_DIR)), 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  return new MessageCatalog(catalogSchema.parse(JSON.parse(text)));
}

/**
 * Reduce `de_CH`, `de-CH` or `DE` to `de`
 */
export function languageOf(locale: string): string {
  return locale.split(/[-_]/)[0].toLowerCase();
}

/**
 * Resolve translations for an ordered list of locales.
 * The first locale with a catalog wins; without any, English passes through.
 */
export function getTranslations(locales: readonly string[], logger?: Logger): Translations {
  for (const locale of locales) {
    const catalog = loadCatalog(languageOf(locale));
    if (catalog) {
      logger?.debug('translations_loaded', { locale, language: catalog.language });
      return catalog;
    }
  }

  logger?.warn('translations_missing', { locales: [...locales] });
  return new DummyTranslations();
}
