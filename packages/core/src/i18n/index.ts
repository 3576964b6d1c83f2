export {
  DummyTranslations,
  getTranslations,
  languageOf,
  loadCatalog,
  MessageCatalog,
} from './translations.js';
export type { CatalogData, Translations } from './translations.js';
