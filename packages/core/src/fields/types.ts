import type { DefaultMeta } from '../meta.js';
import type { BaseJson } from '../json/base-json.js';
import type { Translations } from '../i18n/index.js';
import type { Validator } from '../validators/types.js';

/** A decoded JSON object as handed to fields during processing */
export type JsonInput = Readonly<Record<string, unknown>>;

/** Errors of a nested container, keyed by field name */
export interface JsonErrors {
  readonly [name: string]: FieldErrors;
}

/** A field's errors: messages (and nested lists for list entries), or a nested container's errors */
export type FieldErrors = readonly FieldError[] | JsonErrors;

export type FieldError = string | FieldErrors;

/** Transforms processed data; may throw ValidationError */
export type Filter = (value: unknown) => unknown;

export interface FieldOptions {
  validators?: readonly Validator[];
  filters?: readonly Filter[];
  /** Help text, not used by validation */
  description?: string;
  id?: string;
  /** Value used when no object data is supplied; functions are called on each process */
  default?: unknown;
}

/** Supplied by the container (or a list field) when a declaration is bound */
export interface FieldBinding {
  json?: BaseJson | null;
  meta?: DefaultMeta | null;
  name: string;
  prefix?: string;
  translations?: Translations | null;
  id?: string | number;
}

export type BindOptions = Omit<FieldBinding, 'json'>;
