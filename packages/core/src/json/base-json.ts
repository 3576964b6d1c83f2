/**
 * Imperative field container.
 *
 * `BaseJson` takes its field declarations at construction time. The
 * declarative `Json` builds on it by collecting declarations from static
 * class properties.
 */

import { InvalidJsonError } from '../errors.js';
import type { Field } from '../fields/field.js';
import type { FieldErrors, JsonErrors, JsonInput } from '../fields/types.js';
import type { UnboundField } from '../fields/unbound-field.js';
import type { Translations } from '../i18n/index.js';
import { DefaultMeta } from '../meta.js';
import { getType, hasProperty, isPlainObject, readProperty } from '../utils.js';
import type { Validator } from '../validators/types.js';

/** Field declarations keyed by name, or `[name, declaration]` pairs in order */
export type FieldDeclarations =
  | Readonly<Record<string, UnboundField>>
  | Iterable<readonly [string, UnboundField]>;

export interface BaseJsonOptions {
  /** Prepended to every field name, e.g. `billing-` */
  prefix?: string;
  meta?: DefaultMeta;
}

export interface ProcessOptions {
  /** Object whose properties supply field data; takes precedence over `data` */
  obj?: object | null;
  /** Field data keyed by field name */
  data?: Readonly<Record<string, unknown>> | null;
}

/** Extra validators per field name */
export type ExtraValidators = Readonly<Record<string, readonly Validator[]>>;

const PREFIX_SEPARATORS = '-_;:/.';

export function normalizePrefix(prefix: string): string {
  if (prefix && !PREFIX_SEPARATORS.includes(prefix[prefix.length - 1])) {
    return `${prefix}-`;
  }
  return prefix;
}

function isEntryList(fields: FieldDeclarations): fields is Iterable<readonly [string, UnboundField]> {
  return Symbol.iterator in fields;
}

export class BaseJson implements Iterable<Field> {
  readonly meta: DefaultMeta;
  readonly prefix: string;
  protected readonly fields = new Map<string, Field>();
  protected readonly translations: Translations | null;
  private cachedErrors: JsonErrors | null = null;

  constructor(fields: FieldDeclarations, options: BaseJsonOptions = {}) {
    this.meta = options.meta ?? new DefaultMeta();
    this.prefix = normalizePrefix(options.prefix ?? '');
    this.translations = this.meta.getTranslations(this);

    const entries = isEntryList(fields) ? [...fields] : Object.entries(fields);
    for (const [name, unboundField] of entries) {
      this.fields.set(
        name,
        this.meta.bindField(this, unboundField, {
          name,
          prefix: this.prefix,
          translations: this.translations,
        }),
      );
    }
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.fields.values();
  }

  /** Field names in declaration order */
  names(): string[] {
    return [...this.fields.keys()];
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  /**
   * @throws {RangeError} If there is no field with that name
   */
  get(name: string): Field {
    const field = this.fields.get(name);
    if (!field) {
      throw new RangeError(`No field named '${name}'`);
    }
    return field;
  }

  /**
   * Get a field narrowed to the class it was declared with.
   *
   * @throws {TypeError} If the field is of another class
   */
  field<F extends Field>(name: string, fieldClass: abstract new (...args: never[]) => F): F {
    const field = this.get(name);
    if (!(field instanceof fieldClass)) {
      throw new TypeError(`Field '${name}' is a ${field.type}, not a ${fieldClass.name}`);
    }
    return field;
  }

  /** Bind a declaration under `name`, replacing any field already there */
  set(name: string, unboundField: UnboundField): void {
    this.fields.set(
      name,
      this.meta.bindField(this, unboundField, {
        name,
        prefix: this.prefix,
        translations: this.translations,
      }),
    );
  }

  delete(name: string): boolean {
    return this.fields.delete(name);
  }

  /**
   * Feed input to every field.
   *
   * For each field, object data comes from `obj[name]` when the object has
   * that property, else from `data[name]`, else the field's default is used.
   *
   * @throws {InvalidJsonError} If the input is JSON text that doesn't parse, or isn't an object
   */
  process(jsondata?: unknown, options: ProcessOptions = {}): void {
    const input = this.wrapInput(jsondata);
    const { obj, data } = options;

    for (const [name, field] of this.fields) {
      if (obj && hasProperty(obj, name)) {
        field.process(input, readProperty(obj, name));
      } else if (data && Object.hasOwn(data, name)) {
        field.process(input, data[name]);
      } else {
        field.process(input);
      }
    }
  }

  /**
   * Validate every field.
   * @returns true if no field has errors
   */
  validate(extraValidators: ExtraValidators = {}): boolean {
    this.cachedErrors = null;
    let success = true;

    for (const [name, field] of this.fields) {
      const extra = Object.hasOwn(extraValidators, name) ? extraValidators[name] : [];
      if (!field.validate(this, extra)) {
        success = false;
      }
    }

    this.meta.logger.debug('json_validated', {
      json: this.constructor.name,
      valid: success,
      error_count: Object.keys(this.errors).length,
    });
    return success;
  }

  /** Field data keyed by field name */
  get data(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [name, field] of this.fields) {
      result[name] = field.data;
    }
    return result;
  }

  /** Errors of the fields that have any, keyed by field name */
  get errors(): JsonErrors {
    if (this.cachedErrors === null) {
      const result: Record<string, FieldErrors> = {};
      for (const [name, field] of this.fields) {
        if (hasErrors(field.errors)) {
          result[name] = field.errors;
        }
      }
      this.cachedErrors = result;
    }
    return this.cachedErrors;
  }

  /** Write every field's data onto `target` */
  populateObj(target: object): void {
    for (const [name, field] of this.fields) {
      field.populateObj(target, name);
    }
  }

  private wrapInput(jsondata: unknown): JsonInput | null {
    if (jsondata === undefined || jsondata === null) {
      return null;
    }
    const wrapped = this.meta.wrapJsondata(this, jsondata);
    if (wrapped === undefined || wrapped === null) {
      return null;
    }
    if (!isPlainObject(wrapped)) {
      throw new InvalidJsonError(
        `Expected a JSON object, got ${getType(wrapped)}`,
        typeof jsondata === 'string' ? jsondata : String(jsondata),
      );
    }
    return wrapped;
  }
}

export function hasErrors(errors: FieldErrors): boolean {
  return Array.isArray(errors) ? errors.length > 0 : Object.keys(errors).length > 0;
}
