import { EntryLimitError, FieldConfigurationError, PopulateError, ValidationError } from '../errors.js';
import type { BaseJson } from '../json/base-json.js';
import { getType, interpolate, isBlank, isUnset, UNSET } from '../utils.js';
import type { Validator } from '../validators/types.js';
import { Field, resolveDefault } from './field.js';
import type { FieldBinding, FieldOptions, JsonInput } from './types.js';
import type { UnboundField } from './unbound-field.js';

export interface ListFieldOptions extends FieldOptions {
  /** Blank entries are added until there are at least this many. Defaults to 0 */
  minEntries?: number;
  /** JSON input with more elements is rejected; adding more entries in code throws */
  maxEntries?: number;
}

/**
 * An ordered list of fields of one kind, with the list of their data as
 * its own data.
 *
 * @example
 * ```ts
 * class Article extends Json {
 *   static fields = {
 *     authors: ListField.unbound(StringField.unbound({ validators: [new DataRequired()] }), {
 *       minEntries: 1,
 *     }),
 *   };
 * }
 * ```
 */
export class ListField<F extends Field = Field> extends Field implements Iterable<F> {
  readonly unboundField: UnboundField<F>;
  readonly minEntries: number;
  readonly maxEntries: number | null;
  /** Index of the most recently added entry, -1 when there are none */
  lastIndex = -1;
  private entryList: F[] = [];
  private readonly entryPrefix: string;

  constructor(binding: FieldBinding, unboundField: UnboundField<F>, options: ListFieldOptions = {}) {
    super(binding, { ...options, default: options.default ?? [] });
    if (this.filters.length > 0) {
      throw new FieldConfigurationError(
        'ListField does not accept filters, declare them on the entry field',
      );
    }

    const minEntries = options.minEntries ?? 0;
    const maxEntries = options.maxEntries ?? null;
    if (!Number.isInteger(minEntries) || minEntries < 0) {
      throw new FieldConfigurationError('ListField minEntries must be a non-negative integer');
    }
    if (maxEntries !== null && (!Number.isInteger(maxEntries) || maxEntries < 1)) {
      throw new FieldConfigurationError('ListField maxEntries must be a positive integer');
    }
    if (maxEntries !== null && minEntries > maxEntries) {
      throw new FieldConfigurationError('ListField minEntries cannot exceed maxEntries');
    }

    this.unboundField = unboundField;
    this.minEntries = minEntries;
    this.maxEntries = maxEntries;
    this.entryPrefix = binding.prefix ?? '';
  }

  get entries(): readonly F[] {
    return this.entryList;
  }

  get length(): number {
    return this.entryList.length;
  }

  override get data(): unknown[] {
    return this.entryList.map((entry) => entry.data);
  }

  /** Entry at `index`; negative indices count from the end */
  at(index: number): F | undefined {
    return this.entryList.at(index);
  }

  [Symbol.iterator](): Iterator<F> {
    return this.entryList[Symbol.iterator]();
  }

  /**
   * Build entries from the JSON array under this field's name when the
   * input has one, else from the object data (or the default).
   */
  override process(jsondata: JsonInput | null, data: unknown = UNSET): void {
    this.processErrors = [];
    this.rawData = undefined;
    this.entryList = [];
    this.lastIndex = -1;

    if (jsondata && Object.hasOwn(jsondata, this.name)) {
      this.rawData = jsondata[this.name];
      try {
        this.processJsondata(this.rawData);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        this.processErrors.push(error.message);
      }
    } else {
      const objectData = isUnset(data) || isBlank(data) ? resolveDefault(this.default) : data;
      for (const item of this.toItems(objectData)) {
        this.appendEntry(item);
      }
    }

    while (this.entryList.length < this.minEntries) {
      this.appendEntry();
    }
  }

  /** Each element becomes the JSON input of a new entry */
  override processJsondata(value: unknown): void {
    if (!Array.isArray(value)) {
      throw new ValidationError(this.gettext('Not a valid list value'));
    }
    const items: readonly unknown[] = value;

    if (this.maxEntries !== null && items.length > this.maxEntries) {
      const message = this.ngettext(
        'Cannot have more than {max} entry.',
        'Cannot have more than {max} entries.',
        this.maxEntries,
      );
      throw new ValidationError(interpolate(message, { max: this.maxEntries }));
    }

    for (const item of items) {
      const entry = this.bindEntry();
      entry.process({ [entry.name]: item });
    }
  }

  override validate(json: BaseJson, extraValidators: readonly Validator[] = []): boolean {
    this.errorList = [...this.processErrors];

    for (const entry of this.entryList) {
      if (!entry.validate(json)) {
        this.errorList.push(entry.errors);
      }
    }

    this.runValidationChain(json, [...this.validators, ...extraValidators]);
    return this.errorList.length === 0;
  }

  /**
   * Add an entry processed with `data` (or the entry field's default).
   *
   * @throws {EntryLimitError} If the list already has maxEntries entries
   */
  appendEntry(data: unknown = UNSET): F {
    const entry = this.bindEntry();
    entry.process(null, data);
    return entry;
  }

  /**
   * Remove and return the last entry.
   *
   * @throws {RangeError} If the list is empty
   */
  popEntry(): F {
    const entry = this.entryList.pop();
    if (!entry) {
      throw new RangeError(`Cannot pop from empty ListField '${this.name}'`);
    }
    this.lastIndex -= 1;
    return entry;
  }

  /**
   * @throws {PopulateError} Always; list data has no single target to write into
   */
  override populateObj(_target: object, name: string): void {
    throw new PopulateError(`populateObj is not supported for ListField '${name}'`);
  }

  private bindEntry(): F {
    if (this.maxEntries !== null && this.entryList.length >= this.maxEntries) {
      throw new EntryLimitError(
        `ListField '${this.name}' cannot have more than ${this.maxEntries} entries`,
        this.maxEntries,
      );
    }

    this.lastIndex += 1;
    const entry = this.meta.bindField(null, this.unboundField, {
      name: this.shortName,
      prefix: this.entryPrefix,
      id: this.lastIndex,
      meta: this.meta,
      translations: this.translations,
    });
    this.entryList.push(entry);
    return entry;
  }

  private toItems(value: unknown): readonly unknown[] {
    if (value === null || value === undefined) {
      return [];
    }
    if (!Array.isArray(value)) {
      throw new TypeError(`ListField '${this.name}' data must be an array, got ${getType(value)}`);
    }
    return value;
  }
}
