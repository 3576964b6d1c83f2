import { FieldConfigurationError, PopulateError } from '../errors.js';
import type { BaseJson } from '../json/base-json.js';
import type { JsonClass } from '../json/json.js';
import { isPlainObject, isUnset, readProperty, UNSET } from '../utils.js';
import type { Validator } from '../validators/types.js';
import { Field, resolveDefault } from './field.js';
import type { FieldBinding, FieldErrors, FieldOptions, JsonInput } from './types.js';

/**
 * Nest a container inside another one.
 *
 * The JSON value under the field's name is handed to a fresh instance of
 * `jsonClass`; data and errors are those of that instance. Validators
 * belong on the nested class, so this field takes none.
 */
export class ObjectField<J extends BaseJson = BaseJson> extends Field implements Iterable<Field> {
  readonly jsonClass: JsonClass<J>;
  private inner: J | null = null;
  private fallback: unknown = null;

  constructor(binding: FieldBinding, jsonClass: JsonClass<J>, options: FieldOptions = {}) {
    super(binding, options);
    if (this.filters.length > 0) {
      throw new FieldConfigurationError(
        'ObjectField cannot take filters, the nested data is processed by its own fields',
      );
    }
    if (this.validators.length > 0) {
      throw new FieldConfigurationError(
        'ObjectField does not accept validators, declare them on the nested Json class',
      );
    }
    this.jsonClass = jsonClass;
  }

  /**
   * The nested container
   *
   * @throws {Error} If the field hasn't been processed yet
   */
  get json(): J {
    if (!this.inner) {
      throw new Error(`ObjectField '${this.name}' has not been processed`);
    }
    return this.inner;
  }

  override get data(): Record<string, unknown> | null {
    return this.inner ? this.inner.data : null;
  }

  override get errors(): FieldErrors {
    if (this.errorList.length > 0 || !this.inner) {
      return this.errorList;
    }
    return this.inner.errors;
  }

  override process(jsondata: JsonInput | null, data: unknown = UNSET): void {
    this.processErrors = [];
    this.errorList = [];
    this.rawData = undefined;
    this.fallback = null;

    let objectData = data;
    if (isUnset(objectData)) {
      objectData = resolveDefault(this.default);
      this.fallback = objectData;
    }

    let nested: JsonInput | null = null;
    if (jsondata && Object.hasOwn(jsondata, this.name)) {
      this.rawData = jsondata[this.name];
      if (isPlainObject(this.rawData)) {
        nested = this.rawData;
      } else if (this.rawData !== null) {
        this.processErrors.push(this.gettext('Not a valid object value'));
      }
    }

    const obj = typeof objectData === 'object' && objectData !== null ? objectData : null;
    this.inner = new this.jsonClass(nested, { obj });
  }

  /**
   * Validate the nested container.
   *
   * @throws {FieldConfigurationError} If extra or inline validators are given for this field
   */
  override validate(_json: BaseJson, extraValidators: readonly Validator[] = []): boolean {
    if (extraValidators.length > 0) {
      throw new FieldConfigurationError(
        'ObjectField does not accept inline validators, its errors come from the nested Json',
      );
    }
    this.errorList = [...this.processErrors];
    if (this.errorList.length > 0) {
      return false;
    }
    return this.json.validate();
  }

  /**
   * Populate `target[name]`, or the field's default object when the target
   * has none (the default is then assigned to `target[name]`).
   */
  override populateObj(target: object, name: string): void {
    const existing = readProperty(target, name);
    let candidate: object;

    if (typeof existing === 'object' && existing !== null) {
      candidate = existing;
    } else if (existing == null && typeof this.fallback === 'object' && this.fallback !== null) {
      candidate = this.fallback;
      Reflect.set(target, name, candidate);
    } else {
      throw new PopulateError(
        `populateObj: no object to populate for '${name}' on the target or in the field default`,
      );
    }

    this.json.populateObj(candidate);
  }

  get(name: string): Field {
    return this.json.get(name);
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.json[Symbol.iterator]();
  }
}
