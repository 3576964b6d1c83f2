/**
 * Field base class.
 *
 * A field is bound to a container under a name, receives object data and
 * JSON input through `process()`, and collects error messages in
 * `validate()`. Subclasses customise coercion through `processData`,
 * `processJsondata` and `processMissing`, and add checks through
 * `preValidate` and `postValidate` rather than overriding `validate`.
 */

import type { BaseJson } from '../json/base-json.js';
import type { DefaultMeta } from '../meta.js';
import { DummyTranslations, type Translations } from '../i18n/index.js';
import { StopValidation, FieldConfigurationError, ValidationError } from '../errors.js';
import { isBlank, isUnset, UNSET } from '../utils.js';
import { fieldFlagsOf, runValidator, type Validator } from '../validators/types.js';
import { Flags } from './flags.js';
import { UnboundField } from './unbound-field.js';
import type { FieldBinding, FieldError, FieldErrors, FieldOptions, Filter, JsonInput } from './types.js';

const DEFAULT_TRANSLATIONS = new DummyTranslations();

export function resolveDefault(value: unknown): unknown {
  if (typeof value === 'function') {
    const produced: unknown = value();
    return produced;
  }
  return value;
}

export abstract class Field {
  readonly name: string;
  readonly shortName: string;
  readonly id: string;
  readonly type: string;
  readonly description: string;
  readonly default: unknown;
  readonly filters: readonly Filter[];
  readonly validators: readonly Validator[];
  readonly flags = new Flags();
  readonly meta: DefaultMeta;
  protected readonly translations: Translations;

  /** The value exactly as it appeared in the JSON input; undefined when absent */
  rawData: unknown = undefined;
  processErrors: string[] = [];
  protected errorList: FieldError[] = [];
  private current: unknown = null;

  /**
   * Declare a field for a container. The arguments are the field's own
   * constructor arguments after the binding.
   *
   * @example
   * ```ts
   * class Signup extends Json {
   *   static fields = {
   *     email: StringField.unbound({ validators: [new DataRequired(), new Email()] }),
   *     tags: ListField.unbound(StringField.unbound(), { maxEntries: 5 }),
   *   };
   * }
   * ```
   */
  static unbound<F extends Field, A extends unknown[]>(
    this: new (binding: FieldBinding, ...args: A) => F,
    ...args: A
  ): UnboundField<F> {
    return new UnboundField(this, args, (binding) => new this(binding, ...args));
  }

  constructor(binding: FieldBinding, options: FieldOptions = {}) {
    if (binding.meta) {
      this.meta = binding.meta;
    } else if (binding.json) {
      this.meta = binding.json.meta;
    } else {
      throw new FieldConfigurationError('Must provide one of json or meta when binding a field');
    }

    this.translations = binding.translations ?? DEFAULT_TRANSLATIONS;
    this.default = options.default ?? null;
    this.description = options.description ?? '';
    this.filters = [...(options.filters ?? [])];
    this.validators = [...(options.validators ?? [])];
    this.shortName = binding.name;
    this.name = (binding.prefix ?? '') + binding.name;
    this.type = this.constructor.name;
    this.id = binding.id !== undefined ? String(binding.id) : options.id ?? this.name;

    for (const validator of this.validators) {
      for (const flag of fieldFlagsOf(validator)) {
        this.flags.set(flag);
      }
    }
  }

  get data(): unknown {
    return this.current;
  }

  set data(value: unknown) {
    this.current = value;
  }

  /** Errors recorded by the last `validate()` */
  get errors(): FieldErrors {
    return this.errorList;
  }

  /** Drop errors recorded so far in the current validation */
  clearErrors(): void {
    this.errorList = [];
  }

  /** The display value; plain fields show their data */
  value(): unknown {
    return this.data;
  }

  toString(): string {
    return String(this.value());
  }

  gettext(message: string): string {
    return this.translations.gettext(message);
  }

  ngettext(singular: string, plural: string, n: number): string {
    return this.translations.ngettext(singular, plural, n);
  }

  /**
   * Validate the field and record errors.
   * Usually called by the container's `validate()`.
   */
  validate(json: BaseJson, extraValidators: readonly Validator[] = []): boolean {
    this.errorList = [...this.processErrors];
    let stopped = false;

    try {
      this.preValidate(json);
    } catch (error) {
      if (error instanceof StopValidation) {
        if (error.message) this.errorList.push(error.message);
        stopped = true;
      } else if (error instanceof ValidationError) {
        this.errorList.push(error.message);
      } else {
        throw error;
      }
    }

    if (!stopped) {
      stopped = this.runValidationChain(json, [...this.validators, ...extraValidators]);
    }

    try {
      this.postValidate(json, stopped);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      this.errorList.push(error.message);
    }

    return this.errorList.length === 0;
  }

  /**
   * Run validators in order until one stops the chain.
   * @returns true if the chain was stopped
   */
  protected runValidationChain(json: BaseJson, validators: readonly Validator[]): boolean {
    for (const validator of validators) {
      try {
        runValidator(validator, json, this);
      } catch (error) {
        if (error instanceof StopValidation) {
          if (error.message) this.errorList.push(error.message);
          return true;
        }
        if (!(error instanceof ValidationError)) throw error;
        this.errorList.push(error.message);
      }
    }
    return false;
  }

  /** Runs before the validators; StopValidation skips them */
  preValidate(_json: BaseJson): void {}

  /** Runs after the validators, even when the chain was stopped */
  postValidate(_json: BaseJson, _validationStopped: boolean): void {}

  /**
   * Take object data (or the default) and then JSON input, then run filters.
   * Problems with the input end up in `processErrors`.
   */
  process(jsondata: JsonInput | null, data: unknown = UNSET): void {
    this.processErrors = [];
    this.rawData = undefined;

    this.processData(isUnset(data) ? resolveDefault(this.default) : data);

    if (jsondata) {
      if (Object.hasOwn(jsondata, this.name)) {
        this.rawData = jsondata[this.name];
        try {
          this.processJsondata(this.rawData);
        } catch (error) {
          if (!(error instanceof ValidationError)) throw error;
          this.processErrors.push(error.message);
        }
      } else if (isBlank(this.data)) {
        this.processMissing();
      }
    }

    try {
      for (const filter of this.filters) {
        this.data = filter(this.data);
      }
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      this.processErrors.push(error.message);
    }
  }

  /** Store object data supplied by the caller or the default */
  processData(value: unknown): void {
    this.data = value;
  }

  /** Coerce a value from the JSON input; throw ValidationError when it can't be used */
  processJsondata(value: unknown): void {
    this.data = value;
  }

  /** Called when the JSON input lacks this field and no data was supplied */
  processMissing(): void {}

  /** Write this field's data onto `target[name]` */
  populateObj(target: object, name: string): void {
    Reflect.set(target, name, this.data);
  }
}
