import { FieldConfigurationError } from '../errors.js';
import type { UnboundField } from '../fields/unbound-field.js';
import { DefaultMeta, type MetaValues } from '../meta.js';
import type { Validator, ValidatorFunction } from '../validators/types.js';
import { BaseJson, type ExtraValidators, type ProcessOptions } from './base-json.js';

export interface JsonOptions extends ProcessOptions {
  prefix?: string;
  /** Overrides for this instance's meta, see `DefaultMeta.updateValues` */
  meta?: MetaValues;
}

/**
 * Type of the static `fields` record. Annotate a container that other
 * containers extend with it, so subclasses may declare different names.
 */
export type JsonFields = Readonly<Record<string, UnboundField | null>>;

/** Type of the static `inlineValidators` record */
export type InlineValidators = Readonly<Record<string, ValidatorFunction>>;

/** Constructor of a declarative container, as taken by `ObjectField` */
export type JsonClass<J extends BaseJson = BaseJson> = new (jsondata?: unknown, options?: JsonOptions) => J;

function isJsonClass(value: unknown): value is typeof Json {
  return typeof value === 'function' && (value === Json || Json.isPrototypeOf(value));
}

/** Classes from `Json` down to `leaf` */
function classChain(leaf: typeof Json): (typeof Json)[] {
  const chain: (typeof Json)[] = [];
  let current: unknown = leaf;
  while (isJsonClass(current)) {
    chain.unshift(current);
    if (current === Json) break;
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

function byCreationOrder(
  [leftName, left]: readonly [string, UnboundField],
  [rightName, right]: readonly [string, UnboundField],
): number {
  if (left.creationCounter !== right.creationCounter) {
    return left.creationCounter - right.creationCounter;
  }
  if (leftName === rightName) return 0;
  return leftName < rightName ? -1 : 1;
}

/**
 * Declarative container.
 *
 * Fields are declared on the class and bound for each instance. A subclass
 * inherits its parents' fields and may override or remove them (by
 * declaring the name as `null`).
 *
 * @example
 * ```ts
 * class Address extends Json {
 *   static fields = {
 *     street: StringField.unbound({ validators: [new DataRequired()] }),
 *     zip: IntegerField.unbound(),
 *   };
 * }
 *
 * const address = new Address({ street: 'Main St', zip: '1234' });
 * address.validate(); // true
 * address.data; // { street: 'Main St', zip: 1234 }
 * ```
 */
export class Json extends BaseJson {
  static fields: JsonFields = {};

  /** Validators run after a field's own, keyed by field name */
  static inlineValidators: InlineValidators = {};

  static Meta: typeof DefaultMeta = DefaultMeta;

  /**
   * Field declarations of this class and its parents, in creation order.
   * Reads the static records on every call, so changes to them apply to
   * the next instance.
   */
  static unboundFields(): [string, UnboundField][] {
    const merged = new Map<string, UnboundField | null>();
    for (const jsonClass of classChain(this)) {
      if (!Object.hasOwn(jsonClass, 'fields')) continue;
      for (const [name, unboundField] of Object.entries(jsonClass.fields)) {
        merged.set(name, unboundField);
      }
    }

    const declared: [string, UnboundField][] = [];
    for (const [name, unboundField] of merged) {
      if (unboundField) declared.push([name, unboundField]);
    }
    return declared.sort(byCreationOrder);
  }

  /** Inline validators of this class and its parents; later classes win */
  static collectInlineValidators(): Map<string, ValidatorFunction> {
    const merged = new Map<string, ValidatorFunction>();
    for (const jsonClass of classChain(this)) {
      if (!Object.hasOwn(jsonClass, 'inlineValidators')) continue;
      for (const [name, validator] of Object.entries(jsonClass.inlineValidators)) {
        merged.set(name, validator);
      }
    }
    return merged;
  }

  private static createMeta(jsonClass: typeof Json, values: MetaValues | undefined): DefaultMeta {
    const meta = new jsonClass.Meta();
    if (values) {
      meta.updateValues(values);
    }
    return meta;
  }

  /**
   * Bind the declared fields and process the input.
   *
   * @param jsondata - A decoded JSON object or JSON text
   * @throws {InvalidJsonError} If the input can't be used as a JSON object
   */
  constructor(jsondata?: unknown, options: JsonOptions = {}) {
    super(new.target.unboundFields(), {
      prefix: options.prefix,
      meta: Json.createMeta(new.target, options.meta),
    });
    this.process(jsondata, { obj: options.obj, data: options.data });
  }

  /** The concrete class of this instance */
  get jsonClass(): typeof Json {
    const constructor: unknown = this.constructor;
    return isJsonClass(constructor) ? constructor : Json;
  }

  /**
   * @throws {FieldConfigurationError} Always; declare fields on the class instead
   */
  override set(name: string, _unboundField: UnboundField): void {
    throw new FieldConfigurationError(
      `Cannot add field '${name}' to a ${this.constructor.name} instance, declare it on the class`,
    );
  }

  /**
   * Validate every field, running inline validators after each field's own
   * and before any passed in `extraValidators`.
   */
  override validate(extraValidators: ExtraValidators = {}): boolean {
    const inline = this.jsonClass.collectInlineValidators();
    const extra: Record<string, readonly Validator[]> = { ...extraValidators };

    for (const name of this.names()) {
      const validator = inline.get(name);
      if (validator) {
        extra[name] = [validator, ...(extra[name] ?? [])];
      }
    }
    return super.validate(extra);
  }
}
