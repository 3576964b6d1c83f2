import type { BaseJson } from '../json/base-json.js';
import type { Field } from '../fields/field.js';

/** A plain function check; throw ValidationError or StopValidation to fail */
export type ValidatorFunction = (json: BaseJson, field: Field) => void;

/** A configurable check that can also mark the field with flags */
export interface ValidatorObject {
  readonly fieldFlags?: readonly string[];
  validate(json: BaseJson, field: Field): void;
}

export type Validator = ValidatorFunction | ValidatorObject;

export function runValidator(validator: Validator, json: BaseJson, field: Field): void {
  if (typeof validator === 'function') {
    validator(json, field);
  } else {
    validator.validate(json, field);
  }
}

export function fieldFlagsOf(validator: Validator): readonly string[] {
  return typeof validator === 'function' ? [] : validator.fieldFlags ?? [];
}
