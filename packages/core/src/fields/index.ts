export { Field, resolveDefault } from './field.js';
export { Flags } from './flags.js';
export { UnboundField } from './unbound-field.js';
export {
  BooleanField,
  FloatField,
  IntegerField,
  parseFloatValue,
  parseInteger,
  StringField,
} from './simple.js';
export type { BooleanFieldOptions } from './simple.js';
export { DateField, DateTimeField, TimeField } from './datetime.js';
export type { DateTimeFieldOptions } from './datetime.js';
export { ObjectField } from './object-field.js';
export { ListField } from './list-field.js';
export type { ListFieldOptions } from './list-field.js';
export type {
  BindOptions,
  FieldBinding,
  FieldError,
  FieldErrors,
  FieldOptions,
  Filter,
  JsonErrors,
  JsonInput,
} from './types.js';
