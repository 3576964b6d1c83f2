export {
  AnyOf,
  DataRequired,
  Email,
  EqualTo,
  InputRequired,
  IPAddress,
  isValidHostname,
  Length,
  NoneOf,
  NumberRange,
  Optional,
  Regexp,
  URL,
  UUID,
} from './validators.js';
export type {
  ChoiceOptions,
  IPAddressOptions,
  MessageOptions,
  OptionalOptions,
  RangeOptions,
  RegexpOptions,
  URLOptions,
} from './validators.js';
export { fieldFlagsOf, runValidator } from './types.js';
export type { Validator, ValidatorFunction, ValidatorObject } from './types.js';
