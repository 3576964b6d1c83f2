// @jsonfields/core - declarative validation of JSON documents

export * from './errors.js';
export * from './fields/index.js';
export * from './json/index.js';
export * from './validators/index.js';
export * from './datetime/index.js';
export * from './i18n/index.js';
export { createDefaultLogger, DefaultMeta } from './meta.js';
export type { MetaValues } from './meta.js';
export { deepEqual, getType, interpolate, isBlank, isPlainObject, isUnset, UNSET } from './utils.js';
export type { Unset } from './utils.js';
