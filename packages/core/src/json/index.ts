export { BaseJson, hasErrors, normalizePrefix } from './base-json.js';
export type { BaseJsonOptions, ExtraValidators, FieldDeclarations, ProcessOptions } from './base-json.js';
export { Json } from './json.js';
export type { InlineValidators, JsonClass, JsonFields, JsonOptions } from './json.js';
