import type { BaseJson } from '../json/base-json.js';
import type { Field } from './field.js';
import type { BindOptions, FieldBinding } from './types.js';

let creationCounter = 0;

/**
 * A field declaration that hasn't been attached to a container yet.
 *
 * Containers bind declarations in the order they were created, so the
 * counter is global and only ever grows.
 */
export class UnboundField<F extends Field = Field> {
  readonly creationCounter: number;

  constructor(
    readonly fieldClass: abstract new (...args: never) => F,
    readonly args: readonly unknown[],
    private readonly factory: (binding: FieldBinding) => F,
  ) {
    creationCounter += 1;
    this.creationCounter = creationCounter;
  }

  bind(json: BaseJson | null, options: BindOptions): F {
    return this.factory({ ...options, json });
  }

  toString(): string {
    const described = this.args.map((arg) => {
      if (typeof arg === 'function') return arg.name || 'function';
      if (arg instanceof UnboundField) return arg.toString();
      if (typeof arg === 'object' && arg !== null) return `{${Object.keys(arg).join(', ')}}`;
      return JSON.stringify(arg);
    });
    return `<UnboundField(${this.fieldClass.name}${described.map((d) => `, ${d}`).join('')})>`;
  }
}
