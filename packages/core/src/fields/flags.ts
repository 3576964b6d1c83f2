/**
 * Boolean markers set by validators (`required`, `optional`).
 * Unknown flags read as false.
 */
export class Flags {
  private readonly values = new Map<string, boolean>();

  get(name: string): boolean {
    return this.values.get(name) ?? false;
  }

  set(name: string, value = true): void {
    this.values.set(name, value);
  }

  has(name: string): boolean {
    return this.get(name);
  }

  /** Names of the flags that are currently set */
  names(): string[] {
    return [...this.values].filter(([, value]) => value).map(([name]) => name);
  }

  toString(): string {
    return `<Flags: {${this.names().join(', ')}}>`;
  }
}
