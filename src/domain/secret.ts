export const SECRET_MASK = '**********';

/**
 * Wraps a sensitive string so that every implicit rendering (string
 * coercion, JSON, util.inspect) yields {@link SECRET_MASK}.
 * The raw value is only returned by {@link Secret.reveal}.
 */
export class Secret {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
    Object.freeze(this);
  }

  reveal(): string {
    return this.#value;
  }

  get length(): number {
    return this.#value.length;
  }

  toString(): string {
    return SECRET_MASK;
  }

  toJSON(): string {
    return SECRET_MASK;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return `Secret(${SECRET_MASK})`;
  }
}
