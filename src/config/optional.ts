/**
 * A value that a configuration layer either set explicitly or never mentioned.
 *
 * `{ present: false }` means the layer did not mention the field.
 * `{ present: true, value }` means the layer set it, even to false, 0 or "".
 */
export type Optional<T> = { readonly present: false } | { readonly present: true; readonly value: T };

const ABSENT: Optional<never> = { present: false };

export function some<T>(value: T): Optional<T> {
  return { present: true, value };
}

export function none<T = never>(): Optional<T> {
  return ABSENT;
}

export function isPresent<T>(opt: Optional<T>): opt is { readonly present: true; readonly value: T } {
  return opt.present;
}

/**
 * Unwrap the value, or return the fallback when the field was never set.
 */
export function valueOr<T>(opt: Optional<T>, fallback: T): T {
  return opt.present ? opt.value : fallback;
}
