import type { PcmEncoding } from '@sampleformat/utils';

/** A fixed-width format was built from an integer sequence shorter than its channel count. */
export class ConversionError extends Error {
  readonly name = 'ConversionError';
  readonly cause?: unknown;
  readonly ts = Date.now();
  constructor(
    public readonly actual: number,
    public readonly required: number,
    public readonly encoding: PcmEncoding,
    cause?: unknown,
  ) {
    super(`ERROR: Given vector was length ${actual}. This function requires length ${required}.`);
    this.cause = cause;
  }
}

export type ConversionResult<F> =
  | { readonly ok: true; readonly value: F }
  | { readonly ok: false; readonly error: ConversionError };

export const conversionOk = <F>(value: F): ConversionResult<F> => ({ ok: true, value });

export const conversionErr = <F>(error: ConversionError): ConversionResult<F> => ({ ok: false, error });

/** Return the converted value or throw the carried {@link ConversionError}. */
export function unwrapConversion<F>(result: ConversionResult<F>): F {
  if (result.ok) return result.value;
  throw result.error;
}

export function isConversionError(err: unknown): err is ConversionError {
  return err instanceof ConversionError;
}
