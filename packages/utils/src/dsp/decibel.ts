/** Amplitude ratio for a level in decibels: 10^(dB/20). */
export function dbToLinear(db: number): number {
  return 10 ** (db / 20);
}

/** Level in decibels for an amplitude ratio; -Infinity for 0. */
export function linearToDb(linear: number): number {
  return 20 * Math.log10(Math.abs(linear));
}
