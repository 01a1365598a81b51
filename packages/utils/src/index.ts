export { dbToLinear, linearToDb } from './dsp/decibel';
export type { LogContext, LogEntry, Logger, LoggerOptions, LogLevel } from './logger';
export { createLogger, defaultOutput, noopLogger } from './logger';
export { clamp } from './number/clamp';
export { lerp } from './number/lerp';
export {
  type PcmEncoding,
  sampleFromI16,
  sampleFromI24,
  sampleFromU8,
  sampleToI16,
  sampleToI24,
  sampleToU8,
  signExtendI24,
} from './pcm/sample-codec';
