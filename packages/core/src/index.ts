export { ConversionError, type ConversionResult, conversionErr, conversionOk, isConversionError, unwrapConversion } from './errors';
export { Mono, monoFormat, monoPanner } from './format/mono';
export {
  DEFAULT_CENTER_DB,
  DEFAULT_FLOOR_DB,
  DEFAULT_PAN_LAW,
  type PanGains,
  type PanLawOptions,
  panGains,
  type ResolvedPanLaw,
  resolvePanLaw,
} from './format/pan-law';
export { type Panner, type SampleFormat, type SampleFormatType, tryFromPcm } from './format/sample-format';
export {
  createStereoPanner,
  type PanPrecision,
  Stereo,
  stereoFormat,
  stereoPanner,
  stereoPannerF32,
} from './format/stereo';
export { Gain, type Sample, toSample } from './sample';
export {
  decodeTrack,
  encodeTrack,
  mixdown,
  type MonoTrack,
  type StereoTrack,
  type Track,
  type TrackCodecOptions,
} from './track/track';
