import { createLogger, type Logger, type PcmEncoding } from '@sampleformat/utils';
import { unwrapConversion } from '../errors';
import type { Mono } from '../format/mono';
import { type SampleFormat, type SampleFormatType, tryFromPcm } from '../format/sample-format';
import type { Stereo } from '../format/stereo';

/** Time series of frames of one layout. */
export type Track<F extends SampleFormat<F>> = F[];
export type MonoTrack = Track<Mono>;
export type StereoTrack = Track<Stereo>;

export interface TrackCodecOptions {
  logger?: Logger;
}

type PcmArray = Uint8Array | Int16Array | Int32Array;

const defaultLogger = createLogger({ namespace: 'sampleformat:track', level: 'warn' });

/**
 * Split interleaved integer PCM into frames of `format`.
 * A partial frame at the end is dropped and reported through the logger.
 */
export function decodeTrack<F extends SampleFormat<F>>(
  format: SampleFormatType<F>,
  data: ArrayLike<number>,
  encoding: PcmEncoding,
  options: TrackCodecOptions = {},
): Track<F> {
  const logger = options.logger ?? defaultLogger;
  const channels = format.numSamples();
  const frames = Math.floor(data.length / channels);
  const dropped = data.length - frames * channels;
  if (dropped > 0) {
    logger.warn('dropping partial trailing frame', { encoding, channels, length: data.length, dropped });
  }

  const track: Track<F> = [];
  for (let i = 0; i < frames; i += 1) {
    const start = i * channels;
    const frame = Array.from({ length: channels }, (_, c) => data[start + c]);
    track.push(unwrapConversion(tryFromPcm(format, frame, encoding)));
  }
  logger.debug('decoded track', { encoding, channels, frames });
  return track;
}

const concatPcm = <A extends PcmArray>(chunks: A[], create: (length: number) => A): A => {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = create(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
};

/** Interleave every frame's integer representation, channel order preserved. */
export function encodeTrack<F extends SampleFormat<F>>(track: readonly F[], encoding: 'u8'): Uint8Array;
export function encodeTrack<F extends SampleFormat<F>>(track: readonly F[], encoding: 'i16'): Int16Array;
export function encodeTrack<F extends SampleFormat<F>>(track: readonly F[], encoding: 'i24'): Int32Array;
export function encodeTrack<F extends SampleFormat<F>>(track: readonly F[], encoding: PcmEncoding): PcmArray;
export function encodeTrack<F extends SampleFormat<F>>(track: readonly F[], encoding: PcmEncoding): PcmArray {
  switch (encoding) {
    case 'u8':
      return concatPcm(
        track.map((frame) => frame.toBytes()),
        (length) => new Uint8Array(length),
      );
    case 'i16':
      return concatPcm(
        track.map((frame) => frame.toInt16()),
        (length) => new Int16Array(length),
      );
    case 'i24':
      return concatPcm(
        track.map((frame) => frame.toInt24()),
        (length) => new Int32Array(length),
      );
  }
}

/** One sample per frame via {@link SampleFormat.intoSample}. */
export function mixdown<F extends SampleFormat<F>>(track: readonly F[]): Float32Array {
  return Float32Array.from(track, (frame) => frame.intoSample());
}
