import * as fs from 'fs';
import * as path from 'path';
import type { ConverterConfig } from '../types/types';

export type EncodingConfig = Pick<
  ConverterConfig,
  'videoCodec' | 'crf' | 'preset' | 'audioCodec' | 'audioBitrate' | 'overwrite'
>;

// Raw camera streams often lack timestamps and carry broken NAL units
const TOLERANT_INPUT_ARGS = [
  '-analyzeduration', '20M',
  '-probesize', '20M',
  '-fflags', '+genpts+igndts',
  '-err_detect', 'ignore_err',
];

// Fixed keyframe interval keeps seeking in the output predictable
const X264_STREAM_ARGS = ['-tune', 'zerolatency', '-x264opts', 'keyint=25:min-keyint=25:no-scenecut'];

export function buildVideoArgs(config: EncodingConfig): string[] {
  return ['-c:v', config.videoCodec, '-preset', config.preset, '-crf', String(config.crf)];
}

export function buildAudioArgs(includeAudio: boolean, config: EncodingConfig): string[] {
  return includeAudio ? ['-c:a', config.audioCodec, '-b:a', config.audioBitrate] : ['-an'];
}

function buildCompatibilityArgs(level: string): string[] {
  return ['-profile:v', 'main', '-level', level, '-pix_fmt', 'yuv420p', '-movflags', '+faststart'];
}

/**
 * Arguments (without the executable) converting one raw stream to MP4
 */
export function buildConvertArgs(
  input: string,
  output: string,
  includeAudio: boolean,
  config: EncodingConfig
): string[] {
  return [
    '-hide_banner',
    ...TOLERANT_INPUT_ARGS,
    '-i', input,
    ...buildVideoArgs(config),
    ...(config.videoCodec === 'libx264' ? X264_STREAM_ARGS : []),
    ...buildAudioArgs(includeAudio, config),
    ...buildCompatibilityArgs('4.0'),
    config.overwrite ? '-y' : '-n',
    '-strict', 'experimental',
    output,
  ];
}

/**
 * Arguments (without the executable) concatenating the files listed in a
 * manifest into one MP4
 */
export function buildMergeArgs(
  manifestPath: string,
  output: string,
  includeAudio: boolean,
  config: EncodingConfig
): string[] {
  return [
    '-hide_banner',
    '-f', 'concat',
    '-safe', '0',
    '-i', manifestPath,
    ...buildVideoArgs(config),
    ...buildAudioArgs(includeAudio, config),
    ...buildCompatibilityArgs('3.0'),
    config.overwrite ? '-y' : '-n',
    output,
  ];
}

export function getManifestPath(output: string): string {
  return `${output}.txt`;
}

/**
 * Concat demuxer list: one `file '<absolute path>'` line per input.
 * A quote inside a path is written as '\'' (close, escaped quote, reopen).
 */
export function formatManifest(inputs: string[]): string {
  return inputs
    .map((input) => `file '${path.resolve(input).replace(/'/g, "'\\''")}'`)
    .join('\n') + '\n';
}

export async function writeManifest(manifestPath: string, inputs: string[]): Promise<void> {
  await fs.promises.writeFile(manifestPath, formatManifest(inputs), 'utf8');
}
