#!/usr/bin/env node
import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import type { ConverterConfig, LogLevel } from '../core/types/types';
import { ConfigStore, isConfigKey } from '../core/config/config-store';
import { scanAndSort } from '../core/files/file-scanner';
import { TranscodeOperation } from '../core/ffmpeg/transcode-operation';
import { TaskQueue } from '../core/queue/task-queue';
import { ConvertMergePipeline } from '../core/queue/convert-merge-pipeline';
import { createCliContext, resolveFfmpegPath, RuntimeContext } from '../core/utils/ffmpeg-path';
import { detectFfmpeg } from '../core/utils/ffmpeg-detection';
import { debugLogger, isLogLevel } from '../core/utils/debug-logger';
import { ConsoleReporter } from './reporter';
import { WatchSession } from './watch';

interface CommonOptions {
  config?: string;
  logLevel?: string;
  ffmpeg?: string;
}

interface ConvertOptions extends CommonOptions {
  output?: string;
  workers?: string;
  audio?: boolean;
  merge?: boolean;
  keepIntermediate?: boolean;
  overwrite?: boolean;
  ext?: string;
  watch?: boolean;
}

const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

function loadConfig(options: CommonOptions, context: RuntimeContext): ConfigStore {
  debugLogger.initialize(context);

  let requestedLevel: LogLevel | undefined;
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new Error(`Invalid log level: ${options.logLevel} (expected debug, info, warn, error or silent)`);
    }
    requestedLevel = options.logLevel;
    debugLogger.setLevel(requestedLevel);
  }

  const configFile = options.config
    ? path.resolve(options.config)
    : path.join(context.userDataPath || context.appPath, 'config.yaml');
  const config = ConfigStore.load(configFile);

  // Command line takes precedence over the file
  debugLogger.setLevel(requestedLevel ?? config.get('logLevel'));
  return config;
}

function convertOverrides(options: ConvertOptions): Partial<ConverterConfig> {
  const overrides: Partial<ConverterConfig> = {};
  if (options.workers !== undefined) overrides.workers = Number(options.workers);
  if (options.audio) overrides.includeAudio = true;
  if (options.keepIntermediate) overrides.keepIntermediate = true;
  if (options.overwrite) overrides.overwrite = true;
  if (options.ext !== undefined) overrides.sourceExtension = options.ext.startsWith('.') ? options.ext : `.${options.ext}`;
  if (options.ffmpeg !== undefined) overrides.ffmpegPath = options.ffmpeg;
  return overrides;
}

function printBanner(lines: Array<[string, string]>): void {
  console.log('');
  console.log('╔══════════════════════════════════════════════════════════════╗');
  console.log('║                  V264 to MP4 Converter                       ║');
  console.log('╚══════════════════════════════════════════════════════════════╝');
  console.log('');
  for (const [label, value] of lines) {
    console.log(`  ${`${label}:`.padEnd(13)}${value}`);
  }
  console.log('');
}

async function runConvert(source: string, options: ConvertOptions): Promise<number> {
  const context = createCliContext();
  const config = loadConfig(options, context);
  config.override(convertOverrides(options));

  const sourceDir = path.resolve(source);
  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    console.error(`Error: Source directory does not exist: ${sourceDir}`);
    return EXIT_FAILURE;
  }

  const outputDir = options.output ? path.resolve(options.output) : config.resolveOutputDirectory(sourceDir);
  const ffmpegPath = resolveFfmpegPath(config.get('ffmpegPath'), context);
  const merge = Boolean(options.merge);

  printBanner([
    ['Source', sourceDir],
    ['Output', outputDir],
    ['ffmpeg', ffmpegPath],
    ['Workers', String(config.get('workers'))],
    ['Audio', config.get('includeAudio') ? 'Included' : 'Removed'],
    ['Merge', merge ? 'Enabled' : 'Disabled'],
    ['Watch Mode', options.watch ? 'Enabled' : 'Disabled'],
    ['Log File', debugLogger.getLogFilePath() ?? 'Disabled'],
  ]);

  const reporter: ConsoleReporter = new ConsoleReporter(() => queue.getOverallProgress());
  const queue = new TaskQueue({
    executor: new TranscodeOperation({ config, ffmpegPath }),
    workerCount: config.get('workers'),
    ...reporter.callbacks(),
  });
  const pipeline = new ConvertMergePipeline(queue);

  if (options.watch) {
    return runWatch(sourceDir, outputDir, config, pipeline, reporter, merge);
  }

  const files = scanAndSort(sourceDir, config.get('sourceExtension'));
  if (files.length === 0) {
    console.log(`[Info] No *${config.get('sourceExtension')} files found in ${sourceDir}`);
    return 0;
  }
  console.log(`[Info] Found ${files.length} file(s) to convert\n`);

  let interrupted = false;
  const onSignal = (signal: NodeJS.Signals): void => {
    if (interrupted) {
      console.error(`\n[Shutdown] Received ${signal} again, exiting immediately`);
      process.exit(EXIT_INTERRUPTED);
    }
    interrupted = true;
    console.log(`\n[Shutdown] Received ${signal}, cancelling (waiting for running conversions to stop)...`);
    pipeline.cancel();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const result = await pipeline.run(files, outputDir, {
      includeAudio: config.get('includeAudio'),
      merge,
      keepIntermediate: config.get('keepIntermediate'),
      sourceRoot: sourceDir,
    });

    reporter.printSummary(result.conversion, 'Convert');
    if (result.merge) {
      reporter.printSummary(result.merge, 'Merge');
      if (result.merge.completed === 1 && result.mergedOutput) {
        console.log(`  Merged file: ${result.mergedOutput}`);
      }
    }

    if (interrupted || result.conversion.wasCancelled) return EXIT_INTERRUPTED;
    const failed = result.conversion.failed + (result.merge ? result.merge.failed : 0);
    return failed > 0 ? EXIT_FAILURE : 0;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

function runWatch(
  sourceDir: string,
  outputDir: string,
  config: ConfigStore,
  pipeline: ConvertMergePipeline,
  reporter: ConsoleReporter,
  merge: boolean
): Promise<number> {
  if (merge) {
    debugLogger.warn('[Watch] --merge is ignored in watch mode');
  }

  const session = new WatchSession({
    directory: sourceDir,
    extension: config.get('sourceExtension'),
    outputDir,
    includeAudio: config.get('includeAudio'),
    pipeline,
    onBatch: (result) => reporter.printSummary(result.conversion, 'Watch'),
  });

  return new Promise<number>((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      console.log(`\n\n[Shutdown] Received ${signal}...`);
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      void session
        .stop()
        .catch((error) => {
          debugLogger.error('[Shutdown] Error while stopping watcher', error);
        })
        .finally(() => {
          const totals = reporter.getTotals();
          console.log(`\n  Totals: ${totals.completed} converted, ${totals.failed} failed`);
          resolve(totals.failed > 0 ? EXIT_FAILURE : 0);
        });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    session.start();
    console.log('[Watch] Press Ctrl+C to stop\n');
  });
}

async function runCheck(options: CommonOptions): Promise<number> {
  const context = createCliContext();
  const config = loadConfig(options, context);
  const ffmpegPath = resolveFfmpegPath(options.ffmpeg ?? config.get('ffmpegPath'), context);

  const result = await detectFfmpeg(ffmpegPath, {
    videoCodec: config.get('videoCodec'),
    audioCodec: config.get('audioCodec'),
  });

  console.log(`ffmpeg:        ${result.executable}`);
  if (!result.available) {
    console.error(`Status:        not available (${result.error ?? 'unknown error'})`);
    return EXIT_FAILURE;
  }
  console.log(`Version:       ${result.version ?? 'unknown'}`);
  console.log(`Video encoder: ${config.get('videoCodec')} ${result.videoEncoderAvailable ? 'available' : 'MISSING'}`);
  console.log(`Audio encoder: ${config.get('audioCodec')} ${result.audioEncoderAvailable ? 'available' : 'MISSING'}`);
  return result.videoEncoderAvailable ? 0 : EXIT_FAILURE;
}

function runConfigGet(key: string | undefined, options: CommonOptions): number {
  const config = loadConfig(options, createCliContext());
  if (key === undefined) {
    console.log(`# ${config.getFilePath() ?? 'defaults'}`);
    process.stdout.write(yaml.stringify(config.getAll()));
    return 0;
  }
  if (!isConfigKey(key)) {
    console.error(`Unknown config key: ${key}`);
    return EXIT_FAILURE;
  }
  console.log(String(config.get(key)));
  return 0;
}

function runConfigSet(key: string, value: string, options: CommonOptions): number {
  if (!isConfigKey(key)) {
    console.error(`Unknown config key: ${key}`);
    return EXIT_FAILURE;
  }
  const config = loadConfig(options, createCliContext());
  try {
    config.setFromString(key, value);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return EXIT_FAILURE;
  }
  console.log(`${key} = ${String(config.get(key))}`);
  return 0;
}

const program = new Command();

program
  .name('v264-convert')
  .description('Batch convert .v264 camera recordings to MP4 with ffmpeg')
  .version('1.0.0');

program
  .command('convert')
  .description('Convert every recording in a directory, optionally merging the results')
  .argument('<source>', 'Directory containing the recordings')
  .option('-o, --output <dir>', 'Output directory (default: the configured directory, relative to <source>)')
  .option('-c, --config <file>', 'Path to YAML config file')
  .option('-w, --workers <num>', 'Number of files to convert simultaneously')
  .option('--audio', 'Keep the audio track', false)
  .option('--merge', 'Merge the converted files into one MP4', false)
  .option('--keep-intermediate', 'Keep per-file MP4s after merging', false)
  .option('--overwrite', 'Overwrite existing output files', false)
  .option('--ext <extension>', 'Source file extension')
  .option('--ffmpeg <path>', 'Path to the ffmpeg executable')
  .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
  .option('--watch', 'Keep running and convert new files as they appear', false)
  .action(async (source: string, options: ConvertOptions) => {
    process.exit(await runConvert(source, options));
  });

program
  .command('check')
  .description('Check that ffmpeg can be launched and has the configured encoders')
  .option('-c, --config <file>', 'Path to YAML config file')
  .option('--ffmpeg <path>', 'Path to the ffmpeg executable')
  .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
  .action(async (options: CommonOptions) => {
    process.exit(await runCheck(options));
  });

const configCommand = program.command('config').description('Read or change persisted settings');

configCommand
  .command('get')
  .description('Print one setting, or all of them')
  .argument('[key]', 'Setting name')
  .option('-c, --config <file>', 'Path to YAML config file')
  .action((key: string | undefined, options: CommonOptions) => {
    process.exit(runConfigGet(key, options));
  });

configCommand
  .command('set')
  .description('Change one setting and save the config file')
  .argument('<key>', 'Setting name')
  .argument('<value>', 'New value')
  .option('-c, --config <file>', 'Path to YAML config file')
  .action((key: string, value: string, options: CommonOptions) => {
    process.exit(runConfigSet(key, value, options));
  });

program.parseAsync().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  debugLogger.error('Fatal error', error);
  process.exit(EXIT_FAILURE);
});
