import type { SortMode } from '../domain/timelapse/index.js';
import {
  CreateTimelapseCommand,
  resolutionSchema,
  secondsPerImageSchema,
  type TimelapseListeners,
  type TimelapsePlan,
  type TimelapseResult,
} from '../application/timelapse/index.js';
import { AppError } from '../shared/errors/app-error.js';
import { formatSeconds } from '../shared/media/frameTiming.js';
import { bytesToMegabytes } from '../shared/media/numberUtils.js';

import { type OutputStream, ProgressDisplay } from './progress-display.js';

export const DEFAULT_SECONDS_PER_IMAGE = 2.0;

export interface Prompter {
  ask(question: string): Promise<string>;
}

export interface TimelapseRunner {
  prepare(command: CreateTimelapseCommand): Promise<TimelapsePlan>;
  execute(plan: TimelapsePlan, listeners?: TimelapseListeners): Promise<TimelapseResult>;
}

export interface WizardDependencies {
  readonly prompter: Prompter;
  readonly runner: TimelapseRunner;
  readonly directoryExists: (directory: string) => Promise<boolean>;
  readonly out: OutputStream;
}

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/**
 * Interactive front end. Every invalid answer ends the session before any
 * image is touched.
 */
export class TimelapseWizard {
  private readonly prompter: Prompter;

  private readonly runner: TimelapseRunner;

  private readonly directoryExists: (directory: string) => Promise<boolean>;

  private readonly out: OutputStream;

  public constructor(dependencies: WizardDependencies) {
    this.prompter = dependencies.prompter;
    this.runner = dependencies.runner;
    this.directoryExists = dependencies.directoryExists;
    this.out = dependencies.out;
  }

  public async run(): Promise<number> {
    this.print('✨ Welcome to stillmotion ✨');
    this.print('Turn a folder of photos into a timelapse video in a few steps.');

    const sourceDir = (await this.ask('📂 Path to the folder with your images: ')).trim();
    if (!(await this.directoryExists(sourceDir))) {
      return this.abort('The specified folder does not exist!');
    }

    this.print('\n📑 How should the images be sorted?');
    this.print('1) By filename (default)');
    this.print('2) By date/time');
    const sortMode = parseSortChoice(await this.ask('Enter your choice (1 or 2): '));

    const durationAnswer = (
      await this.ask('\n⏱️ Seconds per photo (e.g. 2.0 for two seconds): ')
    ).trim();
    const secondsPerImage = secondsPerImageSchema.safeParse(
      durationAnswer === '' ? DEFAULT_SECONDS_PER_IMAGE : parseDecimal(durationAnswer),
    );
    if (!secondsPerImage.success) {
      return this.abort('Please enter a valid positive number!');
    }

    this.print('\n📏 Recommended video resolutions:');
    this.print('- HD (1280x720): good balance of quality and file size');
    this.print('- Full HD (1920x1080): higher quality, larger file');
    const resolutionAnswer = (
      await this.ask('\nEnter the resolution (e.g. 1280x720) or press Enter to keep original size: ')
    ).trim();
    let resolution: string | undefined;
    if (resolutionAnswer !== '') {
      const parsed = resolutionSchema.safeParse(resolutionAnswer);
      if (!parsed.success) {
        return this.abort("Invalid size format. Use 'widthxheight' (e.g. 1280x720).");
      }
      resolution = resolutionAnswer;
    }

    const fileName = (await this.ask('\n🖋️ Name for the video file (without extension): ')).trim();
    if (fileName === '') {
      return this.abort('File name cannot be empty!');
    }

    const outputDir = (await this.ask('📂 Folder where the video should be saved: ')).trim();
    if (!(await this.directoryExists(outputDir))) {
      return this.abort('The specified folder does not exist!');
    }

    this.print('\n📥 Collecting your images...');
    let plan: TimelapsePlan;
    try {
      plan = await this.runner.prepare(
        new CreateTimelapseCommand({
          sourceDir,
          sortMode,
          secondsPerImage: secondsPerImage.data,
          resolution,
          fileName,
          outputDir,
        }),
      );
    } catch (error) {
      return this.abort(describeError(error));
    }

    this.print('\n📊 Summary:');
    this.print(`- Total images: ${plan.summary.totalImages}`);
    this.print(`- Duration per image: ${plan.summary.secondsPerImage} seconds`);
    this.print(`- Estimated video duration: ${formatSeconds(plan.summary.totalDurationSeconds)} seconds`);

    const confirmation = (await this.ask('\n✅ Ready to begin processing? (y/n): ')).trim().toLowerCase();
    if (confirmation !== 'y') {
      this.print('🛑 Processing canceled. Goodbye!');
      return EXIT_OK;
    }

    const display = new ProgressDisplay(this.out);
    let result: TimelapseResult;
    try {
      result = await this.runner.execute(plan, {
        onProgress: display.update,
        onFallback: (primaryFailure) => {
          display.finish();
          this.print(
            `⚠️ ffmpeg method failed, falling back to the in-process writer: ${primaryFailure.message}`,
          );
        },
      });
    } catch (error) {
      display.finish();
      this.print(`\n❌ Error during video creation: ${describeError(error)}`);
      return EXIT_FAILURE;
    }
    display.finish();

    this.print('\n🌟 Success! Your video has been created:');
    this.print(`📍 Location: ${result.outputPath}`);
    this.print(`⏱️ Duration: ${formatSeconds(result.totalDurationSeconds)} seconds`);
    this.print(`🖼️ Total frames: ${result.totalImages}`);
    this.print(`📦 File size: ${bytesToMegabytes(result.fileSizeBytes).toFixed(1)} MB`);

    return EXIT_OK;
  }

  private async ask(question: string): Promise<string> {
    return this.prompter.ask(question);
  }

  private print(line: string): void {
    this.out.write(`${line}\n`);
  }

  private abort(message: string): number {
    this.print(`❌ Error: ${message}`);
    return EXIT_FAILURE;
  }
}

export function parseSortChoice(answer: string): SortMode {
  return answer.trim() === '2' ? 'mtime' : 'name';
}

/** Plain decimal notation only; anything else is NaN. */
export function parseDecimal(answer: string): number {
  return DECIMAL_PATTERN.test(answer) ? Number.parseFloat(answer) : Number.NaN;
}

function describeError(error: unknown): string {
  const appError = AppError.fromUnknown(error);
  return appError.exposeMessage ? appError.message : `Unexpected failure (${appError.code}): ${appError.message}`;
}
