import path from 'path';
import { Command } from 'commander';
import type { AnalysisOptions } from './types';

export interface CliOptions {
  output: string;
  sort: boolean;
  dryRun: boolean;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('sensor-crosscheck')
    .description('Parse radar and image sensor logs, categorize radar detections and cross-check both sensors')
    .version('1.0.0');

  program
    .argument('[input]', 'Folder containing .txt sensor logs', 'input')
    .option('-o, --output <path>', 'Folder for the JSON reports (cleared before writing)', 'output')
    .option('--sort', 'Sort detections by timestamp and y before analysis', false)
    .option('--dry-run', 'Print the analysis without writing reports', false);

  return program;
}

function isSameOrInside(target: string, folder: string): boolean {
  const relative = path.relative(folder, target);
  if (relative === '') return true;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

export function validateAndProcessOptions(input: string, options: CliOptions): AnalysisOptions {
  const inputDir = input.trim();
  const outputDir = options.output.trim();

  if (inputDir === '') {
    throw new Error('Input folder must not be empty');
  }

  if (outputDir === '') {
    throw new Error('Output folder must not be empty');
  }

  // the output folder is emptied before writing, so it must not hold the logs
  if (isSameOrInside(path.resolve(inputDir), path.resolve(outputDir))) {
    throw new Error(`Output folder must not be the input folder or contain it: ${outputDir}`);
  }

  return {
    inputDir,
    outputDir,
    sort: options.sort,
    dryRun: options.dryRun
  };
}
