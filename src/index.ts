#!/usr/bin/env node

import path from 'path';
import { createCLI, validateAndProcessOptions } from './cli';
import type { CliOptions } from './cli';
import { analyzeLogs } from './pipeline';
import { ReportExporter } from './report/exporter';
import type { AnalysisOptions } from './types';

async function main(): Promise<void> {
  const program = createCLI();

  program.action(async (input: string, options: CliOptions) => {
    try {
      console.log('📡 Starting sensor log cross-check...');
      const analysisOptions = validateAndProcessOptions(input, options);
      await processLogs(analysisOptions);
    } catch (error) {
      console.error('❌ Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

  await program.parseAsync();
}

async function processLogs(options: AnalysisOptions): Promise<void> {
  const result = await analyzeLogs({ inputDir: options.inputDir, sort: options.sort });

  if (options.dryRun) {
    console.log('🔍 Dry run: no reports written.');
    return;
  }

  const exporter = new ReportExporter(options.outputDir);
  await exporter.prepare();
  const written = await exporter.writeAll(result, options.inputDir);

  console.log(`✅ Done! Reports written to ${path.resolve(options.outputDir)}:`);
  written.forEach(filePath => console.log(`   - ${path.basename(filePath)}`));
}

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
