#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_RESULTS_FILE, VisionAnalyzer } from './analyzer';
import {
  ANALYSIS_TYPES,
  DEFAULT_ANALYSIS_TYPE,
  DEFAULT_PROVIDER,
  PROVIDER_IDS,
  SERVER_DEFAULTS,
} from '@shared/constants';
import type { AnalysisResult } from '@shared/types';
import { loadServerConfig } from '../server/src/config';
import { startServer } from '../server/src/server';

function printResult(label: string, result: AnalysisResult): void {
  console.log(chalk.cyan(`\n[${label}]`));
  console.log(chalk.dim('-'.repeat(60)));
  if (result.success) {
    console.log(result.analysis);
  } else {
    console.log(chalk.red(`Error: ${result.error}`));
  }
}

const program = new Command();

program
  .name('vision-analyzer')
  .description('Analyze images with GPT-4o, Claude, or Gemini vision models')
  .version(SERVER_DEFAULTS.VERSION);

program
  .command('analyze')
  .description('Analyze one image with a single provider')
  .argument('<image>', 'path to the image file')
  .option('-m, --model <provider>', `provider: ${PROVIDER_IDS.join('|')}`, DEFAULT_PROVIDER)
  .option('-t, --type <analysisType>', `analysis type: ${ANALYSIS_TYPES.join('|')}`, DEFAULT_ANALYSIS_TYPE)
  .option('-p, --prompt <text>', 'custom prompt (overrides --type)')
  .option('-o, --out <file>', 'also save the result as JSON')
  .action(async (image: string, opts: { model: string; type: string; prompt?: string; out?: string }) => {
    const analyzer = new VisionAnalyzer();
    const result = await analyzer.analyzeFile(image, {
      provider: opts.model,
      analysisType: opts.type,
      customPrompt: opts.prompt,
    });
    printResult(`${opts.model} - ${opts.prompt ? 'custom prompt' : opts.type}`, result);
    if (opts.out) {
      const saved = await analyzer.saveResults(result, opts.out);
      console.log(chalk.green(`Saved: ${saved}`));
    }
    if (!result.success) process.exitCode = 1;
  });

program
  .command('compare')
  .description('Run one image through every configured provider')
  .argument('<image>', 'path to the image file')
  .option('-t, --type <analysisType>', `analysis type: ${ANALYSIS_TYPES.join('|')}`, DEFAULT_ANALYSIS_TYPE)
  .option('-o, --out <file>', 'JSON file for the results', DEFAULT_RESULTS_FILE)
  .action(async (image: string, opts: { type: string; out: string }) => {
    const analyzer = new VisionAnalyzer();
    const available = analyzer.dispatcher.availableProviders();
    if (available.length === 0) {
      console.error(chalk.red('No provider configured. Set OPENAI_API_KEY, ANTHROPIC_API_KEY or GOOGLE_API_KEY.'));
      process.exitCode = 1;
      return;
    }

    console.log(chalk.cyan(`Comparing ${available.join(', ')} on ${image} (${opts.type})`));
    const results = await analyzer.compareModels(image, opts.type);
    for (const id of available) {
      const result = results[id];
      if (result) printResult(id, result);
    }

    const saved = await analyzer.saveResults(results, opts.out);
    console.log(chalk.green(`\nResults saved to ${saved}`));
  });

program
  .command('serve')
  .description('Start the web UI and POST /analyze endpoint')
  .option('--port <port>', 'port to listen on')
  .action((opts: { port?: string }) => {
    const config = loadServerConfig();
    const port = opts.port ? parseInt(opts.port, 10) : config.port;
    startServer({ ...config, port: Number.isNaN(port) ? config.port : port });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
