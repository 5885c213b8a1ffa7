#!/usr/bin/env node
// src/Index.ts
import { Command, InvalidArgumentError } from 'commander';
import * as dotenv from 'dotenv';
import { ReportRunner } from './ReportRunner';

interface CliOptions {
  files: string[];
  confFile?: string;
  outputFolder?: string;
  previewRows?: number;
  preview: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

async function main(): Promise<void> {
  // Load environment variables from .env file
  dotenv.config();

  const program = new Command();
  program
    .name('sheet-report')
    .description('Cleans, analyses, charts and exports CSV and Excel data')
    .requiredOption('-f, --files <paths...>', 'Paths to the CSV, XLS or XLSX files')
    .option('-c, --confFile <path>', 'Path to the YAML configuration file')
    .option('-o, --outputFolder <path>', 'Path to the folder where output files will be created')
    .option('-p, --previewRows <number>', 'Number of rows shown in data previews', parsePositiveInt)
    .option('--no-preview', 'Do not print a preview of the loaded sheets')
    .parse(process.argv);

  const options = program.opts<CliOptions>();

  try {
    const result = await ReportRunner.run({
      files: options.files,
      confFile: options.confFile,
      outputFolder: options.outputFolder,
      previewRows: options.previewRows,
      preview: options.preview,
    });
    if (result.actions.failed.length > 0) {
      process.exitCode = 1;
    }
  } catch (error: unknown) {
    console.error('Failed to process files:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

void main();
