import fs from 'fs-extra';
import path from 'node:path';

import type { CacheManager } from '../cache_manager.js';
import { createConfiguredLogger, resolveConversionConfig } from '../config.js';
import { FlatnestConverter } from '../converter.js';
import {
  listFiles,
  toPosixRelative,
  writeJsonFile,
  writeTextFile,
  type WriteResult
} from '../io.js';
import type { Logger } from '../logger.js';
import { parseFlatRecords } from '../records/flat_records.js';
import { parseCliOptionMap } from './options.js';
import { inputValidated, interactivePromptAdapter, type PromptAdapter } from './prompts.js';

export type ConvertCommand = 'nest' | 'flatten';
export type DocumentFormat = 'json' | 'xml';

export interface ConvertJob {
  inputPath: string;
  outputPath: string;
}

export interface ConvertSummary {
  command: ConvertCommand;
  format: DocumentFormat;
  updated: string[];
  unchanged: string[];
}

export interface ConvertCliDependencies {
  prompt?: PromptAdapter;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  cache?: CacheManager;
}

const OUTPUT_SUFFIXES = ['.nested.json', '.nested.xml', '.flat.json', '.json', '.xml'];

function parseCommand(value: string): ConvertCommand {
  if (value === 'nest' || value === 'flatten') {
    return value;
  }
  throw new Error(`Unknown command '${value}'. Expected nest|flatten`);
}

function parseFormat(value: string | undefined): DocumentFormat {
  if (value === undefined || value === 'json') {
    return 'json';
  }
  if (value === 'xml') {
    return 'xml';
  }
  throw new Error(`Invalid format '${value}'. Expected json|xml`);
}

export function outputFileName(
  fileName: string,
  command: ConvertCommand,
  format: DocumentFormat
): string {
  const suffix = OUTPUT_SUFFIXES.find((candidate) => fileName.endsWith(candidate));
  const base = suffix ? fileName.slice(0, -suffix.length) : fileName;
  return command === 'nest' ? `${base}.nested.${format}` : `${base}.flat.json`;
}

export async function planConvertJobs(
  command: ConvertCommand,
  format: DocumentFormat,
  inputPath: string,
  outputPath: string | undefined
): Promise<ConvertJob[]> {
  if (!(await fs.pathExists(inputPath))) {
    throw new Error(`Input not found: ${inputPath}`);
  }

  const stat = await fs.stat(inputPath);
  if (!stat.isDirectory()) {
    return [
      {
        inputPath,
        outputPath: outputPath
          ? path.resolve(outputPath)
          : path.join(
              path.dirname(inputPath),
              outputFileName(path.basename(inputPath), command, format)
            )
      }
    ];
  }

  const patterns = command === 'flatten' && format === 'xml' ? ['**/*.xml'] : ['**/*.json'];
  const ignore = command === 'nest' ? ['.nested.json', '.nested.xml'] : ['.flat.json'];
  const files = (await listFiles(inputPath, patterns)).filter(
    (file) => !ignore.some((suffix) => file.endsWith(suffix))
  );
  const outputRoot = outputPath ? path.resolve(outputPath) : inputPath;

  return files.map((file) => ({
    inputPath: path.join(inputPath, file),
    outputPath: path.join(
      outputRoot,
      path.dirname(file),
      outputFileName(path.basename(file), command, format)
    )
  }));
}

async function convertJob(
  converter: FlatnestConverter,
  command: ConvertCommand,
  format: DocumentFormat,
  job: ConvertJob
): Promise<WriteResult> {
  if (command === 'nest') {
    const container = parseFlatRecords(await fs.readJson(job.inputPath));
    const text = format === 'xml' ? converter.toXml(container) : converter.toJson(container);
    return writeTextFile(job.outputPath, text, { check: false });
  }

  const text = await fs.readFile(job.inputPath, 'utf8');
  const container = format === 'xml' ? converter.fromXml(text) : converter.fromJson(text);
  return writeJsonFile(job.outputPath, container.toFlatRecords(), { check: false });
}

export async function runConvertCli(
  argv: string[] = process.argv.slice(2),
  dependencies: ConvertCliDependencies = {}
): Promise<ConvertSummary> {
  const hasCommand = argv.length > 0 && !argv[0].startsWith('--');
  const options = parseCliOptionMap(hasCommand ? argv.slice(1) : argv);
  const prompt = dependencies.prompt ?? interactivePromptAdapter;

  const command = hasCommand
    ? parseCommand(argv[0].trim().toLowerCase())
    : await prompt.select<ConvertCommand>({
        message: 'Conversion:',
        choices: [
          { name: 'nest (flat records to hierarchical document)', value: 'nest' },
          { name: 'flatten (hierarchical document to flat records)', value: 'flatten' }
        ]
      });
  const format = parseFormat(options.get('format'));
  const input =
    options.get('input') ??
    (await inputValidated(prompt, {
      message: 'Input file or directory:',
      validate: (value) => (value ? undefined : 'An input path is required')
    }));

  const config = resolveConversionConfig(options, dependencies.env ?? process.env);
  const logger = dependencies.logger ?? createConfiguredLogger(config);
  const jobs = await planConvertJobs(command, format, path.resolve(input), options.get('output'));
  if (jobs.length === 0) {
    throw new Error(`No input files found under ${input}`);
  }

  const converter = await FlatnestConverter.create({ config, logger, cache: dependencies.cache });
  const summary: ConvertSummary = { command, format, updated: [], unchanged: [] };

  try {
    for (const job of jobs) {
      const result = await convertJob(converter, command, format, job);
      (result.changed ? summary.updated : summary.unchanged).push(job.outputPath);
      logger.info(`${result.changed ? 'Updated' : 'No changes'} ${toPosixRelative(job.outputPath)}`);
    }
  } finally {
    converter.dispose();
  }

  return summary;
}
