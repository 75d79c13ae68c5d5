/**
 * ProtocolGenerator — writes one protocol file per optimization iteration.
 *
 * Reads the base template and batch table from disk, runs the normalizer
 * and patcher, and writes the result atomically so a failed call never
 * leaves a partial artifact behind.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, parse, resolve } from 'node:path';
import { normalizeCsv, normalizeTable } from '../batch/BatchNormalizer.js';
import type { GeneratorConfig } from '../config/types.js';
import { extractBatch, patchTemplate } from '../template/TemplatePatcher.js';
import {
  batchSize,
  type ExperimentBatch,
  type GeneratedArtifact,
  type PatchResult,
  type TabularSource,
} from '../types/batch.js';
import { SourceReadError, TemplateReadError } from './errors.js';

export interface GeneratorLogger {
  info(message: string): void;
  warn(message: string): void;
}

export interface GenerateOptions {
  /** Overrides the iteration derived from the source file name */
  iteration?: number;
  templatePath?: string;
  outputDir?: string;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Iteration number encoded in a file name, e.g. `BO_R3.csv` -> 3.
 * Names that do not match the pattern map to iteration 0.
 */
export function resolveIteration(fileName: string, pattern: string | RegExp): number {
  const match = new RegExp(pattern).exec(basename(fileName));
  const digits = match?.[1];
  if (digits === undefined || !/^\d+$/.test(digits)) return 0;
  const iteration = Number.parseInt(digits, 10);
  return Number.isSafeInteger(iteration) ? iteration : 0;
}

/**
 * `{outputDir}/{baseName}_{iteration}{ext}`; the template's own directory
 * when no output directory is given.
 */
export function destinationPath(templatePath: string, iteration: number, outputDir?: string): string {
  const parsed = parse(templatePath);
  return join(outputDir ?? parsed.dir, `${parsed.name}_${iteration}${parsed.ext}`);
}

/** Write via tmp-file + rename; the destination is either replaced whole or untouched. */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

export class ProtocolGenerator {
  private readonly config: GeneratorConfig;
  private readonly logger: GeneratorLogger;

  constructor(config: GeneratorConfig, logger: GeneratorLogger = console) {
    this.config = config;
    this.logger = logger;
  }

  resolveIteration(sourceName: string): number {
    return resolveIteration(sourceName, this.config.iterationPattern);
  }

  destinationFor(iteration: number, options: Pick<GenerateOptions, 'templatePath' | 'outputDir'> = {}): string {
    return destinationPath(
      options.templatePath ?? this.config.templatePath,
      iteration,
      options.outputDir ?? this.config.outputDir,
    );
  }

  /**
   * @throws TemplateReadError when the template is missing or unreadable
   */
  async readTemplate(templatePath: string = this.config.templatePath): Promise<string> {
    try {
      return await readFile(resolve(templatePath), 'utf-8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        throw new TemplateReadError(templatePath, `Base template not found: ${templatePath}`);
      }
      throw new TemplateReadError(templatePath, `Cannot read base template ${templatePath}: ${errorMessage(err)}`);
    }
  }

  /**
   * @throws SourceReadError when the table file is missing or unreadable
   */
  async readSource(csvPath: string): Promise<string> {
    try {
      return await readFile(resolve(csvPath), 'utf-8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        throw new SourceReadError(`CSV file not found: ${csvPath}`);
      }
      throw new SourceReadError(`Cannot read CSV file ${csvPath}: ${errorMessage(err)}`);
    }
  }

  /**
   * Patch template text without touching the filesystem.
   */
  preview(templateText: string, batch: ExperimentBatch, iteration: number): PatchResult {
    return patchTemplate(templateText, batch, iteration, this.config.template);
  }

  async generateFromCsv(csvPath: string, options: GenerateOptions = {}): Promise<GeneratedArtifact> {
    const iteration = options.iteration ?? this.resolveIteration(csvPath);
    const batch = normalizeCsv(await this.readSource(csvPath));
    this.logger.info(`Loaded ${batchSize(batch)} experiments from ${csvPath}`);
    return this.generateFromBatch(batch, iteration, options);
  }

  async generateFromTable(
    table: TabularSource,
    iteration: number,
    options: Omit<GenerateOptions, 'iteration'> = {},
  ): Promise<GeneratedArtifact> {
    const batch = normalizeTable(table);
    this.logger.info(`Processing ${batchSize(batch)} experiments for iteration ${iteration}`);
    return this.generateFromBatch(batch, iteration, options);
  }

  async generateFromBatch(
    batch: ExperimentBatch,
    iteration: number,
    options: Omit<GenerateOptions, 'iteration'> = {},
  ): Promise<GeneratedArtifact> {
    const templatePath = options.templatePath ?? this.config.templatePath;
    const templateText = await this.readTemplate(templatePath);
    const result = this.preview(templateText, batch, iteration);
    for (const warning of result.warnings) {
      this.logger.warn(warning);
    }

    const path = this.destinationFor(iteration, { ...options, templatePath });
    await writeFileAtomic(path, result.text);
    this.logger.info(`Generated protocol file: ${path}`);

    return {
      iteration,
      path,
      experiments: batchSize(batch),
      relabeled: result.relabeled,
      warnings: result.warnings,
    };
  }

  /**
   * Read back the batch embedded in a generated protocol.
   */
  async inspect(protocolPath: string): Promise<ExperimentBatch> {
    const text = await this.readTemplate(protocolPath);
    return extractBatch(text, { variable: this.config.template.variable });
  }
}
