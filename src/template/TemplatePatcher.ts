/**
 * TemplatePatcher — derives an iteration's protocol text from a base template.
 *
 * Replaces the mutable data region with a freshly serialized batch and
 * swaps the descriptive label for an iteration-specific one. Pure: no
 * filesystem access, no global state.
 */

import { normalizeTable } from '../batch/BatchNormalizer.js';
import { GenerationError } from '../generation/errors.js';
import type { ExperimentBatch, PatchResult } from '../types/batch.js';
import { parseDictLiteral, serializeBatch } from './pythonLiteral.js';
import {
  locateAssignment,
  locateDataRegion,
  type MultipleRegionPolicy,
  type TemplateRegion,
} from './TemplateRegion.js';

export interface TemplateOptions {
  /** Comment line marking the replaceable block in the base template */
  markerComment: string;
  /** Variable the data literal is assigned to */
  variable: string;
  /** Comment written above the generated block; `{iteration}` is substituted */
  iterationComment: string;
  /** Exact label text to replace; empty disables relabeling */
  labelLiteral: string;
  /** Replacement label; `{iteration}` is substituted */
  labelTemplate: string;
  multipleRegions: MultipleRegionPolicy;
}

export const DEFAULT_TEMPLATE_OPTIONS: TemplateOptions = {
  markerComment: '# BO ITERATION DATA - WILL BE REPLACED DYNAMICALLY',
  variable: 'BO_DATA',
  iterationComment: '# BO ITERATION DATA - BO{iteration}',
  labelLiteral: "'protocolName': 'Color Liquid Mixing - Bayesian Optimization',",
  labelTemplate: "'protocolName': 'Color Liquid Mixing - BO Iteration {iteration}',",
  multipleRegions: 'error',
};

export function renderIterationText(template: string, iteration: number): string {
  return template.replaceAll('{iteration}', String(iteration));
}

export function assertIteration(iteration: number): void {
  if (!Number.isSafeInteger(iteration) || iteration < 0) {
    throw new GenerationError('INVALID_ITERATION', `Iteration must be a non-negative integer, got ${iteration}`, 400);
  }
}

function replaceFirst(text: string, search: string, replacement: string): string | undefined {
  const idx = text.indexOf(search);
  if (idx < 0) return undefined;
  return text.slice(0, idx) + replacement + text.slice(idx + search.length);
}

function renderRegion(
  region: TemplateRegion,
  batch: ExperimentBatch,
  iteration: number,
  options: TemplateOptions,
): string {
  const assignmentIndent = /^[ \t]*/.exec(region.assignmentPrefix)?.[0] ?? '';
  return [
    region.indent,
    renderIterationText(options.iterationComment, iteration),
    region.newline,
    region.assignmentPrefix,
    serializeBatch(batch, assignmentIndent, region.newline),
  ].join('');
}

/**
 * Patch a base template for one iteration.
 *
 * @throws TemplateMalformedError when the data region is missing, ambiguous or unbalanced
 */
export function patchTemplate(
  baseText: string,
  batch: ExperimentBatch,
  iteration: number,
  options: Partial<TemplateOptions> = {},
): PatchResult {
  assertIteration(iteration);
  const opts: TemplateOptions = { ...DEFAULT_TEMPLATE_OPTIONS, ...options };

  const region = locateDataRegion(baseText, opts);
  const data = renderRegion(region, batch, iteration, opts);

  const warnings: string[] = [];
  let prefix = region.prefix;
  let suffix = region.suffix;
  let relabeled = false;

  if (opts.labelLiteral.length > 0) {
    const label = renderIterationText(opts.labelTemplate, iteration);
    const inPrefix = replaceFirst(prefix, opts.labelLiteral, label);
    const inSuffix = inPrefix === undefined ? replaceFirst(suffix, opts.labelLiteral, label) : undefined;
    if (inPrefix !== undefined) {
      prefix = inPrefix;
      relabeled = true;
    } else if (inSuffix !== undefined) {
      suffix = inSuffix;
      relabeled = true;
    } else {
      warnings.push(`Label not found, protocol name left unchanged: ${opts.labelLiteral}`);
    }
  }

  return { text: prefix + data + suffix, relabeled, warnings };
}

/**
 * Read the batch embedded in a template or generated protocol.
 */
export function extractBatch(
  text: string,
  options: Partial<Pick<TemplateOptions, 'variable'>> = {},
): ExperimentBatch {
  const variable = options.variable ?? DEFAULT_TEMPLATE_OPTIONS.variable;
  const { openIndex } = locateAssignment(text, variable);
  const { value } = parseDictLiteral(text, openIndex);
  return normalizeTable(value);
}
