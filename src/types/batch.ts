/**
 * Batch and artifact types for iteration protocol generation.
 *
 * An ExperimentBatch holds one optimization iteration's suggested
 * experiments as four parallel sequences. Index i of every sequence
 * describes the same experiment.
 */

/**
 * Column names, in the fixed order they are serialized.
 */
export const BATCH_COLUMNS = ['colorA', 'colorB', 'colorC', 'DispensePos'] as const;

export type BatchColumn = (typeof BATCH_COLUMNS)[number];

export type NumericColumn = Exclude<BatchColumn, 'DispensePos'>;

export const NUMERIC_COLUMNS: readonly NumericColumn[] = ['colorA', 'colorB', 'colorC'];

/**
 * Canonical, immutable batch of experiments for one iteration.
 */
export interface ExperimentBatch {
  readonly colorA: readonly number[];
  readonly colorB: readonly number[];
  readonly colorC: readonly number[];
  /** Plate position labels, e.g. "A1" */
  readonly dispensePosition: readonly string[];
}

/**
 * Column-oriented table, the shape of a dataframe's `to_dict('list')`.
 */
export type ColumnTable = Readonly<Record<string, readonly unknown[]>>;

/**
 * Row-oriented table, one record per experiment.
 */
export type RowTable = ReadonlyArray<Readonly<Record<string, unknown>>>;

/**
 * Any already-materialized table the normalizer accepts.
 */
export type TabularSource = ColumnTable | RowTable;

/**
 * Result of patching a template.
 */
export interface PatchResult {
  /** Patched template text */
  text: string;
  /** Whether the descriptive label was found and replaced */
  relabeled: boolean;
  /** Non-fatal conditions encountered while patching */
  warnings: string[];
}

/**
 * A protocol file written for one iteration.
 */
export interface GeneratedArtifact {
  iteration: number;
  path: string;
  experiments: number;
  relabeled: boolean;
  warnings: string[];
}

export function batchSize(batch: ExperimentBatch): number {
  return batch.colorA.length;
}
