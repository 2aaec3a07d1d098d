import { z } from 'zod';
import { BATCH_BANNER_WIDTH } from '../../config/constants';
import { ValidationError } from '../errors';
import {
  runExtraction,
  PipelineDependencies,
  PipelineOptions,
  PipelineResult,
} from './extractionPipeline';

export const ExtractionJob = z.object({
  url: z.string().url('url must be an absolute URL'),
  instruction: z.string().min(1, 'instruction must not be empty'),
});

// Parallel lists: the i-th instruction applies to the i-th URL
const ParallelLists = z
  .object({
    urls: z.array(z.string().url('url must be an absolute URL')).min(1),
    instructions: z.array(z.string().min(1, 'instruction must not be empty')).min(1),
  })
  .refine(value => value.urls.length === value.instructions.length, {
    message: 'urls and instructions must have the same length',
    path: ['instructions'],
  });

export const BatchFile = z.union([z.array(ExtractionJob).min(1), ParallelLists]);

export type ExtractionJobType = z.infer<typeof ExtractionJob>;

export interface BatchEntry {
  job: ExtractionJobType;
  result: PipelineResult;
}

export function parseBatchFile(content: string): ExtractionJobType[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `batch file is not valid JSON: ${error instanceof Error ? error.message : 'unknown error'}`
    );
  }

  const parsed = BatchFile.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`invalid batch file:\n${issues.join('\n')}`);
  }

  if (Array.isArray(parsed.data)) {
    return parsed.data;
  }
  const { urls, instructions } = parsed.data;
  return urls.map((url, i) => ({ url, instruction: instructions[i] }));
}

/**
 * Run the jobs one after another. A failing job is recorded and the batch
 * moves on to the next one.
 */
export async function runBatch(
  jobs: readonly ExtractionJobType[],
  deps: PipelineDependencies,
  options: PipelineOptions & { onJobDone?: (entry: BatchEntry, index: number) => void } = {}
): Promise<BatchEntry[]> {
  const { onJobDone, ...pipelineOptions } = options;
  const entries: BatchEntry[] = [];

  for (const [index, job] of jobs.entries()) {
    const result = await runExtraction(job.url, job.instruction, deps, pipelineOptions);
    const entry = { job, result };
    entries.push(entry);
    onJobDone?.(entry, index);
  }

  return entries;
}

export function formatBatchEntry(entry: BatchEntry, index: number, total: number): string {
  const banner = '='.repeat(BATCH_BANNER_WIDTH);
  const body = entry.result.ok ? entry.result.text : `Error: ${entry.result.message}`;
  return [
    banner,
    `[${index + 1}/${total}] ${entry.job.url}`,
    `Instruction: ${entry.job.instruction}`,
    '-'.repeat(BATCH_BANNER_WIDTH),
    body,
  ].join('\n');
}
