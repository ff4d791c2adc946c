/**
 * Motion routines the cell can run, keyed by the job index the job source publishes. Each job
 * lists one URScript variant per slot.
 */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { UnknownJobError } from '../errors';

export const JobVariantSchema = z.object({
  label: z.string().min(1),
  /** URScript statements, one per entry, executed inside the generated program. */
  script: z.array(z.string()).min(1),
});

export const JobDefinitionSchema = z.object({
  index: z.number().int().min(0),
  name: z.string().min(1),
  variants: z.array(JobVariantSchema).min(1),
});

export const JobCatalogSchema = z.object({
  jobs: z.array(JobDefinitionSchema),
});

export type JobVariant = z.infer<typeof JobVariantSchema>;
export type JobDefinition = z.infer<typeof JobDefinitionSchema>;

export class JobCatalog {
  private readonly jobs = new Map<number, JobDefinition>();

  constructor(definitions: JobDefinition[]) {
    for (const definition of definitions) {
      if (this.jobs.has(definition.index)) {
        throw new Error(`Job index ${definition.index} is defined more than once.`);
      }
      this.jobs.set(definition.index, definition);
    }
  }

  /**
   * Validates raw JSON content against the catalogue schema. Every job must define at least
   * `slotModulus` variants, since the slot counter hands out slots `0..slotModulus - 1`.
   */
  static parse(raw: unknown, slotModulus = 1): JobCatalog {
    const result = JobCatalogSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new Error(`Invalid job catalogue: ${issues.join('; ')}`);
    }
    const short = result.data.jobs.filter((job) => job.variants.length < slotModulus);
    if (short.length > 0) {
      const names = short.map((job) => `job ${job.index} has ${job.variants.length}`).join(', ');
      throw new Error(`Invalid job catalogue: every job needs ${slotModulus} variants (${names}).`);
    }
    return new JobCatalog(result.data.jobs);
  }

  static async load(filePath: string, slotModulus = 1): Promise<JobCatalog> {
    const resolved = path.resolve(filePath);
    const content = await fs.readFile(resolved, 'utf8');
    return JobCatalog.parse(JSON.parse(content), slotModulus);
  }

  list(): JobDefinition[] {
    return [...this.jobs.values()].sort((a, b) => a.index - b.index);
  }

  get(index: number): JobDefinition | undefined {
    return this.jobs.get(index);
  }

  /** Looks up the variant for one dispatch, failing loudly when the catalogue has none. */
  resolve(index: number, slot: number): { job: JobDefinition; variant: JobVariant } {
    const job = this.jobs.get(index);
    const variant = job?.variants[slot];
    if (!job || !variant) {
      throw new UnknownJobError(index, slot);
    }
    return { job, variant };
  }
}
