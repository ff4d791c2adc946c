/**
 * Motion-job executor for a Universal Robots cell: picks the catalogue variant for (index, slot),
 * streams it as a URScript program and waits for the robot to report that it finished.
 */
import { randomUUID } from 'crypto';
import type { CompletionStore } from './completionStore';
import type { MotionJobExecutor } from './dispatcher';
import type { JobCatalog } from './jobCatalog';
import { RobotEndpoint, sendProgramToRobot } from './robotClient';
import { buildJobProgram, CompletionCallbackConfig, JobProgramResult } from './urGenerator';

export interface UrJobExecutorOptions {
  catalog: JobCatalog;
  /** `null` runs dry: programs are built and logged but never streamed. */
  robot: RobotEndpoint | null;
  /** `null` treats a delivered program as finished. */
  completion: (CompletionCallbackConfig & { timeoutMs: number; store: CompletionStore }) | null;
  send?: (program: string, endpoint: RobotEndpoint) => Promise<void>;
  createRunId?: () => string;
}

export class UrJobExecutor implements MotionJobExecutor {
  private readonly send: (program: string, endpoint: RobotEndpoint) => Promise<void>;
  private readonly createRunId: () => string;
  private lastProgram: JobProgramResult | null = null;

  constructor(private readonly options: UrJobExecutorOptions) {
    this.send = options.send ?? sendProgramToRobot;
    this.createRunId = options.createRunId ?? randomUUID;
  }

  /** The most recently built program, streamed or not. A dry run leaves its only trace here. */
  get lastBuiltProgram(): JobProgramResult | null {
    return this.lastProgram;
  }

  async executeJob(index: number, slot: number): Promise<void> {
    const { job, variant } = this.options.catalog.resolve(index, slot);
    const runId = this.createRunId();
    const { robot } = this.options;
    const completion = robot ? this.options.completion : null;

    const result = buildJobProgram(job, slot, variant, {
      runId,
      completion: completion ? { host: completion.host, port: completion.port } : null,
    });
    this.lastProgram = result;

    if (!robot) {
      // eslint-disable-next-line no-console
      console.log(`Robot streaming disabled; skipped ${result.metadata.functionName} (run ${runId})`);
      return;
    }

    const finished = completion ? completion.store.expect(runId, completion.timeoutMs) : null;
    const delivered = this.send(result.program, robot).then(
      () => {
        // eslint-disable-next-line no-console
        console.log(`Streamed ${result.metadata.functionName} to ${robot.host}:${robot.port} (run ${runId})`);
      },
      (error: unknown) => {
        completion?.store.cancel(runId);
        throw error;
      },
    );

    // Delivery and completion are awaited together; either failing ends the job.
    await Promise.all([delivered, finished]);
    if (finished) {
      // eslint-disable-next-line no-console
      console.log(`Run ${runId} reported completion`);
    }
  }
}
