/**
 * Drives the cell: arm the gate once, then forever wait for the ready flag, read the job index, run
 * the next variant of that job on the robot and re-arm. Every step is awaited before the next one
 * starts, and at most one job is ever in flight.
 */
import type { RegisterClient } from './commandClient';
import { defaultSleep, Sleep, waitForFlag } from './pollLoop';
import { SlotCounter } from './slotCounter';

/** Performs the physical routine for one job variant; resolves once the motion has finished. */
export interface MotionJobExecutor {
  executeJob(index: number, slot: number): Promise<void>;
}

export type DispatcherState =
  | 'idle'
  | 'armed'
  | 'polling'
  | 'fetching-index'
  | 'dispatching'
  | 'rearming'
  | 'released';

export interface DispatchRecord {
  index: number;
  slot: number;
  startedAt: string;
  finishedAt: string | null;
}

export interface DispatcherStatus {
  state: DispatcherState;
  cycles: number;
  slots: Record<number, number>;
  lastDispatch: DispatchRecord | null;
}

export interface DispatcherOptions {
  gateSelector: number;
  armValue: number;
  releaseValue: number;
  readySelector: number;
  jobIndexSelector: number;
  pollIntervalMs: number;
  slotModulus?: number;
  sleep?: Sleep;
}

export class Dispatcher {
  private state: DispatcherState = 'idle';
  private cycles = 0;
  private lastDispatch: DispatchRecord | null = null;
  private readonly slots: SlotCounter;
  private readonly sleep: Sleep;

  constructor(
    private readonly client: RegisterClient,
    private readonly executor: MotionJobExecutor,
    private readonly options: DispatcherOptions,
  ) {
    this.slots = new SlotCounter(options.slotModulus);
    this.sleep = options.sleep ?? defaultSleep;
  }

  status(): DispatcherStatus {
    return {
      state: this.state,
      cycles: this.cycles,
      slots: this.slots.snapshot(),
      lastDispatch: this.lastDispatch ? { ...this.lastDispatch } : null,
    };
  }

  /** Arms the gate so the job source starts offering work. */
  async prepare(): Promise<void> {
    await this.client.set(this.options.gateSelector, this.options.armValue);
    this.state = 'armed';
  }

  /** Polls for one job, runs it and re-arms. */
  async runCycle(): Promise<DispatchRecord> {
    this.state = 'polling';
    await waitForFlag(this.client, {
      selector: this.options.readySelector,
      intervalMs: this.options.pollIntervalMs,
      sleep: this.sleep,
    });

    this.state = 'fetching-index';
    const index = await this.client.query(this.options.jobIndexSelector);

    this.state = 'dispatching';
    const slot = this.slots.advance(index);
    const record: DispatchRecord = { index, slot, startedAt: new Date().toISOString(), finishedAt: null };
    this.lastDispatch = record;
    // eslint-disable-next-line no-console
    console.log(`Dispatching job ${index} slot ${slot}`);
    await this.executor.executeJob(index, slot);
    record.finishedAt = new Date().toISOString();

    this.state = 'rearming';
    await this.client.set(this.options.gateSelector, this.options.armValue);
    this.cycles += 1;
    this.state = 'polling';
    return { ...record };
  }

  /** Arms, then dispatches until an error ends the loop. */
  async run(): Promise<never> {
    await this.prepare();
    for (;;) {
      await this.runCycle();
    }
  }

  /** Returns the gate to its released value. Used on process shutdown. */
  async release(): Promise<void> {
    await this.client.set(this.options.gateSelector, this.options.releaseValue);
    this.state = 'released';
  }
}
