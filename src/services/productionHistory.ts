/**
 * Rolling record of the production counter, sampled on a fixed interval for the monitoring API.
 */
import type { RegisterClient } from './commandClient';

export interface HistorySample {
  /** Local wall-clock time of the sample, `HH:MM`. */
  time: string;
  value: number;
}

const pad = (value: number) => String(value).padStart(2, '0');

export const formatSampleTime = (at: Date): string => `${pad(at.getHours())}:${pad(at.getMinutes())}`;

export class ProductionHistory {
  private readonly samples: HistorySample[] = [];

  /**
   * Starts full: `length` zero samples spaced `intervalMs` apart, ending at `seededAt`.
   */
  constructor(
    readonly length: number,
    intervalMs: number,
    seededAt = new Date(),
  ) {
    for (let back = length - 1; back >= 0; back -= 1) {
      this.samples.push({ time: formatSampleTime(new Date(seededAt.getTime() - back * intervalMs)), value: 0 });
    }
  }

  record(value: number, at = new Date()): void {
    this.samples.push({ time: formatSampleTime(at), value });
    if (this.samples.length > this.length) {
      this.samples.shift();
    }
  }

  /** Oldest first. */
  list(): HistorySample[] {
    return [...this.samples];
  }
}

/** Reads `selector` once and appends the value to `history`. */
export async function sampleInto(
  history: ProductionHistory,
  client: RegisterClient,
  selector: number,
  at = new Date(),
): Promise<number> {
  const value = await client.query(selector);
  history.record(value, at);
  return value;
}

/**
 * Samples `selector` every `intervalMs` until the returned function is called. A failed read is
 * logged and leaves a gap; the next tick tries again.
 */
export function startHistorySampler(
  history: ProductionHistory,
  client: RegisterClient,
  { selector, intervalMs }: { selector: number; intervalMs: number },
): () => void {
  const timer = setInterval(() => {
    sampleInto(history, client, selector).catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`History sample of register ${selector} failed:`, error instanceof Error ? error.message : error);
    });
  }, intervalMs);
  return () => clearInterval(timer);
}
