import { setTimeout as delay } from 'node:timers/promises';
import type { RegisterClient } from './commandClient';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface PollOptions {
  selector: number;
  intervalMs: number;
  sleep?: Sleep;
}

/**
 * Queries `selector` until it reads non-zero, waiting `intervalMs` between attempts. There is no
 * attempt limit; a transport failure is the only other way out.
 *
 * @returns The non-zero flag value and how many waits preceded it.
 */
export async function waitForFlag(
  client: RegisterClient,
  { selector, intervalMs, sleep = defaultSleep }: PollOptions,
): Promise<{ value: number; waits: number }> {
  let waits = 0;
  let value = await client.query(selector);
  while (value === 0) {
    await sleep(intervalMs);
    waits += 1;
    value = await client.query(selector);
  }
  return { value, waits };
}
