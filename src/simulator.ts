/**
 * Bench simulator for the job source: serves the register table over the command protocol and
 * accepts `index value` lines on stdin to publish work by hand.
 */
import readline from 'node:readline';
import { config } from './config';
import { parseRegisterAssignment, startRegisterServer } from './services/registerServer';
import { RegisterTable } from './services/registerTable';

async function main(): Promise<void> {
  const table = new RegisterTable(config.simulator.registerCount);
  table.onChange = (index, value) => {
    // eslint-disable-next-line no-console
    console.log(`register ${index} = ${value}`);
  };

  const handle = await startRegisterServer(config.simulator.port, table);
  // eslint-disable-next-line no-console
  console.log(`Register server listening on port ${handle.port} (${table.size} registers)`);

  const prompt = readline.createInterface({ input: process.stdin });
  prompt.on('line', (line) => {
    if (!line.trim()) {
      return;
    }
    const assignment = parseRegisterAssignment(line);
    if (!assignment || !table.has(assignment.index)) {
      // eslint-disable-next-line no-console
      console.error(`Expected "<index 0-${table.size - 1}> <int32 value>", got "${line.trim()}"`);
      return;
    }
    table.set(assignment.index, assignment.value);
  });
  prompt.on('close', () => {
    handle.close().then(
      () => process.exit(0),
      (error: unknown) => {
        // eslint-disable-next-line no-console
        console.error('Register server did not close cleanly:', error);
        process.exit(1);
      },
    );
  });
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Simulator failed to start:', error);
  process.exit(1);
});
