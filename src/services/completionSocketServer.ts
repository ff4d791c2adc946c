import net from 'net';
import type { CompletionStore } from './completionStore';

/** Extracts the run id from a `done <runId>` report line. */
export const parseCompletionLine = (line: string): string | null => {
  const match = line.trim().match(/^done\s+(\S+)$/);
  return match ? match[1] : null;
};

export const startCompletionSocketServer = (store: CompletionStore, port: number, host = '0.0.0.0'): net.Server => {
  const server = net.createServer((socket) => {
    let buffer = '';

    socket.on('data', (chunk) => {
      buffer += chunk.toString('utf8');

      let newlineIndex = buffer.indexOf('\n');
      while (newlineIndex !== -1) {
        const raw = buffer.slice(0, newlineIndex).trim();
        buffer = buffer.slice(newlineIndex + 1);
        newlineIndex = buffer.indexOf('\n');

        if (!raw) {
          continue;
        }

        const runId = parseCompletionLine(raw);
        if (!runId) {
          // eslint-disable-next-line no-console
          console.error('Ignoring malformed completion report:', raw);
          continue;
        }

        if (!store.markComplete(runId)) {
          // eslint-disable-next-line no-console
          console.error(`Completion report for unknown run ${runId}`);
        }
      }
    });

    socket.on('error', (error) => {
      // eslint-disable-next-line no-console
      console.error('Completion socket connection error:', error);
    });
  });

  server.listen(port, host, () => {
    // eslint-disable-next-line no-console
    console.log(`Completion socket server listening on port ${port}`);
  });

  server.on('error', (error) => {
    // eslint-disable-next-line no-console
    console.error('Completion socket server error:', error);
  });

  return server;
};
