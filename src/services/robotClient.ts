/**
 * Streams URScript programs to a Universal Robots controller. Delivery ends when the program has
 * been written and the socket closed; whether the motion finished is tracked separately.
 */
import net from 'net';
import { TransportError } from '../errors';

export interface RobotEndpoint {
  host: string;
  port: number;
}

/**
 * Sends a UR program to the robot's script interface.
 *
 * @returns A promise that resolves once the socket closes, or rejects with a `TransportError`
 * naming the phase that failed.
 */
export async function sendProgramToRobot(program: string, endpoint: RobotEndpoint): Promise<void> {
  const address = `${endpoint.host}:${endpoint.port}`;

  await new Promise<void>((resolve, reject) => {
    const client = new net.Socket();
    let connected = false;

    client.on('error', (error) => {
      client.destroy();
      reject(new TransportError(address, connected ? 'send' : 'connect', error.message, error));
    });

    client.on('close', () => resolve());

    client.connect(endpoint.port, endpoint.host, () => {
      connected = true;
      client.end(`${program}\n`, 'utf8');
    });
  });
}
