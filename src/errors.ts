/**
 * Error types raised by the protocol and dispatch layers. Routes and the process entry point
 * branch on these classes to choose a status code or exit path.
 */

export class CellDispatchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A value cannot be packed into a frame payload because it is not a signed 32-bit integer. */
export class EncodeRangeError extends CellDispatchError {
  constructor(readonly value: number) {
    super(`Value ${value} is not an integer in the signed 32-bit range.`);
  }
}

/** A frame field is outside its byte range, or a received buffer is too short. */
export class FrameFormatError extends CellDispatchError {}

export type TransportPhase = 'connect' | 'send' | 'receive';

/** Connecting to, writing to or reading from the job source failed. */
export class TransportError extends CellDispatchError {
  constructor(
    readonly endpoint: string,
    readonly phase: TransportPhase,
    reason: string,
    cause?: unknown,
  ) {
    super(`Transport ${phase} failed for ${endpoint}: ${reason}`, { cause });
  }
}

/** The job catalogue has no program for the requested job index and slot. */
export class UnknownJobError extends CellDispatchError {
  constructor(
    readonly index: number,
    readonly slot: number,
  ) {
    super(`No motion program defined for job ${index} slot ${slot}.`);
  }
}

/** The robot never reported that a streamed job finished. */
export class JobCompletionError extends CellDispatchError {
  constructor(
    readonly runId: string,
    timeoutMs: number,
  ) {
    super(`Job run ${runId} did not report completion within ${timeoutMs} ms.`);
  }
}

/** No order with the given id exists. */
export class OrderNotFoundError extends CellDispatchError {
  constructor(readonly orderId: string) {
    super(`Order ${orderId} does not exist.`);
  }
}

/** The order's status does not allow the requested change. */
export class OrderStateError extends CellDispatchError {}

/** An order request is well-formed JSON but cannot be accepted. */
export class InvalidOrderError extends CellDispatchError {}
