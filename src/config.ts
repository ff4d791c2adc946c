/**
 * Application-wide configuration loader. Centralizes environment parsing for the job source
 * connection, the dispatch loop, robot streaming and the HTTP server so services and routes can rely
 * on strongly typed runtime values.
 */
import dotenv from 'dotenv';

dotenv.config();

/**
 * Where the register server (the external job source) listens.
 */
export interface JobSourceConfig {
  /** Hostname or IP address of the register server. */
  host: string;
  /** TCP port of the register server. */
  port: number;
  /** Socket inactivity timeout in milliseconds; `0` waits indefinitely. */
  timeoutMs: number;
}

/**
 * Selectors and timings driving the poll-and-dispatch loop.
 */
export interface DispatchConfig {
  /** Wait between two polls of the ready flag. */
  pollIntervalMs: number;
  /** Number of variants each job rotates through. */
  slotModulus: number;
  /** Register written to arm and release the cell. */
  gateSelector: number;
  /** Value written to the gate register when arming (and re-arming after each job). */
  armValue: number;
  /** Value written to the gate register on shutdown. */
  releaseValue: number;
  /** Register polled until it becomes non-zero. */
  readySelector: number;
  /** Register holding the index of the job to run. */
  jobIndexSelector: number;
}

/**
 * Configuration describing how to connect to, and command, the Universal Robot controller.
 */
export interface RobotConfig {
  /** Hostname or IP address for the robot controller. */
  host: string;
  /** Primary TCP port used when streaming generated UR programs. */
  port: number;
  /** Flag indicating whether robot streaming should be attempted. */
  enabled: boolean;
  /** Host the robot connects back to when a job finishes; empty disables completion tracking. */
  completionHost: string;
  /** Port of the completion socket server. */
  completionPort: number;
  /** Maximum time to wait for a job to report completion. */
  completionTimeoutMs: number;
}

/** Order bookkeeping against the product counter registers. */
export interface OrdersConfig {
  /** JSON file the order list is persisted to. */
  filePath: string;
  /** Counter register for each product type. */
  productRegisters: Record<'A' | 'B' | 'C', number>;
}

/** Periodic sampling of the production counter. */
export interface HistoryConfig {
  /** Register sampled on every tick. */
  selector: number;
  intervalMs: number;
  /** Number of samples kept; older ones drop off. */
  length: number;
}

/** Options for the bundled register server simulator. */
export interface SimulatorConfig {
  port: number;
  registerCount: number;
}

/**
 * Fully hydrated runtime configuration for the process.
 */
export interface AppConfig {
  /** Port the HTTP server listens on. */
  port: number;
  /** Allowed CORS origins or `true` to allow all origins. */
  corsOrigins: string[] | true;
  jobSource: JobSourceConfig;
  dispatch: DispatchConfig;
  robot: RobotConfig;
  /** Path of the JSON job catalogue, relative to the working directory unless absolute. */
  jobCatalogPath: string;
  orders: OrdersConfig;
  history: HistoryConfig;
  simulator: SimulatorConfig;
}

/** Parses a positive integer port from an environment variable. */
const parsePort = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

/** Parses a numeric environment variable, falling back when necessary. */
const parseNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(parsed) ? parsed : fallback;
};

/** Parses a register selector, which must fit the one-byte frame argument. */
const parseSelector = (value: string | undefined, fallback: number): number => {
  const parsed = parseNumber(value, fallback);
  return Number.isInteger(parsed) && parsed >= 0 && parsed <= 255 ? parsed : fallback;
};

const corsOrigins = process.env.CORS_ORIGIN
  ? process.env.CORS_ORIGIN.split(',').map((origin) => origin.trim()).filter(Boolean)
  : true;

const robotHost = process.env.ROBOT_HOST;

/**
 * Resolved application configuration, evaluated once at module load so subsequent imports share
 * the same immutable object.
 */
export const config: AppConfig = {
  port: parsePort(process.env.PORT, 4000),
  corsOrigins,
  jobSource: {
    host: process.env.JOB_SOURCE_HOST?.trim() || '127.0.0.1',
    port: parsePort(process.env.JOB_SOURCE_PORT, 1400),
    timeoutMs: Math.max(0, parseNumber(process.env.JOB_SOURCE_TIMEOUT_MS, 0)),
  },
  dispatch: {
    pollIntervalMs: Math.max(10, parseNumber(process.env.POLL_INTERVAL_MS, 500)),
    slotModulus: Math.max(1, Math.floor(parseNumber(process.env.SLOT_MODULUS, 3))),
    gateSelector: parseSelector(process.env.GATE_SELECTOR, 1),
    armValue: Math.trunc(parseNumber(process.env.ARM_VALUE, 1)),
    releaseValue: Math.trunc(parseNumber(process.env.RELEASE_VALUE, 0)),
    readySelector: parseSelector(process.env.READY_SELECTOR, 2),
    jobIndexSelector: parseSelector(process.env.JOB_INDEX_SELECTOR, 3),
  },
  robot: {
    host: robotHost ?? '127.0.0.1',
    port: parsePort(process.env.ROBOT_PORT, 30002),
    enabled: Boolean(robotHost),
    completionHost: process.env.COMPLETION_HOST?.trim() ?? '',
    completionPort: parsePort(process.env.COMPLETION_PORT, 30010),
    completionTimeoutMs: Math.max(1000, parseNumber(process.env.JOB_COMPLETION_TIMEOUT_MS, 120000)),
  },
  jobCatalogPath: process.env.JOB_CATALOG_PATH?.trim() || 'config/jobs.json',
  orders: {
    filePath: process.env.ORDERS_PATH?.trim() || 'orders.json',
    productRegisters: {
      A: parseSelector(process.env.PRODUCT_A_SELECTOR, 16),
      B: parseSelector(process.env.PRODUCT_B_SELECTOR, 17),
      C: parseSelector(process.env.PRODUCT_C_SELECTOR, 18),
    },
  },
  history: {
    selector: parseSelector(process.env.HISTORY_SELECTOR, 7),
    intervalMs: Math.max(1000, parseNumber(process.env.HISTORY_INTERVAL_MS, 300000)),
    length: Math.max(1, Math.floor(parseNumber(process.env.HISTORY_LENGTH, 144))),
  },
  simulator: {
    port: parsePort(process.env.REGISTER_SERVER_PORT, 1400),
    registerCount: Math.min(256, Math.max(1, Math.floor(parseNumber(process.env.REGISTER_COUNT, 100)))),
  },
};
