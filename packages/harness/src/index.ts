/**
 * @fifo-verify/harness
 *
 * Cooperative clock-edge simulation kernel plus the components that verify
 * a dual-clock FIFO through its pins: sequencer, driver, monitor,
 * scoreboard and reset coordinator.
 */

// Core types
export type {
  DeviceDefinition,
  DeviceHandle,
  PortInfo,
  SignalAccess,
  SignalLayout,
  ClockOptions,
  ClockDomain,
  Edge,
  EdgeSource,
  Task,
} from "./types.js";

// Errors
export {
  SimulationTimeoutError,
  BackpressureTimeoutError,
  ProtocolViolationError,
  ScoreboardError,
  SequencerError,
  TransactionError,
  ConfigError,
  hex,
} from "./errors.js";
export type { Mismatch } from "./errors.js";

// Kernel
export { Simulation } from "./simulation.js";
export type { SimulationOptions } from "./simulation.js";
export { createDut, snapshotDut, createSignalAccess, buildLayout, MAX_PIN_WIDTH } from "./dut.js";
export { Channel } from "./channel.js";

// Configuration / logging
export {
  HarnessConfigSchema,
  ClockConfigSchema,
  ResetConfigSchema,
  LogLevelSchema,
  LOG_LEVEL_ENV,
  loadConfig,
  formatIssues,
} from "./config.js";
export type { HarnessConfig, HarnessConfigInput, ClockConfig, ResetConfig } from "./config.js";
export { createLogger, componentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";

// FIFO pin contract
export { fifoPorts, WRITE_CLOCK, READ_CLOCK } from "./pins.js";
export type { FifoPins, WritePins, ReadPins } from "./pins.js";

// Verification components
export {
  write,
  read,
  writes,
  reads,
  writeThenRead,
  interleave,
  parseTransaction,
  describeTransaction,
} from "./transaction.js";
export type { Transaction, WriteTransaction, ReadTransaction } from "./transaction.js";
export { Sequencer } from "./sequencer.js";
export { FifoDriver, WriteDriver, ReadDriver } from "./driver.js";
export type { DriverOptions } from "./driver.js";
export { FifoMonitor, ReadAlignment } from "./monitor.js";
export type { FifoEvent, TransferEvent, ResetEvent, EventSink, Domain } from "./monitor.js";
export { Scoreboard } from "./scoreboard.js";
export type { ScoreboardReport } from "./scoreboard.js";
export { ResetCoordinator } from "./reset.js";
export type { ResetState, ResetOptions } from "./reset.js";
export { FifoEnv } from "./env.js";
