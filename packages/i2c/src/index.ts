/**
 * @busbench/i2c
 *
 * Conformance harness for a clocked I2C master controller: stimulus
 * generation, stretch-aware driving, edge-accurate monitoring and ordered
 * pass/fail scoring, plus a reference controller model to run it against.
 */

// Bus interface
export {
  I2cMaster,
  Op,
  ControllerState,
  FIRST_ACK_STATE,
} from "./bus.js";
export type {
  I2cMasterPorts,
  I2cMasterProbes,
  I2cSimulation,
  OpCode,
  ControllerStateCode,
} from "./bus.js";

// Reference controller
export { I2cMasterModel, TargetBank } from "./controller.js";
export type { I2cMasterModelOptions } from "./controller.js";

// Pipeline
export {
  Transaction,
  DEFAULT_CONSTRAINTS,
  ADDR_WIDTH,
  DATA_WIDTH,
} from "./transaction.js";
export type {
  TransactionFields,
  TransactionConstraints,
  Range,
  RandomizeOptions,
} from "./transaction.js";
export { Generator, SCRIPTED_STRETCH, DEFAULT_GENERATOR_RANGES } from "./generator.js";
export type { GeneratorOptions } from "./generator.js";
export { Driver } from "./driver.js";
export type { DriverOptions } from "./driver.js";
export { Monitor } from "./monitor.js";
export { Scoreboard } from "./scoreboard.js";
export type { Verdict } from "./scoreboard.js";

// Orchestration
export { BenchEnvironment, runBench } from "./env.js";
export type { BenchEnvironmentOptions, BenchReport } from "./env.js";

// Configuration, logging, randomness, errors
export { BenchConfigSchema, parseConfig, loadConfig } from "./config.js";
export type { BenchConfig, BenchConfigInput } from "./config.js";
export { consoleLogger } from "./log.js";
export type { Logger } from "./log.js";
export { createRng, randomInt } from "./random.js";
export type { Rng } from "./random.js";
export { ConstraintError, ConfigError } from "./errors.js";
