/**
 * @busbench/sim
 *
 * Clocked simulation kernel: typed port accessors over one signal buffer,
 * a single-clock scheduler for cooperative testbench tasks, FIFO
 * mailboxes between tasks, and per-edge waveform recording.
 */

// Core types
export type {
  ModuleDefinition,
  PortInfo,
  SignalLayout,
  AccessRole,
  Writable,
  ModelIO,
  ClockedModel,
  SimulationOptions,
} from "./types.js";
export { SimulationTimeoutError } from "./types.js";

// Simulation (clock-driven)
export { Simulation } from "./simulation.js";
export type { TaskStatus } from "./simulation.js";

// Task hand-off
export { Mailbox } from "./mailbox.js";

// Waveforms
export { Waveform } from "./waveform.js";
export type { WaveSignal, WaveSample } from "./waveform.js";

// DUT accessor (advanced / internal use)
export { createDut, layoutSignals, readSignal, MAX_SIGNAL_WIDTH } from "./dut.js";
