/**
 * @busbench/sim core type definitions
 *
 * These types define the contract between:
 *   - module definitions (port lists written alongside a behavioral model)
 *   - the DUT accessor factory, which lays signals out in one buffer
 *   - the Simulation kernel, which clocks the model and schedules tasks
 */

// ---------------------------------------------------------------------------
// Module definition
// ---------------------------------------------------------------------------

/**
 * A module descriptor.
 * The type parameters carry the testbench-facing port interface
 * (e.g. `I2cMasterPorts`) and the debug probe interface, so that
 * `Simulation.create(I2cMaster)` returns correctly-typed accessors.
 */
export interface ModuleDefinition<
  Ports = Record<string, number>,
  Probes = Record<never, never>,
> {
  readonly __busbench_module: true;
  readonly name: string;
  /** Behavioral ports: the contract the testbench drives and observes. */
  readonly ports: Record<string, PortInfo>;
  /**
   * Debug-only outputs, kept apart from `ports` so that any testbench
   * dependency on model internals goes through `sim.probe`.
   */
  readonly probes?: Record<string, PortInfo>;
  /** Clock port names. */
  readonly events: readonly string[];
  /** Phantom fields, never set at runtime. */
  readonly __ports?: Ports;
  readonly __probes?: Probes;
}

/** Metadata for a single port. */
export interface PortInfo {
  readonly direction: "input" | "output";
  readonly type: "clock" | "reset" | "logic" | "bit";
  readonly width: number;
  /** Reset polarity. Only meaningful for `type: "reset"`. Default: false. */
  readonly activeLow?: boolean;
}

// ---------------------------------------------------------------------------
// Signal layout
// ---------------------------------------------------------------------------

/**
 * Byte-level location of a signal inside the signal buffer.
 * @internal
 */
export interface SignalLayout {
  /** Byte offset within the buffer. */
  readonly offset: number;
  /** Bit width of the signal. */
  readonly width: number;
  /** Number of bytes occupied: 1, 2 or 4. */
  readonly byteSize: number;
  readonly direction: "input" | "output";
}

/**
 * Which side of the port boundary an accessor belongs to.
 *
 * - `testbench` may write inputs and only read outputs.
 * - `model` may write outputs and only read inputs.
 * - `observer` may only read.
 */
export type AccessRole = "testbench" | "model" | "observer";

// ---------------------------------------------------------------------------
// Behavioral model
// ---------------------------------------------------------------------------

/** Strip `readonly` from every property. */
export type Writable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * The model-side view of a module: every port and probe is writable at the
 * type level; the accessor rejects writes to inputs at runtime.
 */
export type ModelIO<Ports, Probes> = Writable<Ports> & Writable<Probes>;

/**
 * A clocked behavioral model. `edge()` runs once per rising clock edge,
 * before any testbench task observes that edge.
 */
export interface ClockedModel<Ports, Probes> {
  edge(io: ModelIO<Ports, Probes>): void;
}

// ---------------------------------------------------------------------------
// User-facing options
// ---------------------------------------------------------------------------

export interface SimulationOptions {
  /** Path to write VCD waveform output on dispose(). Implies `trace`. */
  vcd?: string;
  /** Record every signal once per edge. Default: false. */
  trace?: boolean;
  /** VCD `$timescale` value. Default: "1ns". */
  timescale?: string;
}

// ---------------------------------------------------------------------------
// Simulation timeout error
// ---------------------------------------------------------------------------

/**
 * Thrown when a simulation helper exceeds its cycle budget.
 */
export class SimulationTimeoutError extends Error {
  readonly time: number;
  readonly cycles: number;

  constructor(message: string, time: number, cycles: number) {
    super(message);
    this.name = "SimulationTimeoutError";
    this.time = time;
    this.cycles = cycles;
  }
}
