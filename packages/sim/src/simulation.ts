/**
 * Clock-driven Simulation.
 *
 * Owns the signal buffer, one clock, an optional behavioral model and any
 * number of cooperative testbench tasks. Every rising edge runs in a fixed
 * order:
 *
 *   1. the model evaluates (it reads inputs written before the edge),
 *   2. tasks suspended on the edge resume, in the order they suspended,
 *   3. the kernel yields until every resumed task reaches its next
 *      suspension point,
 *   4. the waveform, when enabled, samples every signal.
 *
 * Inputs written by a task during step 3 are therefore first seen by the
 * model on the following edge.
 */

import { writeFileSync } from "node:fs";
import { setImmediate as yieldToTasks } from "node:timers/promises";
import type {
  ClockedModel,
  ModelIO,
  ModuleDefinition,
  PortInfo,
  SignalLayout,
  SimulationOptions,
} from "./types.js";
import { SimulationTimeoutError } from "./types.js";
import { createDut, layoutSignals, readSignal } from "./dut.js";
import { Waveform } from "./waveform.js";

export type TaskStatus = "running" | "finished" | "failed";

interface ClockSpec {
  readonly name: string;
  readonly period: number;
  readonly initialDelay: number;
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

export class Simulation<P = Record<string, number>, D = Record<never, never>> {
  private readonly _module: ModuleDefinition<P, D>;
  private readonly _buffer: ArrayBuffer;
  private readonly _layout: Record<string, SignalLayout>;
  private readonly _dut: P;
  /** Same ports as `_dut`, addressable by name. */
  private readonly _signals: Record<string, number>;
  private readonly _probe: Readonly<D>;
  private readonly _modelIO: ModelIO<P, D>;
  private readonly _options: SimulationOptions;
  private readonly _waveform: Waveform | undefined;
  private readonly _tasks = new Map<string, TaskStatus>();
  private _model: ClockedModel<P, D> | undefined;
  private _clock: ClockSpec | undefined;
  private _edgeWaiters: Array<(cycle: number) => void> = [];
  private _failure: { task: string; error: unknown } | undefined;
  private _time = 0;
  private _cycle = 0;
  private _stepping = false;
  private _disposed = false;

  private constructor(module: ModuleDefinition<P, D>, options: SimulationOptions) {
    const probes = module.probes ?? {};
    const { layout, size } = layoutSignals([module.ports, probes]);

    this._module = module;
    this._options = options;
    this._buffer = new ArrayBuffer(size);
    this._layout = layout;
    this._dut = createDut<P>(this._buffer, layout, module.ports, "testbench");
    this._signals = createDut<Record<string, number>>(
      this._buffer,
      layout,
      module.ports,
      "testbench",
    );
    this._probe = createDut<Readonly<D>>(this._buffer, layout, probes, "observer");
    this._modelIO = createDut<ModelIO<P, D>>(
      this._buffer,
      layout,
      { ...module.ports, ...probes },
      "model",
    );

    if (options.trace || options.vcd) {
      this._waveform = new Waveform(
        Object.entries(layout).map(([name, sig]) => ({ name, width: sig.width })),
      );
    }
  }

  /**
   * Create a Simulation for the given module.
   *
   * ```ts
   * const sim = Simulation.create(I2cMaster, { trace: true });
   * sim.attach(new I2cMasterModel());
   * sim.addClock("clk", { period: 10 });
   * ```
   */
  static create<P, D>(
    module: ModuleDefinition<P, D>,
    options?: SimulationOptions,
  ): Simulation<P, D> {
    return new Simulation<P, D>(module, options ?? {});
  }

  /** The testbench accessor (writes inputs, reads outputs). */
  get dut(): P {
    return this._dut;
  }

  /** The debug probe accessor: a read-only view of the model's probes. */
  get probe(): Readonly<D> {
    return this._probe;
  }

  /** The per-edge recording, when `trace` or `vcd` was requested. */
  get waveform(): Waveform | undefined {
    return this._waveform;
  }

  /** Attach the behavioral model evaluated on every rising edge. */
  attach(model: ClockedModel<P, D>): void {
    this.ensureAlive();
    if (this._model) {
      throw new Error(`A model is already attached to '${this._module.name}'`);
    }
    this._model = model;
  }

  /**
   * Register the periodic clock.
   *
   * @param name    Clock event name (must be one of the module's events).
   * @param opts    `period` in time units; optional `initialDelay`.
   */
  addClock(name: string, opts: { period: number; initialDelay?: number }): void {
    this.ensureAlive();
    if (!this._module.events.includes(name)) {
      throw new Error(
        `Unknown event '${name}'. Available: ${this._module.events.join(", ")}`,
      );
    }
    if (this._clock) {
      throw new Error(`Clock '${this._clock.name}' is already registered`);
    }
    if (!Number.isInteger(opts.period) || opts.period <= 0) {
      throw new RangeError(`Clock period must be a positive integer, got ${opts.period}`);
    }
    this._clock = { name, period: opts.period, initialDelay: opts.initialDelay ?? 0 };
  }

  /** Current simulation time. */
  time(): number {
    return this._time;
  }

  /** Number of rising edges processed so far. */
  cycles(): number {
    return this._cycle;
  }

  /** Time of the next rising edge. */
  nextEdgeTime(): number {
    const clock = this.requireClock();
    return clock.initialDelay + (this._cycle + 1) * clock.period;
  }

  // -----------------------------------------------------------------------
  // Tasks
  // -----------------------------------------------------------------------

  /**
   * Start a testbench task. It runs synchronously up to its first
   * suspension, then resumes from edges and mailboxes. If it throws, the
   * edge that is being processed fails with the same error.
   */
  spawn(name: string, task: () => Promise<void>): void {
    this.ensureAlive();
    if (this._tasks.has(name)) {
      throw new Error(`Task '${name}' is already running`);
    }
    this._tasks.set(name, "running");

    let running: Promise<void>;
    try {
      running = task();
    } catch (error) {
      running = Promise.reject(error);
    }
    void running.then(
      () => {
        this._tasks.set(name, "finished");
      },
      (error: unknown) => {
        this._tasks.set(name, "failed");
        this._failure ??= { task: name, error };
      },
    );
  }

  taskStatus(name: string): TaskStatus | undefined {
    return this._tasks.get(name);
  }

  /** Suspend until the next rising edge; resolves with its cycle number. */
  nextEdge(): Promise<number> {
    this.ensureAlive();
    return new Promise<number>((resolve) => {
      this._edgeWaiters.push(resolve);
    });
  }

  /**
   * Suspend until `condition()` holds. Returns immediately when it already
   * does; otherwise re-checks after every edge.
   *
   * @returns The simulation time when the condition became true.
   * @throws SimulationTimeoutError if `maxCycles` edges pass first.
   */
  async waitUntil(
    condition: () => boolean,
    opts?: { maxCycles?: number },
  ): Promise<number> {
    const max = opts?.maxCycles ?? Infinity;
    let waited = 0;
    while (!condition()) {
      if (waited >= max) {
        throw new SimulationTimeoutError(
          `waitUntil: condition not met after ${max} cycles at time ${this._time}`,
          this._time,
          waited,
        );
      }
      await this.nextEdge();
      waited++;
    }
    return this._time;
  }

  /**
   * Suspend for `count` rising edges.
   *
   * @returns The simulation time after the cycles complete.
   */
  async waitForCycles(count: number): Promise<number> {
    for (let i = 0; i < count; i++) {
      await this.nextEdge();
    }
    return this._time;
  }

  // -----------------------------------------------------------------------
  // Clocking
  // -----------------------------------------------------------------------

  /**
   * Process one rising edge.
   *
   * @returns The time of the processed edge.
   */
  async step(): Promise<number> {
    this.ensureAlive();
    const clock = this.requireClock();
    if (this._stepping) {
      throw new Error("step() called while another edge is in progress");
    }
    this._stepping = true;
    try {
      this._cycle++;
      this._time = clock.initialDelay + this._cycle * clock.period;

      this._model?.edge(this._modelIO);

      const waiters = this._edgeWaiters;
      this._edgeWaiters = [];
      for (const wake of waiters) {
        wake(this._cycle);
      }
      await yieldToTasks();

      if (this._waveform) {
        this.sample(this._time);
      }
      this.throwIfFailed();
      return this._time;
    } finally {
      this._stepping = false;
    }
  }

  /**
   * Run the simulation until the given time.
   * Processes every rising edge up to and including `endTime`.
   */
  async runUntil(endTime: number): Promise<void> {
    while (this.nextEdgeTime() <= endTime) {
      await this.step();
    }
  }

  /** Process `count` rising edges. */
  async runFor(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await this.step();
    }
  }

  /**
   * Assert a reset signal for `activeCycles` edges (default 2), then release.
   *
   * The active level comes from the port definition: active-high unless
   * the port declares `activeLow`.
   */
  async reset(signal: string, opts?: { activeCycles?: number }): Promise<void> {
    this.ensureAlive();
    const port: PortInfo | undefined = this._module.ports[signal];
    if (!port) {
      throw new Error(
        `Unknown port '${signal}'. Available: ${Object.keys(this._module.ports).join(", ")}`,
      );
    }
    if (port.type !== "reset") {
      throw new Error(`Port '${signal}' is not a reset signal (type: '${port.type}').`);
    }
    const activeValue = port.activeLow ? 0 : 1;
    this._signals[signal] = activeValue;
    await this.runFor(opts?.activeCycles ?? 2);
    this._signals[signal] = activeValue ^ 1;
  }

  /** Record the current value of every signal at the given timestamp. */
  dump(timestamp: number): void {
    this.ensureAlive();
    if (!this._waveform) {
      throw new Error("Waveform recording is disabled; create with { trace: true }");
    }
    this.sample(timestamp);
  }

  /** Stop accepting work and write the VCD file, if one was requested. */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this._edgeWaiters = [];
    if (this._options.vcd && this._waveform) {
      writeFileSync(
        this._options.vcd,
        this._waveform.toVcd({
          timescale: this._options.timescale,
          module: this._module.name,
        }),
      );
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private sample(time: number): void {
    const values = Object.values(this._layout).map((sig) => readSignal(this._buffer, sig));
    this._waveform?.sample(time, this._cycle, values);
  }

  private throwIfFailed(): void {
    if (!this._failure) return;
    const { task, error } = this._failure;
    if (error instanceof Error) throw error;
    throw new Error(`Task '${task}' failed: ${String(error)}`);
  }

  private requireClock(): ClockSpec {
    if (!this._clock) {
      throw new Error("No clock registered; call addClock() first");
    }
    return this._clock;
  }

  private ensureAlive(): void {
    if (this._disposed) {
      throw new Error("Simulation has been disposed");
    }
  }
}
