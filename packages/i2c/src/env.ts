/**
 * Wires the pipeline around one controller:
 *
 *   Generator → stimulus mailbox → Driver → bus ⇄ controller
 *     → bus → Monitor → observed mailbox → Scoreboard
 *
 * and runs it for a fixed number of clock edges.
 */

import { Mailbox, Simulation, type ClockedModel } from "@busbench/sim";
import { I2cMaster, type I2cMasterPorts, type I2cMasterProbes, type I2cSimulation } from "./bus.js";
import { parseConfig, type BenchConfig, type BenchConfigInput } from "./config.js";
import { I2cMasterModel, TargetBank } from "./controller.js";
import { Driver } from "./driver.js";
import { Generator } from "./generator.js";
import { consoleLogger, type Logger } from "./log.js";
import { Monitor } from "./monitor.js";
import { createRng } from "./random.js";
import { Scoreboard, type Verdict } from "./scoreboard.js";
import type { Transaction } from "./transaction.js";

export interface BenchEnvironmentOptions {
  logger?: Logger;
  /** Controller under test. Default: `I2cMasterModel` built from the config. */
  model?: ClockedModel<I2cMasterPorts, I2cMasterProbes>;
  /** Fixed stimulus to publish instead of the randomized script. */
  stimulus?: readonly Transaction[];
  /** Record every signal per edge (implied by `config.vcd`). */
  trace?: boolean;
}

export interface BenchReport {
  /** Simulation time at the end of the run. */
  readonly time: number;
  readonly cycles: number;
  readonly verdicts: readonly Verdict[];
}

export class BenchEnvironment {
  readonly config: BenchConfig;
  readonly sim: I2cSimulation;
  readonly stimulus = new Mailbox<Transaction>();
  readonly observed = new Mailbox<Transaction>();
  readonly generator: Generator;
  readonly driver: Driver;
  readonly monitor: Monitor;
  readonly scoreboard: Scoreboard;
  private readonly _logger: Logger;
  private readonly _fixedStimulus: readonly Transaction[] | undefined;

  constructor(config?: BenchConfigInput, opts?: BenchEnvironmentOptions) {
    this.config = parseConfig(config);
    this._logger = opts?.logger ?? consoleLogger;
    this._fixedStimulus = opts?.stimulus;

    const cfg = this.config;
    this.sim = Simulation.create(I2cMaster, { trace: opts?.trace, vcd: cfg.vcd });
    this.sim.attach(
      opts?.model ??
        new I2cMasterModel({
          bitCycles: cfg.controller.bitCycles,
          targets: new TargetBank({ absent: cfg.controller.absentTargets }),
        }),
    );

    const logger = this._logger;
    this.generator = new Generator(this.stimulus, {
      rng: createRng(cfg.seed ?? Math.floor(Math.random() * 0x1_0000_0000)),
      logger,
      constraints: cfg.transaction,
      ranges: cfg.generator,
    });
    this.driver = new Driver(this.sim, this.stimulus, {
      logger,
      stretchCycles: cfg.stretchCycles,
      ackState: cfg.ackState,
    });
    this.monitor = new Monitor(this.sim, this.observed, { logger });
    this.scoreboard = new Scoreboard(this.observed, { logger });
  }

  /**
   * Clock, reset, run the pipeline for `runCycles` edges, then shut down.
   * Transactions still in flight at the end are abandoned. The simulation
   * is disposed, and any VCD written, even when a task fails.
   */
  async run(): Promise<BenchReport> {
    const { sim, config } = this;

    sim.addClock("clk", { period: config.clockPeriod });
    await sim.reset("rst", { activeCycles: config.resetCycles });

    sim.spawn("monitor", () => this.monitor.run());
    sim.spawn("scoreboard", () => this.scoreboard.run());
    sim.spawn("driver", () => this.driver.run());
    sim.spawn("generator", () => this.publish());

    try {
      await sim.runUntil(config.runCycles * config.clockPeriod);
      this._logger.info(`[ENV] simulation complete at t=${sim.time()}`);
    } finally {
      sim.dispose();
    }

    return {
      time: sim.time(),
      cycles: sim.cycles(),
      verdicts: [...this.scoreboard.results],
    };
  }

  private async publish(): Promise<void> {
    if (!this._fixedStimulus) {
      await this.generator.run();
      return;
    }
    for (const tx of this._fixedStimulus) {
      await this.generator.publish(tx);
    }
  }
}

/** Build an environment from a config and run it once. */
export function runBench(
  config?: BenchConfigInput,
  opts?: BenchEnvironmentOptions,
): Promise<BenchReport> {
  return new BenchEnvironment(config, opts).run();
}
