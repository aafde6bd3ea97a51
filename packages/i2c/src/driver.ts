/**
 * The Driver is the only writer of the stimulus-side bus signals
 * (`addr`, `op`, `dataIn`, `start`, `stretch`).
 *
 * One transaction is in flight at a time: each one starts with a wait for
 * `busy == 0`. None of the waits has a timeout; a controller that never
 * reaches the awaited state leaves the Driver suspended for good.
 */

import type { Mailbox } from "@busbench/sim";
import { FIRST_ACK_STATE, type I2cSimulation } from "./bus.js";
import type { Logger } from "./log.js";
import type { Transaction } from "./transaction.js";

export interface DriverOptions {
  logger: Logger;
  /** Edges the stretch line stays high. Default: 1200. */
  stretchCycles?: number;
  /** State code at which the stretch begins. Default: the first acknowledge. */
  ackState?: number;
}

export class Driver {
  private readonly _sim: I2cSimulation;
  private readonly _inbox: Mailbox<Transaction>;
  private readonly _logger: Logger;
  private readonly _stretchCycles: number;
  private readonly _ackState: number;

  constructor(sim: I2cSimulation, inbox: Mailbox<Transaction>, opts: DriverOptions) {
    this._sim = sim;
    this._inbox = inbox;
    this._logger = opts.logger;
    this._stretchCycles = opts.stretchCycles ?? 1200;
    this._ackState = opts.ackState ?? FIRST_ACK_STATE;
  }

  async run(): Promise<void> {
    for (;;) {
      await this.drive(await this._inbox.get());
    }
  }

  async drive(tx: Transaction): Promise<void> {
    const sim = this._sim;
    const { dut, probe } = sim;

    await sim.waitUntil(() => dut.busy === 0);

    this._logger.info(`[DRIVER] ${tx.toString()}`);
    dut.addr = tx.addr;
    dut.op = tx.op;
    dut.dataIn = tx.data;
    dut.stretch = 0;

    // Start is sampled high at exactly one edge: the first one that sets busy.
    await sim.nextEdge();
    dut.start = 1;
    await sim.waitUntil(() => dut.busy === 1);
    dut.start = 0;

    if (tx.stretch) {
      await sim.waitUntil(() => probe.state === this._ackState);
      dut.stretch = 1;
      await sim.waitForCycles(this._stretchCycles);
      dut.stretch = 0;
      this._logger.info(`[DRIVER] stretch released after ${this._stretchCycles} cycles`);
    }

    await sim.waitUntil(() => dut.done === 1);
    await sim.waitUntil(() => dut.busy === 0);
    await sim.nextEdge();
  }
}
