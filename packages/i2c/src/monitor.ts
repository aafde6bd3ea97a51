/**
 * The Monitor is a passive observer of the bus.
 *
 * Samples `done` once per edge and reacts to its 0→1 transition only, so a
 * strobe held high for several edges still yields a single observation.
 */

import type { Mailbox } from "@busbench/sim";
import { Op, type I2cSimulation } from "./bus.js";
import type { Logger } from "./log.js";
import { Transaction } from "./transaction.js";

export class Monitor {
  private readonly _sim: I2cSimulation;
  private readonly _outbox: Mailbox<Transaction>;
  private readonly _logger: Logger;

  constructor(sim: I2cSimulation, outbox: Mailbox<Transaction>, opts: { logger: Logger }) {
    this._sim = sim;
    this._outbox = outbox;
    this._logger = opts.logger;
  }

  async run(): Promise<void> {
    const { dut } = this._sim;
    let prev = dut.done;
    for (;;) {
      await this._sim.nextEdge();
      const done = dut.done;
      if (prev === 0 && done === 1) {
        const observed = this.capture();
        this._logger.info(`[MONITOR] ${observed.toString()}`);
        await this._outbox.put(observed);
      }
      prev = done;
    }
  }

  /** Build an observed transaction from the current signal values. */
  capture(): Transaction {
    const { dut } = this._sim;
    const op = dut.op === Op.Read ? Op.Read : Op.Write;
    return Transaction.observed(
      {
        addr: dut.addr,
        op,
        data: op === Op.Write ? dut.dataIn : dut.dataOut,
        stretch: dut.stretched === 1,
      },
      dut.ackErr === 1,
    );
  }
}
