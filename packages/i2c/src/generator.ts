import type { Mailbox } from "@busbench/sim";
import { Op } from "./bus.js";
import type { Logger } from "./log.js";
import type { Rng } from "./random.js";
import {
  DEFAULT_CONSTRAINTS,
  Transaction,
  type TransactionConstraints,
} from "./transaction.js";

/** Stretch requests of the scripted run, in order. */
export const SCRIPTED_STRETCH: readonly boolean[] = [false, true];

/** Generator-level ranges; narrower than the class-level data constraint. */
export const DEFAULT_GENERATOR_RANGES: TransactionConstraints = {
  addr: { min: 0, max: 10 },
  data: { min: 1, max: 5 },
};

export interface GeneratorOptions {
  rng: Rng;
  logger: Logger;
  constraints?: TransactionConstraints;
  ranges?: TransactionConstraints;
}

/**
 * Produces the scripted stimulus and hands it to the Driver.
 * Never touches the bus.
 */
export class Generator {
  private readonly _outbox: Mailbox<Transaction>;
  private readonly _rng: Rng;
  private readonly _logger: Logger;
  private readonly _constraints: TransactionConstraints;
  private readonly _ranges: TransactionConstraints;

  constructor(outbox: Mailbox<Transaction>, opts: GeneratorOptions) {
    this._outbox = outbox;
    this._rng = opts.rng;
    this._logger = opts.logger;
    this._constraints = opts.constraints ?? DEFAULT_CONSTRAINTS;
    this._ranges = opts.ranges ?? DEFAULT_GENERATOR_RANGES;
  }

  async run(): Promise<void> {
    for (const stretch of SCRIPTED_STRETCH) {
      await this.publish(this.next(stretch));
    }
  }

  /** Draw one write transaction. */
  next(stretch: boolean): Transaction {
    return Transaction.randomize(this._rng, {
      constraints: this._constraints,
      inline: this._ranges,
      op: Op.Write,
      stretch,
    });
  }

  /** Log a transaction, then enqueue it for the Driver. */
  async publish(tx: Transaction): Promise<void> {
    this._logger.info(`[GENERATOR] ${tx.toString()}`);
    await this._outbox.put(tx);
  }
}
