import type { Mailbox } from "@busbench/sim";
import type { Logger } from "./log.js";
import type { Transaction } from "./transaction.js";

export interface Verdict {
  readonly passed: boolean;
  readonly observed: Transaction;
}

/**
 * Adjudicates observed transactions in arrival order.
 *
 * There is no transaction id: the n-th verdict is assumed to belong to the
 * n-th stimulus. A dropped or duplicated `done` edge would shift every
 * later verdict onto the wrong stimulus without any report.
 */
export class Scoreboard {
  private readonly _results: Verdict[] = [];
  private readonly _inbox: Mailbox<Transaction>;
  private readonly _logger: Logger;

  constructor(inbox: Mailbox<Transaction>, opts: { logger: Logger }) {
    this._inbox = inbox;
    this._logger = opts.logger;
  }

  /** Verdicts so far, in arrival order. */
  get results(): readonly Verdict[] {
    return this._results;
  }

  async run(): Promise<void> {
    for (;;) {
      this.check(await this._inbox.get());
    }
  }

  check(observed: Transaction): Verdict {
    const passed = observed.ackErr !== true;
    if (passed) {
      this._logger.info(
        `[SCOREBOARD] PASS addr=${observed.addr} op=${observed.op} ` +
          `data=${observed.data} stretch=${observed.stretch ? 1 : 0}`,
      );
    } else {
      this._logger.error(
        `[SCOREBOARD] FAIL addr=${observed.addr} op=${observed.op} (ack error)`,
      );
    }
    const verdict: Verdict = { passed, observed };
    this._results.push(verdict);
    return verdict;
  }
}
