/**
 * One requested bus operation.
 *
 * Stimulus transactions come from the Generator and are applied by the
 * Driver. Observed transactions are built separately by the Monitor from
 * live signal values; only they carry an `ackErr` outcome. The two are
 * never the same object.
 */

import { Op, type OpCode } from "./bus.js";
import { ConstraintError } from "./errors.js";
import { randomInt, type Rng } from "./random.js";

export const ADDR_WIDTH = 7;
export const DATA_WIDTH = 8;

export interface Range {
  readonly min: number;
  readonly max: number;
}

export interface TransactionConstraints {
  readonly addr: Range;
  readonly data: Range;
}

/** Class-level field constraints. */
export const DEFAULT_CONSTRAINTS: TransactionConstraints = {
  addr: { min: 0, max: 10 },
  data: { min: 0, max: 10 },
};

export interface TransactionFields {
  readonly addr: number;
  readonly op: OpCode;
  readonly data: number;
  readonly stretch: boolean;
}

export interface RandomizeOptions {
  /** Class-level constraints. Default: `DEFAULT_CONSTRAINTS`. */
  readonly constraints?: TransactionConstraints;
  /** Extra per-call ranges, applied on top of `constraints`. */
  readonly inline?: Partial<TransactionConstraints>;
  readonly op?: OpCode;
  readonly stretch: boolean;
}

export class Transaction implements TransactionFields {
  readonly addr: number;
  readonly op: OpCode;
  readonly data: number;
  readonly stretch: boolean;
  /** Acknowledgement failure observed on the bus; unset on stimulus. */
  readonly ackErr: boolean | undefined;

  constructor(fields: TransactionFields, ackErr?: boolean) {
    checkWidth("addr", fields.addr, ADDR_WIDTH);
    checkWidth("data", fields.data, DATA_WIDTH);
    if (fields.op !== Op.Write && fields.op !== Op.Read) {
      throw new ConstraintError("op", `${String(fields.op)} is not a bus operation`);
    }
    this.addr = fields.addr;
    this.op = fields.op;
    this.data = fields.data;
    this.stretch = fields.stretch;
    this.ackErr = ackErr;
  }

  /**
   * Draw `addr` and `data` uniformly from the overlap of the class-level
   * constraints and the inline ranges.
   */
  static randomize(rng: Rng, opts: RandomizeOptions): Transaction {
    const constraints = opts.constraints ?? DEFAULT_CONSTRAINTS;
    const addr = overlap("addr", constraints.addr, opts.inline?.addr);
    const data = overlap("data", constraints.data, opts.inline?.data);
    return new Transaction({
      addr: randomInt(rng, addr.min, addr.max),
      op: opts.op ?? Op.Write,
      data: randomInt(rng, data.min, data.max),
      stretch: opts.stretch,
    });
  }

  /** A record of what the bus showed at completion. */
  static observed(fields: TransactionFields, ackErr: boolean): Transaction {
    return new Transaction(fields, ackErr);
  }

  toString(): string {
    const ack = this.ackErr === undefined ? "x" : this.ackErr ? "1" : "0";
    return (
      `addr=${this.addr} op=${this.op} data=${this.data} ` +
      `stretch=${this.stretch ? 1 : 0} ackErr=${ack}`
    );
  }
}

function checkWidth(field: string, value: number, width: number): void {
  const max = 2 ** width - 1;
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ConstraintError(field, `${value} does not fit in ${width} bits`);
  }
}

function overlap(field: string, base: Range, inline: Range | undefined): Range {
  const min = Math.max(base.min, inline?.min ?? base.min);
  const max = Math.min(base.max, inline?.max ?? base.max);
  if (min > max) {
    throw new ConstraintError(
      field,
      `no value satisfies [${base.min},${base.max}]` +
        (inline ? ` and [${inline.min},${inline.max}]` : ""),
    );
  }
  return { min, max };
}
