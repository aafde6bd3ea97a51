/**
 * Reference behavioral model of the I2C master controller.
 *
 * Not a bit-accurate bus model: each bus bit takes `bitCycles` clock edges
 * and SCL/SDA are not represented. What it reproduces is the signal
 * contract the harness relies on: busy/done/ackErr sequencing, the state
 * probe, and freezing while the stretch line is held.
 */

import type { ClockedModel, ModelIO } from "@busbench/sim";
import {
  ControllerState,
  Op,
  type ControllerStateCode,
  type I2cMasterPorts,
  type I2cMasterProbes,
  type OpCode,
} from "./bus.js";

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

/**
 * The devices on the bus: one byte register per address. Every address
 * acknowledges unless listed as absent.
 */
export class TargetBank {
  private readonly _absent: ReadonlySet<number>;
  private readonly _registers = new Map<number, number>();

  constructor(opts?: { absent?: Iterable<number> }) {
    this._absent = new Set(opts?.absent ?? []);
  }

  acknowledges(addr: number): boolean {
    return !this._absent.has(addr);
  }

  write(addr: number, data: number): void {
    this._registers.set(addr, data & 0xff);
  }

  read(addr: number): number {
    return this._registers.get(addr) ?? 0;
  }
}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export interface I2cMasterModelOptions {
  /** Clock edges per bus bit. Default: 4. */
  bitCycles?: number;
  targets?: TargetBank;
}

type IO = ModelIO<I2cMasterPorts, I2cMasterProbes>;

export class I2cMasterModel implements ClockedModel<I2cMasterPorts, I2cMasterProbes> {
  readonly targets: TargetBank;
  private readonly _bitCycles: number;
  private _state: ControllerStateCode = ControllerState.Idle;
  private _remaining = 0;
  private _addr = 0;
  private _op: OpCode = Op.Write;
  private _data = 0;

  constructor(opts?: I2cMasterModelOptions) {
    const bitCycles = opts?.bitCycles ?? 4;
    if (!Number.isInteger(bitCycles) || bitCycles < 1) {
      throw new RangeError(`bitCycles must be a positive integer, got ${bitCycles}`);
    }
    this._bitCycles = bitCycles;
    this.targets = opts?.targets ?? new TargetBank();
  }

  /** Edges an unstretched transfer takes from accepting `start` to `done`. */
  get transferCycles(): number {
    return 20 * this._bitCycles;
  }

  edge(io: IO): void {
    if (io.rst) {
      this._state = ControllerState.Idle;
      io.busy = 0;
      io.done = 0;
      io.ackErr = 0;
      io.stretched = 0;
      io.dataOut = 0;
      io.state = this._state;
      return;
    }

    io.done = 0;
    switch (this._state) {
      case ControllerState.Idle:
        if (io.start) {
          this._addr = io.addr;
          this._op = io.op === Op.Read ? Op.Read : Op.Write;
          this._data = io.dataIn;
          io.busy = 1;
          io.ackErr = 0;
          io.stretched = 0;
          this.enter(ControllerState.Start, 1);
        }
        break;

      case ControllerState.Done:
        io.busy = 0;
        this._state = ControllerState.Idle;
        break;

      default:
        // A held stretch line freezes every active phase.
        if (io.stretch) {
          io.stretched = 1;
          break;
        }
        if (--this._remaining > 0) break;
        this.advance(io);
    }
    io.state = this._state;
  }

  private advance(io: IO): void {
    switch (this._state) {
      case ControllerState.Start:
        this.enter(ControllerState.Address, 8);
        break;

      case ControllerState.Address:
        this.enter(ControllerState.AddressAck, 1);
        break;

      case ControllerState.AddressAck:
        if (!this.targets.acknowledges(this._addr)) {
          io.ackErr = 1;
          this.enter(ControllerState.Stop, 1);
        } else if (this._op === Op.Read) {
          this.enter(ControllerState.ReadData, 8);
        } else {
          this.enter(ControllerState.WriteData, 8);
        }
        break;

      case ControllerState.WriteData:
        this.targets.write(this._addr, this._data);
        this.enter(ControllerState.DataAck, 1);
        break;

      case ControllerState.ReadData:
        io.dataOut = this.targets.read(this._addr);
        this.enter(ControllerState.DataAck, 1);
        break;

      case ControllerState.DataAck:
        this.enter(ControllerState.Stop, 1);
        break;

      case ControllerState.Stop:
        this._state = ControllerState.Done;
        io.done = 1;
        break;
    }
  }

  /** Enter a phase lasting `bits` bus bits. */
  private enter(state: ControllerStateCode, bits: number): void {
    this._state = state;
    this._remaining = bits * this._bitCycles;
  }
}
