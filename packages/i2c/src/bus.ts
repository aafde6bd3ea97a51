/**
 * I2C master controller bus interface.
 *
 * `ports` is the behavioral contract the harness drives and observes.
 * `probes.state` is a debug-only view of the controller's control state,
 * used by the harness for stretch timing and nothing else.
 */

import type { ModuleDefinition, Simulation } from "@busbench/sim";

/** Bus operation codes carried on the `op` port. */
export const Op = {
  Write: 0,
  Read: 1,
} as const;

export type OpCode = (typeof Op)[keyof typeof Op];

/** Values of the `state` probe. */
export const ControllerState = {
  Idle: 0,
  Start: 1,
  Address: 2,
  AddressAck: 3,
  WriteData: 4,
  ReadData: 5,
  DataAck: 6,
  Stop: 7,
  Done: 8,
} as const;

export type ControllerStateCode = (typeof ControllerState)[keyof typeof ControllerState];

/** The first acknowledge slot of a transfer; the harness stretches here. */
export const FIRST_ACK_STATE: ControllerStateCode = ControllerState.AddressAck;

export interface I2cMasterPorts {
  rst: number;
  /** One-edge strobe that starts a transfer. */
  start: number;
  op: number;
  addr: number;
  dataIn: number;
  /** Clock-stretch hold line: the controller freezes while it is high. */
  stretch: number;
  readonly dataOut: number;
  readonly busy: number;
  readonly ackErr: number;
  /** One-edge completion strobe. */
  readonly done: number;
  /** Set once the current transfer has been held by a clock stretch. */
  readonly stretched: number;
}

export interface I2cMasterProbes {
  readonly state: number;
}

export const I2cMaster: ModuleDefinition<I2cMasterPorts, I2cMasterProbes> = {
  __busbench_module: true,
  name: "I2cMaster",
  ports: {
    clk:       { direction: "input",  type: "clock", width: 1 },
    rst:       { direction: "input",  type: "reset", width: 1 },
    start:     { direction: "input",  type: "logic", width: 1 },
    op:        { direction: "input",  type: "logic", width: 1 },
    addr:      { direction: "input",  type: "logic", width: 7 },
    dataIn:    { direction: "input",  type: "logic", width: 8 },
    stretch:   { direction: "input",  type: "logic", width: 1 },
    dataOut:   { direction: "output", type: "logic", width: 8 },
    busy:      { direction: "output", type: "logic", width: 1 },
    ackErr:    { direction: "output", type: "logic", width: 1 },
    done:      { direction: "output", type: "logic", width: 1 },
    stretched: { direction: "output", type: "logic", width: 1 },
  },
  probes: {
    state: { direction: "output", type: "logic", width: 4 },
  },
  events: ["clk"],
};

/** A simulation of the I2C master, as the harness components see it. */
export type I2cSimulation = Simulation<I2cMasterPorts, I2cMasterProbes>;
