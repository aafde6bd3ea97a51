import { describe, test, expect, afterEach } from "vitest";
import { Simulation } from "@busbench/sim";
import { ControllerState, I2cMaster, Op, type I2cSimulation } from "./bus.js";
import { I2cMasterModel, TargetBank, type I2cMasterModelOptions } from "./controller.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Reset, then pulse `start` so the model accepts a transfer on the returned
 * simulation's latest edge.
 */
async function startTransfer(
  fields: { addr: number; op: number; data: number },
  opts?: I2cMasterModelOptions,
): Promise<{ sim: I2cSimulation; model: I2cMasterModel }> {
  const sim = Simulation.create(I2cMaster);
  const model = new I2cMasterModel(opts);
  sim.attach(model);
  sim.addClock("clk", { period: 10 });
  await sim.reset("rst");

  sim.dut.addr = fields.addr;
  sim.dut.op = fields.op;
  sim.dut.dataIn = fields.data;
  sim.dut.start = 1;
  await sim.step();
  sim.dut.start = 0;
  return { sim, model };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("I2cMasterModel", () => {
  let sim: I2cSimulation | undefined;

  afterEach(() => {
    sim?.dispose();
    sim = undefined;
  });

  test("reset leaves the controller idle", async () => {
    sim = Simulation.create(I2cMaster);
    sim.attach(new I2cMasterModel());
    sim.addClock("clk", { period: 10 });
    await sim.reset("rst", { activeCycles: 5 });
    expect(sim.dut.busy).toBe(0);
    expect(sim.dut.done).toBe(0);
    expect(sim.probe.state).toBe(ControllerState.Idle);
  });

  test("a write completes after transferCycles edges", async () => {
    const started = await startTransfer({ addr: 4, op: Op.Write, data: 3 });
    sim = started.sim;
    expect(started.model.transferCycles).toBe(80);
    expect(sim.dut.busy).toBe(1);
    expect(sim.probe.state).toBe(ControllerState.Start);

    await sim.runFor(79);
    expect(sim.dut.done).toBe(0);
    await sim.step();
    expect(sim.dut.done).toBe(1);
    expect(sim.dut.busy).toBe(1);
    expect(sim.dut.ackErr).toBe(0);
    expect(sim.probe.state).toBe(ControllerState.Done);

    await sim.step();
    expect(sim.dut.done).toBe(0);
    expect(sim.dut.busy).toBe(0);
    expect(sim.probe.state).toBe(ControllerState.Idle);
    expect(started.model.targets.read(4)).toBe(3);
  });

  test("a read returns the target register on dataOut", async () => {
    const targets = new TargetBank();
    targets.write(9, 0x5a);
    const started = await startTransfer({ addr: 9, op: Op.Read, data: 0 }, { targets });
    sim = started.sim;
    await sim.runFor(80);
    expect(sim.dut.done).toBe(1);
    expect(sim.dut.dataOut).toBe(0x5a);
  });

  test("an absent target raises ackErr and skips the data phase", async () => {
    const targets = new TargetBank({ absent: [9] });
    const started = await startTransfer({ addr: 9, op: Op.Write, data: 1 }, { targets });
    sim = started.sim;
    await sim.runFor(43);
    expect(sim.dut.done).toBe(0);
    await sim.step();
    expect(sim.dut.done).toBe(1);
    expect(sim.dut.ackErr).toBe(1);
    expect(targets.read(9)).toBe(0);
  });

  test("the address acknowledge slot follows nine bus bits", async () => {
    const started = await startTransfer({ addr: 1, op: Op.Write, data: 1 });
    sim = started.sim;
    await sim.runFor(35);
    expect(sim.probe.state).toBe(ControllerState.Address);
    await sim.step();
    expect(sim.probe.state).toBe(ControllerState.AddressAck);
  });

  test("a held stretch line freezes the transfer and is latched", async () => {
    const started = await startTransfer({ addr: 1, op: Op.Write, data: 1 });
    sim = started.sim;
    await sim.runFor(36);
    expect(sim.probe.state).toBe(ControllerState.AddressAck);

    sim.dut.stretch = 1;
    await sim.runFor(10);
    expect(sim.probe.state).toBe(ControllerState.AddressAck);
    expect(sim.dut.stretched).toBe(1);

    sim.dut.stretch = 0;
    await sim.runFor(43);
    expect(sim.dut.done).toBe(0);
    await sim.step();
    expect(sim.dut.done).toBe(1);
    expect(sim.dut.stretched).toBe(1);
  });

  test("start is ignored while reset is held", async () => {
    sim = Simulation.create(I2cMaster);
    sim.attach(new I2cMasterModel());
    sim.addClock("clk", { period: 10 });
    sim.dut.rst = 1;
    sim.dut.start = 1;
    await sim.runFor(3);
    expect(sim.dut.busy).toBe(0);
    sim.dut.rst = 0;
    await sim.step();
    expect(sim.dut.busy).toBe(1);
  });

  test("bitCycles must be a positive integer", () => {
    expect(() => new I2cMasterModel({ bitCycles: 0 })).toThrow(
      "bitCycles must be a positive integer, got 0",
    );
  });

  test("targets truncate stored data to a byte", () => {
    const targets = new TargetBank();
    targets.write(3, 0x1ff);
    expect(targets.read(3)).toBe(0xff);
    expect(targets.acknowledges(3)).toBe(true);
  });
});
