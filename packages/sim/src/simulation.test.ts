import { describe, test, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Simulation } from "./simulation.js";
import type { ClockedModel, ModelIO, ModuleDefinition } from "./types.js";
import { SimulationTimeoutError } from "./types.js";

// ---------------------------------------------------------------------------
// Test module
// ---------------------------------------------------------------------------

interface CounterPorts {
  rst: number;
  en: number;
  readonly count: number;
}

interface CounterProbes {
  readonly phase: number;
}

const Counter: ModuleDefinition<CounterPorts, CounterProbes> = {
  __busbench_module: true,
  name: "Counter",
  ports: {
    clk:   { direction: "input", type: "clock", width: 1 },
    rst:   { direction: "input", type: "reset", width: 1 },
    en:    { direction: "input", type: "logic", width: 1 },
    count: { direction: "output", type: "logic", width: 8 },
  },
  probes: {
    phase: { direction: "output", type: "logic", width: 2 },
  },
  events: ["clk"],
};

class CounterModel implements ClockedModel<CounterPorts, CounterProbes> {
  edge(io: ModelIO<CounterPorts, CounterProbes>): void {
    if (io.rst) {
      io.count = 0;
      io.phase = 0;
      return;
    }
    if (io.en) {
      io.count = io.count + 1;
      io.phase = io.phase + 1;
    }
  }
}

function counterSim(opts?: { trace?: boolean; vcd?: string }): Simulation<CounterPorts, CounterProbes> {
  const sim = Simulation.create(Counter, opts);
  sim.attach(new CounterModel());
  sim.addClock("clk", { period: 10 });
  return sim;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Simulation", () => {
  let sim: Simulation<CounterPorts, CounterProbes> | undefined;

  afterEach(() => {
    sim?.dispose();
    sim = undefined;
  });

  test("step advances time by one period", async () => {
    sim = counterSim();
    expect(sim.time()).toBe(0);
    expect(await sim.step()).toBe(10);
    expect(await sim.step()).toBe(20);
    expect(sim.cycles()).toBe(2);
    expect(sim.nextEdgeTime()).toBe(30);
  });

  test("addClock with initialDelay", async () => {
    sim = Simulation.create(Counter);
    sim.addClock("clk", { period: 10, initialDelay: 5 });
    expect(await sim.step()).toBe(15);
  });

  test("addClock rejects unknown events and a second clock", () => {
    sim = Simulation.create(Counter);
    expect(() => sim?.addClock("sclk", { period: 10 })).toThrow(
      "Unknown event 'sclk'. Available: clk",
    );
    sim.addClock("clk", { period: 10 });
    expect(() => sim?.addClock("clk", { period: 4 })).toThrow(
      "Clock 'clk' is already registered",
    );
  });

  test("step without a clock rejects", async () => {
    sim = Simulation.create(Counter);
    await expect(sim.step()).rejects.toThrow("No clock registered; call addClock() first");
  });

  test("attach accepts a single model", () => {
    sim = counterSim();
    expect(() => sim?.attach(new CounterModel())).toThrow(
      "A model is already attached to 'Counter'",
    );
  });

  test("model sees inputs written before the edge", async () => {
    sim = counterSim();
    sim.dut.en = 1;
    await sim.step();
    expect(sim.dut.count).toBe(1);
    await sim.step();
    expect(sim.dut.count).toBe(2);
    sim.dut.en = 0;
    await sim.step();
    expect(sim.dut.count).toBe(2);
    expect(sim.probe.phase).toBe(2);
  });

  test("testbench cannot write outputs", () => {
    sim = counterSim();
    expect(() => Reflect.set(sim?.dut ?? {}, "count", 3)).toThrow(
      "Cannot write to output port 'count' from the testbench side",
    );
  });

  test("probes are read-only to the testbench", () => {
    sim = counterSim();
    expect(() => Reflect.set(sim?.probe ?? {}, "phase", 1)).toThrow(
      "Cannot write to output port 'phase' from the observer side",
    );
  });

  test("values are truncated to the port width", async () => {
    sim = counterSim();
    sim.dut.en = 3;
    expect(sim.dut.en).toBe(1);
    await sim.runFor(5);
    // 2-bit probe wraps
    expect(sim.probe.phase).toBe(1);
  });

  test("waitUntil resumes a task at the edge the condition holds", async () => {
    sim = counterSim();
    const s = sim;
    let seenAt = -1;
    s.spawn("watch", async () => {
      seenAt = await s.waitUntil(() => s.dut.count === 3);
    });
    s.dut.en = 1;
    await s.runFor(5);
    expect(seenAt).toBe(30);
    expect(s.taskStatus("watch")).toBe("finished");
  });

  test("waitUntil returns at once when the condition already holds", async () => {
    sim = counterSim();
    await sim.runFor(2);
    expect(await sim.waitUntil(() => true)).toBe(20);
    expect(sim.cycles()).toBe(2);
  });

  test("waitUntil with maxCycles fails the running edge", async () => {
    sim = counterSim();
    const s = sim;
    s.spawn("stuck", async () => {
      await s.waitUntil(() => s.dut.count === 99, { maxCycles: 2 });
    });
    await expect(s.runFor(3)).rejects.toThrow(SimulationTimeoutError);
    expect(s.cycles()).toBe(2);
    expect(s.taskStatus("stuck")).toBe("failed");
  });

  test("a task's input write takes effect on the following edge", async () => {
    sim = counterSim();
    const s = sim;
    s.spawn("enable", async () => {
      await s.nextEdge();
      s.dut.en = 1;
    });
    await s.step();
    expect(s.dut.count).toBe(0);
    await s.step();
    expect(s.dut.count).toBe(1);
  });

  test("waitForCycles counts edges", async () => {
    sim = counterSim();
    const s = sim;
    let resumedAt = 0;
    s.spawn("delay", async () => {
      resumedAt = await s.waitForCycles(4);
    });
    await s.runUntil(100);
    expect(resumedAt).toBe(40);
    expect(s.cycles()).toBe(10);
  });

  test("spawn refuses a duplicate task name", () => {
    sim = counterSim();
    const s = sim;
    s.spawn("a", () => s.waitForCycles(1).then(() => undefined));
    expect(() => s.spawn("a", async () => undefined)).toThrow("Task 'a' is already running");
  });

  test("reset holds the signal active for the requested edges", async () => {
    sim = counterSim();
    sim.dut.en = 1;
    await sim.runFor(2);
    expect(sim.dut.count).toBe(2);
    await sim.reset("rst", { activeCycles: 3 });
    expect(sim.cycles()).toBe(5);
    expect(sim.dut.rst).toBe(0);
    expect(sim.dut.count).toBe(0);
    await sim.step();
    expect(sim.dut.count).toBe(1);
  });

  test("reset rejects non-reset ports", async () => {
    sim = counterSim();
    await expect(sim.reset("en")).rejects.toThrow(
      "Port 'en' is not a reset signal (type: 'logic').",
    );
  });

  test("trace records every signal once per edge", async () => {
    sim = counterSim({ trace: true });
    sim.dut.en = 1;
    await sim.runFor(3);
    const wave = sim.waveform;
    expect(wave?.series("count")).toEqual([1, 2, 3]);
    expect(wave?.series("phase")).toEqual([1, 2, 3]);
    expect(wave?.samples.map((s) => s.time)).toEqual([10, 20, 30]);
  });

  test("dump requires tracing", () => {
    sim = counterSim();
    expect(() => sim?.dump(0)).toThrow(
      "Waveform recording is disabled; create with { trace: true }",
    );
  });

  test("dispose writes the VCD file and stops the simulation", async () => {
    const dir = mkdtempSync(join(tmpdir(), "busbench-"));
    try {
      const vcd = join(dir, "counter.vcd");
      const s = counterSim({ vcd });
      s.dut.en = 1;
      await s.runFor(1);
      s.dispose();

      const text = readFileSync(vcd, "utf8");
      expect(text.split("\n").slice(0, 2)).toEqual([
        "$timescale 1ns $end",
        "$scope module Counter $end",
      ]);
      await expect(s.step()).rejects.toThrow("Simulation has been disposed");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
