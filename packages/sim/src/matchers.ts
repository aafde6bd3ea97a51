/**
 * vitest custom matchers for recorded waveforms.
 *
 * Usage:
 *   import { setupMatchers } from "@busbench/sim/matchers";
 *   setupMatchers();
 *
 *   expect(sim.waveform?.series("start")).toHavePulses([1, 1]);
 *   expect(sim.waveform?.series("stretch")).toStayLow();
 */

import { expect } from "vitest";

// ---------------------------------------------------------------------------
// Matcher declarations (augment vitest's Assertion interface)
// ---------------------------------------------------------------------------

interface WaveformMatchers<R = unknown> {
  /** Assert the runs of non-zero samples have exactly these lengths, in order. */
  toHavePulses(lengths: readonly number[]): R;
  /** Assert every sample is zero. */
  toStayLow(): R;
}

declare module "vitest" {
  // Type parameter must match vitest's own declaration for the merge.
  // eslint-disable-next-line @typescript-eslint/no-explicit-any, @typescript-eslint/no-empty-object-type
  interface Assertion<T = any> extends WaveformMatchers<T> {}
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface AsymmetricMatchersContaining extends WaveformMatchers {}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isSeries(v: unknown): v is readonly number[] {
  return Array.isArray(v) && v.every((x) => typeof x === "number");
}

function requireSeries(received: unknown, matcher: string): readonly number[] {
  if (!isSeries(received)) {
    throw new TypeError(
      `${matcher} requires an array of samples. Use waveform.series(name) to get one.`,
    );
  }
  return received;
}

/** Lengths of the contiguous runs of non-zero samples. */
export function pulseLengths(series: readonly number[]): number[] {
  const runs: number[] = [];
  let run = 0;
  for (const v of series) {
    if (v !== 0) {
      run++;
    } else if (run > 0) {
      runs.push(run);
      run = 0;
    }
  }
  if (run > 0) runs.push(run);
  return runs;
}

// ---------------------------------------------------------------------------
// Matcher implementations
// ---------------------------------------------------------------------------

const customMatchers = {
  toHavePulses(received: unknown, lengths: readonly number[]) {
    const actual = pulseLengths(requireSeries(received, "toHavePulses"));
    const pass =
      actual.length === lengths.length && actual.every((n, i) => n === lengths[i]);
    return {
      pass,
      message: () =>
        pass
          ? `expected pulses NOT to be [${lengths.join(", ")}]`
          : `expected pulses [${lengths.join(", ")}], got [${actual.join(", ")}]`,
    };
  },

  toStayLow(received: unknown) {
    const series = requireSeries(received, "toStayLow");
    const first = series.findIndex((v) => v !== 0);
    const pass = first === -1;
    return {
      pass,
      message: () =>
        pass
          ? `expected signal to go high at least once`
          : `expected signal to stay low, but sample ${first} is ${series[first]}`,
    };
  },
};

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Register custom matchers with vitest.
 * Call once in a setup file or at the top of your test.
 */
export function setupMatchers(): void {
  expect.extend(customMatchers);
}
