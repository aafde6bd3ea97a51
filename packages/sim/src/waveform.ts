/**
 * Per-edge signal recorder with VCD export.
 */

export interface WaveSignal {
  readonly name: string;
  readonly width: number;
}

export interface WaveSample {
  readonly time: number;
  readonly cycle: number;
  /** Values in the order of `Waveform.signals`. */
  readonly values: readonly number[];
}

export class Waveform {
  readonly signals: readonly WaveSignal[];
  private readonly _samples: WaveSample[] = [];
  private readonly _index: Map<string, number>;

  constructor(signals: readonly WaveSignal[]) {
    this.signals = signals;
    this._index = new Map(signals.map((s, i) => [s.name, i]));
  }

  get samples(): readonly WaveSample[] {
    return this._samples;
  }

  sample(time: number, cycle: number, values: readonly number[]): void {
    if (values.length !== this.signals.length) {
      throw new Error(
        `Waveform sample has ${values.length} values, expected ${this.signals.length}`,
      );
    }
    this._samples.push({ time, cycle, values: [...values] });
  }

  /** Every recorded value of one signal, oldest first. */
  series(name: string): number[] {
    const i = this._index.get(name);
    if (i === undefined) {
      throw new Error(
        `Unknown signal '${name}'. Available: ${this.signals.map((s) => s.name).join(", ")}`,
      );
    }
    return this._samples.map((s) => s.values[i] ?? 0);
  }

  /**
   * Render as a Value Change Dump. The first sample lists every signal;
   * later samples list only the signals that changed.
   */
  toVcd(opts?: { timescale?: string; module?: string }): string {
    const ids = this.signals.map((_, i) => vcdId(i));
    const lines: string[] = [
      `$timescale ${opts?.timescale ?? "1ns"} $end`,
      `$scope module ${opts?.module ?? "top"} $end`,
    ];
    this.signals.forEach((s, i) => {
      lines.push(`$var wire ${s.width} ${ids[i]} ${s.name} $end`);
    });
    lines.push("$upscope $end", "$enddefinitions $end");

    let prev: readonly number[] | undefined;
    for (const sample of this._samples) {
      const changes: string[] = [];
      sample.values.forEach((v, i) => {
        if (prev && prev[i] === v) return;
        const sig = this.signals[i];
        if (!sig) return;
        changes.push(
          sig.width === 1 ? `${v}${ids[i]}` : `b${v.toString(2)} ${ids[i]}`,
        );
      });
      if (changes.length > 0) {
        lines.push(`#${sample.time}`, ...changes);
      }
      prev = sample.values;
    }

    return lines.join("\n") + "\n";
  }
}

/** Printable-ASCII identifier code: 0 → "!", 93 → "~", 94 → "!!", ... */
function vcdId(index: number): string {
  let n = index;
  let id = "";
  do {
    id += String.fromCharCode(33 + (n % 94));
    n = Math.floor(n / 94) - 1;
  } while (n >= 0);
  return id;
}
