/**
 * DUT (Device Under Test) accessor factory.
 *
 * Builds a plain object with Object.defineProperty getter/setters that
 * read and write directly via DataView on one shared ArrayBuffer.
 * No Proxy is used; every port becomes a concrete property.
 *
 * The same buffer backs several accessors: the testbench view, the model
 * view and the read-only probe view all see the same bytes, so a value
 * written on one side is visible on the other immediately.
 */

import type { AccessRole, PortInfo, SignalLayout } from "./types.js";

/** Widest signal this kernel stores. */
export const MAX_SIGNAL_WIDTH = 32;

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

/**
 * Assign byte offsets to every non-clock signal, in declaration order.
 * Later groups continue where earlier ones stopped, so ports and probes
 * can share a buffer.
 */
export function layoutSignals(
  groups: readonly Record<string, PortInfo>[],
): { layout: Record<string, SignalLayout>; size: number } {
  const layout: Record<string, SignalLayout> = {};
  let offset = 0;

  for (const group of groups) {
    for (const [name, port] of Object.entries(group)) {
      if (port.type === "clock") continue;
      if (layout[name]) {
        throw new Error(`Duplicate signal '${name}'`);
      }
      if (!Number.isInteger(port.width) || port.width < 1 || port.width > MAX_SIGNAL_WIDTH) {
        throw new Error(
          `Signal '${name}' has unsupported width ${port.width} (1..${MAX_SIGNAL_WIDTH})`,
        );
      }
      const byteSize = Math.ceil(port.width / 8);
      // Keep 16/32-bit reads aligned.
      const align = byteSize >= 4 ? 4 : byteSize >= 2 ? 2 : 1;
      offset = Math.ceil(offset / align) * align;
      const sig: SignalLayout = {
        offset,
        width: port.width,
        byteSize: byteSize === 3 ? 4 : byteSize,
        direction: port.direction,
      };
      layout[name] = sig;
      offset += sig.byteSize;
    }
  }

  return { layout, size: Math.max(offset, 1) };
}

// ---------------------------------------------------------------------------
// DataView helpers
// ---------------------------------------------------------------------------

function mask(width: number): number {
  return width === 32 ? 0xffff_ffff : (1 << width) - 1;
}

/** Read an unsigned integer (little-endian), masked to width. */
function readNumber(view: DataView, sig: SignalLayout): number {
  if (sig.byteSize === 1) {
    return view.getUint8(sig.offset) & mask(sig.width);
  }
  if (sig.byteSize === 2) {
    return view.getUint16(sig.offset, true) & mask(sig.width);
  }
  return (view.getUint32(sig.offset, true) & mask(sig.width)) >>> 0;
}

/** Write an unsigned integer (little-endian), truncated to width. */
function writeNumber(view: DataView, sig: SignalLayout, value: number): void {
  const v = (value & mask(sig.width)) >>> 0;
  if (sig.byteSize === 1) {
    view.setUint8(sig.offset, v);
  } else if (sig.byteSize === 2) {
    view.setUint16(sig.offset, v, true);
  } else {
    view.setUint32(sig.offset, v, true);
  }
}

/** Read one signal from a buffer. */
export function readSignal(buffer: ArrayBuffer, sig: SignalLayout): number {
  return readNumber(new DataView(buffer), sig);
}

// ---------------------------------------------------------------------------
// DUT factory
// ---------------------------------------------------------------------------

/**
 * Create a DUT accessor object with defineProperty-based getters/setters.
 *
 * @param role  Which side owns the accessor; decides which ports it may write.
 */
export function createDut<P>(
  buffer: ArrayBuffer,
  layout: Record<string, SignalLayout>,
  portDefs: Record<string, PortInfo>,
  role: AccessRole,
): P {
  const view = new DataView(buffer);
  const obj: Record<string, number> = Object.create(null);

  for (const [name, port] of Object.entries(portDefs)) {
    // Clock ports are driven by the kernel, never through the accessor
    if (port.type === "clock") continue;
    const sig = layout[name];
    if (!sig) continue;
    defineSignalProperty(obj, name, view, sig, role);
  }

  return obj as P;
}

function defineSignalProperty(
  target: object,
  name: string,
  view: DataView,
  sig: SignalLayout,
  role: AccessRole,
): void {
  const writable =
    (role === "testbench" && sig.direction === "input") ||
    (role === "model" && sig.direction === "output");

  Object.defineProperty(target, name, {
    get(): number {
      return readNumber(view, sig);
    },

    set(value: number | boolean) {
      if (!writable) {
        const kind = sig.direction === "output" ? "output" : "input";
        throw new Error(`Cannot write to ${kind} port '${name}' from the ${role} side`);
      }
      const n = typeof value === "boolean" ? (value ? 1 : 0) : value;
      if (!Number.isInteger(n) || n < 0) {
        throw new RangeError(`Port '${name}' takes a non-negative integer, got ${String(value)}`);
      }
      writeNumber(view, sig, n);
    },

    enumerable: true,
    configurable: false,
  });
}
