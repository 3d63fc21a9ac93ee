import { isErr, isOk, unwrapErr } from "option-t/plain_result";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { Backend } from "../src/backend/backend.ts";
import { MockBackend } from "../src/backend/mock-backend.ts";
import { valueToBytes } from "../src/dsp/formats.ts";
import { RegisterPoller } from "../src/dsp/poller.ts";
import { defaultRegisterMap, findRegister } from "../src/dsp/registers.ts";
import {
  BackendError,
  ReadOnlyRegisterError,
  RegisterFormatError,
} from "../src/errors.ts";

const registers = defaultRegisterMap();

function registerAt(address: number) {
  const register = findRegister(registers, address);
  if (!register) throw new Error(`no register at ${address}`);
  return register;
}

/** Backend answering from a fixed table; other addresses fail. */
function tableBackend(
  table: Map<number, Uint8Array>,
  gate: Promise<void> = Promise.resolve(),
) {
  const reads: number[] = [];
  const backend: Backend = {
    config: { type: "mock" },
    async read(address) {
      reads.push(address);
      await gate;
      const word = table.get(address);
      if (!word) throw new BackendError("no data");
      return word;
    },
    write: async () => {},
  };
  return { backend, reads };
}

const table = new Map([
  [61, valueToBytes("Int8_24", 1)],
  [41, valueToBytes("Int32_0", 1000)],
  [67, valueToBytes("Int8_24", 0.5)],
]);

describe("RegisterPoller.pollOnce", () => {
  it("reads the read-only registers and emits their values", async () => {
    const { backend, reads } = tableBackend(table);
    const poller = new RegisterPoller(backend, { registers });
    const values: [string, number][] = [];
    const errors: [string, string][] = [];
    poller.on("value", (register, value) => values.push([register.name, value]));
    poller.on("error", (register, error) =>
      errors.push([register.name, error.message]),
    );

    const result = await poller.pollOnce();

    expect(reads).toEqual([61, 79, 41, 65]);
    expect(result).toEqual(
      new Map([
        [61, 0],
        [41, 1000],
      ]),
    );
    expect(values).toEqual([
      ["Signal Level - Source", 0],
      ["Signal Level - Aux ADC", 1000],
    ]);
    expect(errors).toEqual([
      ["Signal Level - Dest", "no data"],
      ["Signal Level - MP7", "no data"],
    ]);
  });

  it("includes writable registers when asked", async () => {
    const { backend, reads } = tableBackend(table);
    const poller = new RegisterPoller(backend, {
      readOnlyOnly: false,
      registers,
    });
    const result = await poller.pollOnce();
    expect(reads).toEqual([61, 67, 79, 41, 65]);
    expect(result.get(67)).toBeCloseTo(-3.0103, 4);
  });
});

describe("RegisterPoller scheduling", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("owns exactly one interval while running", async () => {
    vi.useFakeTimers();
    const { backend, reads } = tableBackend(table);
    const poller = new RegisterPoller(backend, { registers });

    poller.start(50);
    poller.start(50);
    expect(poller.isRunning).toBe(true);
    expect(vi.getTimerCount()).toBe(1);

    await vi.advanceTimersByTimeAsync(50);
    await poller.whenIdle();
    expect(reads).toHaveLength(4);

    poller.stop();
    expect(poller.isRunning).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
    await vi.advanceTimersByTimeAsync(200);
    expect(reads).toHaveLength(4);
  });

  it("skips ticks while a poll is still in flight", async () => {
    vi.useFakeTimers();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { backend, reads } = tableBackend(table, gate);
    const poller = new RegisterPoller(backend, { registers });

    poller.start(10);
    await vi.advanceTimersByTimeAsync(35);
    expect(reads).toEqual([61]);
    expect(poller.skippedTicks).toBe(2);

    release();
    await poller.whenIdle();
    expect(reads).toEqual([61, 79, 41, 65]);
    poller.stop();
  });

  it("uses injected timer functions", () => {
    const handle = setInterval(() => {}, 60_000);
    const setIntervalFn = vi.fn(() => handle);
    const clearIntervalFn = vi.fn();
    const poller = new RegisterPoller(new MockBackend(), {
      clearIntervalFn,
      registers,
      setIntervalFn,
    });

    poller.start();
    expect(setIntervalFn).toHaveBeenCalledWith(expect.any(Function), 100);
    poller.stop();
    expect(clearIntervalFn).toHaveBeenCalledWith(handle);
    clearInterval(handle);
  });
});

describe("RegisterPoller.writeValue", () => {
  it("encodes and writes a writable register", async () => {
    const backend = new MockBackend();
    const poller = new RegisterPoller(backend, { registers });
    const result = await poller.writeValue(registerAt(67), -20);
    expect(isOk(result)).toBe(true);
    expect(backend.getLastWrite()).toEqual({
      address: 67,
      data: Uint8Array.from([0x00, 0x19, 0x99, 0x99]),
    });
  });

  it("refuses read-only registers", async () => {
    const backend = new MockBackend();
    const poller = new RegisterPoller(backend, { registers });
    const result = await poller.writeValue(registerAt(61), -10);
    expect(isErr(result) && unwrapErr(result)).toEqual(
      new ReadOnlyRegisterError("Signal Level - Source"),
    );
    expect(backend.writes).toHaveLength(0);
  });

  it("refuses values outside the register bounds", async () => {
    const poller = new RegisterPoller(new MockBackend(), { registers });
    const result = await poller.writeValue(registerAt(67), 5);
    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      const error = unwrapErr(result);
      expect(error).toBeInstanceOf(RegisterFormatError);
      expect(error.message).toBe('Value 5 is outside -80..0 for "Gain"');
    }
    const nan = await poller.writeValue(registerAt(67), Number.NaN);
    expect(isErr(nan)).toBe(true);
  });

  it("returns backend failures as errors", async () => {
    const backend = new MockBackend(undefined, { shouldFailWrite: true });
    const poller = new RegisterPoller(backend, { registers });
    const result = await poller.writeValue(registerAt(67), -6);
    expect(isErr(result) && unwrapErr(result)).toBeInstanceOf(BackendError);
  });
});
