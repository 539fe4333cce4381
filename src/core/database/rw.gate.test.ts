import { expect, test } from "vitest";
import { createReadWriteGate } from "./rw.gate";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

test("readers share the gate", async () => {
  const gate = createReadWriteGate();
  const hold = deferred();
  const first = gate.read(() => hold.promise);
  const second = gate.read(() => hold.promise);
  expect(gate.state()).toEqual({ readers: 2, writing: false, waiting: 0 });
  hold.resolve();
  await Promise.all([first, second]);
  expect(gate.state()).toEqual({ readers: 0, writing: false, waiting: 0 });
});

test("a writer waits for readers and blocks later readers", async () => {
  const gate = createReadWriteGate();
  const hold = deferred();
  const order: string[] = [];

  const reader = gate.read(async () => {
    await hold.promise;
    order.push("read-1");
  });
  const writer = gate.write(() => {
    order.push("write");
  });
  const lateReader = gate.read(() => {
    order.push("read-2");
  });
  expect(gate.state()).toEqual({ readers: 1, writing: false, waiting: 2 });

  hold.resolve();
  await Promise.all([reader, writer, lateReader]);
  expect(order).toEqual(["read-1", "write", "read-2"]);
});

test("writers run one at a time and release on failure", async () => {
  const gate = createReadWriteGate();
  const order: string[] = [];
  const failing = gate.write(async () => {
    order.push("write-1");
    throw new Error("boom");
  });
  const next = gate.write(() => {
    order.push("write-2");
    return 42;
  });

  await expect(failing).rejects.toThrow("boom");
  await expect(next).resolves.toBe(42);
  expect(order).toEqual(["write-1", "write-2"]);
  expect(gate.state()).toEqual({ readers: 0, writing: false, waiting: 0 });
});
