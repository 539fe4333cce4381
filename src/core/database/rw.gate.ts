import type { GateMode, ReadWriteGate } from "./rw.gate.types";

type Waiter = {
  mode: GateMode;
  grant: () => void;
};

/**
 * Single-writer / multi-reader gate. Waiters are granted in arrival order, so
 * a queued writer holds back readers that arrive after it.
 */
export function createReadWriteGate(): ReadWriteGate {
  const waiting: Waiter[] = [];
  let readers = 0;
  let writing = false;

  function canGrant(mode: GateMode) {
    return mode === "read" ? !writing : !writing && readers === 0;
  }

  function take(mode: GateMode) {
    if (mode === "read") {
      readers += 1;
    } else {
      writing = true;
    }
  }

  function acquire(mode: GateMode): Promise<void> {
    if (waiting.length === 0 && canGrant(mode)) {
      take(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      waiting.push({ mode, grant: resolve });
    });
  }

  function release(mode: GateMode) {
    if (mode === "read") {
      readers -= 1;
    } else {
      writing = false;
    }
    while (waiting.length > 0) {
      const next = waiting[0]!;
      if (!canGrant(next.mode)) {
        break;
      }
      waiting.shift();
      take(next.mode);
      next.grant();
      if (next.mode === "write") {
        break;
      }
    }
  }

  async function run<T>(mode: GateMode, fn: () => T | Promise<T>): Promise<T> {
    await acquire(mode);
    try {
      return await fn();
    } finally {
      release(mode);
    }
  }

  return {
    read(fn) {
      return run("read", fn);
    },
    write(fn) {
      return run("write", fn);
    },
    state() {
      return { readers, writing, waiting: waiting.length };
    },
  };
}
