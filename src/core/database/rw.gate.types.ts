export type GateMode = "read" | "write";

export type ReadWriteGate = {
  read<T>(fn: () => T | Promise<T>): Promise<T>;
  write<T>(fn: () => T | Promise<T>): Promise<T>;
  state(): { readers: number; writing: boolean; waiting: number };
};
