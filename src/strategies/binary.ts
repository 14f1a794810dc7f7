import { done } from "../outcome/constructors";
import type { Strategy } from "../registry/types";
import { Uuid } from "../types/uuid";

const HEX = /^(?:[0-9a-f]{2})*$/i;

/**
 * Byte arrays (including Buffer) travel as lowercase hex text.
 */
export const bytesStrategy: Strategy<Uint8Array> = {
  name: "bytes",
  toIr: value => done(Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("hex")),
  fromIr: (target, raw, _strict, ctx) => {
    if (raw instanceof Uint8Array) return done(raw);
    if (typeof raw === "string" && HEX.test(raw)) {
      return done(Uint8Array.from(Buffer.from(raw, "hex")));
    }
    return ctx.mismatch(target, raw);
  },
};

export const uuidStrategy: Strategy<Uuid> = {
  name: "uuid",
  toIr: value => done(value.value),
  fromIr: (target, raw, _strict, ctx) => {
    if (raw instanceof Uuid) return done(raw);
    if (typeof raw === "string") {
      const id = Uuid.tryParse(raw);
      if (id) return done(id);
    }
    return ctx.mismatch(target, raw);
  },
};
