import type { TypeKey } from "../types/descriptor";
import { Uuid } from "../types/uuid";
import { CalendarDate } from "../types/calendarDate";
import type { StrategyRegistry } from "../registry/registry";
import type { Strategy } from "../registry/types";
import {
  anyStrategy,
  bigintStrategy,
  booleanStrategy,
  intStrategy,
  nullStrategy,
  numberStrategy,
  stringStrategy,
} from "./primitives";
import { calendarDateStrategy, dateStrategy } from "./temporal";
import { bytesStrategy, uuidStrategy } from "./binary";
import { dictStrategy, mapStrategy, tupleStrategy } from "./collections";
import { enumStrategy, literalStrategy, unionStrategy } from "./choice";

export const builtinStrategies: ReadonlyArray<readonly [TypeKey, Strategy]> = [
  ["string", stringStrategy],
  ["number", numberStrategy],
  ["int", intStrategy],
  ["boolean", booleanStrategy],
  ["bigint", bigintStrategy],
  ["null", nullStrategy],
  ["any", anyStrategy],
  [Date, dateStrategy],
  [CalendarDate, calendarDateStrategy],
  [Uint8Array, bytesStrategy],
  [Uuid, uuidStrategy],
  ["tuple", tupleStrategy],
  ["dict", dictStrategy],
  [Map, mapStrategy],
  ["union", unionStrategy],
  ["literal", literalStrategy],
  ["enum", enumStrategy],
];

export function registerBuiltins(registry: StrategyRegistry): void {
  for (const [key, strategy] of builtinStrategies) {
    registry.register(key, strategy);
  }
}

export {
  anyStrategy,
  bigintStrategy,
  booleanStrategy,
  bytesStrategy,
  calendarDateStrategy,
  dateStrategy,
  dictStrategy,
  enumStrategy,
  intStrategy,
  literalStrategy,
  mapStrategy,
  nullStrategy,
  numberStrategy,
  stringStrategy,
  tupleStrategy,
  unionStrategy,
  uuidStrategy,
};
export { parseIsoInstant } from "./temporal";
