export { Marshaller, type MarshallerOptions } from "./marshaller";
export { joinPath, ROOT_PATH } from "./path";

import { Marshaller } from "./marshaller";
import { defaultRegistry } from "../registry";
import { defaultReflector } from "../types/reflect";
import { configFromEnv } from "../config/config";
import { rootLogger } from "../log/logger";

/**
 * Process-wide engine over `defaultRegistry`, configured from MARSHAL_* env.
 */
export const defaultMarshaller = new Marshaller({
  registry: defaultRegistry,
  reflector: defaultReflector,
  config: configFromEnv(),
  logger: rootLogger,
});
