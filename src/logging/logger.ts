/**
 * Shared adapter logger. Debug output follows `logging.debug` in config.json
 * or HTTP_ADAPTER_DEBUG.
 */

import { DEBUG_MODE } from "../config.js";

import { createLogger, type Logger } from "./configLogger.js";

const logger: Logger = createLogger(DEBUG_MODE);

export default logger;
