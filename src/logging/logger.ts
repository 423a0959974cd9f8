import { DEBUG_MODE } from "../config.js";

import { createLogger, type Logger } from "./configLogger.js";

/** Shared logger; debug output follows `logging.debugMode` / `JSONXML_DEBUG`. */
const logger: Logger = createLogger(DEBUG_MODE);

export default logger;
