import { debugLogger } from "../core/utils/debug-logger";

// Keep test output readable
debugLogger.setLevel("silent");
