import { logger } from "../src/core/logger.js";

// Keep test output quiet; individual tests attach handlers when they assert on logs
logger.setLevel("error");
