import { createLogger } from "@intentcam/utils";

/**
 * Capture intent logger
 * Shared by the state machine, states and the module adapter
 */
export const intentLogger = createLogger("capture-intent");
