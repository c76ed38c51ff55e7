/**
 * Timeout constants for provisioning operations.
 */

/** Maximum time to wait for a GCE zone operation (5 minutes) */
export const GCE_OPERATION_TIMEOUT_MS = 300_000;

/** Polling interval for checking operation status */
export const OPERATION_POLL_INTERVAL_MS = 5_000;

/** Upper bound for a single remote setup command (15 minutes) */
export const REMOTE_COMMAND_TIMEOUT_MS = 900_000;

/** Pause between zones */
export const REGION_COOLDOWN_MS = 30_000;
