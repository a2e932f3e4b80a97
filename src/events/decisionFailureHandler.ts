// src/events/decisionFailureHandler.ts

import { errorMessage } from '../lib/errors';
import { Logger } from '../lib/logger';
import { StationId } from '../models/Station';

/**
 * Handle a failed or unusable decision-source reply
 *
 * Transport errors, timeouts and unparseable text all degrade the same way:
 * the station's proposal is treated as absent and the validator's
 * heat-aware fallback fills it. The round is never aborted.
 *
 * @returns null, the "no usable proposal" input for the validator
 */
export function handleDecisionFailure(stationId: StationId, cause: unknown, logger: Logger): null {
    logger.warn(`${stationId} decision failed, using fallback strategy: ${errorMessage(cause)}`);
    return null;
}
