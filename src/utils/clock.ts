/** Time source injected into the store and the policy engine */

import { DateTime } from "luxon";

export interface Clock {
	now(): DateTime;
}

export const systemClock: Clock = {
	now: () => DateTime.now(),
};
