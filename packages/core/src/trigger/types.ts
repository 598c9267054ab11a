/** Why an evaluation did not fire. */
export type SkipReason =
	| "disabled"
	| "created"
	| "not_accepted"
	| "status_unchanged"
	| "already_synced"
	| "role_missing";

/** Outcome of {@link evaluateTrigger}. */
export type TriggerDecision = { fire: true } | { fire: false; reason: SkipReason };
