import type { SyncConfiguration } from "../config/types";
import type { Actor, DomainObject } from "../types";
import type { TriggerDecision } from "./types";

/** Whether an external key value counts as "not yet synced". */
export function isEmptyExternalKey(key: string | null | undefined): boolean {
	return key === undefined || key === null || key.trim().length === 0;
}

/** Whether the actor holds `roleId` within `projectId`. */
export function hasProjectRole(actor: Actor, projectId: string, roleId: string): boolean {
	return actor.memberships.some((m) => m.projectId === projectId && m.roleId === roleId);
}

/**
 * Decide whether a save should start a synchronisation.
 *
 * Edge-triggered: fires only on the transition *into* the accepted status,
 * never while an object stays there. `before` is `null` for a creation,
 * which never fires. Checks run cheapest first; the first failing one is
 * reported. Pure, no I/O.
 */
export function evaluateTrigger(
	before: DomainObject | null,
	after: DomainObject,
	actor: Actor,
	cfg: SyncConfiguration,
): TriggerDecision {
	if (!cfg.enabled) return { fire: false, reason: "disabled" };
	if (before === null) return { fire: false, reason: "created" };
	if (after.statusId !== cfg.acceptedStatusId) return { fire: false, reason: "not_accepted" };
	if (before.statusId === cfg.acceptedStatusId) return { fire: false, reason: "status_unchanged" };
	if (!isEmptyExternalKey(after.externalKey)) return { fire: false, reason: "already_synced" };
	if (!hasProjectRole(actor, after.projectId, cfg.roleId)) {
		return { fire: false, reason: "role_missing" };
	}
	return { fire: true };
}

/** Boolean form of {@link evaluateTrigger}. */
export function shouldFire(
	before: DomainObject | null,
	after: DomainObject,
	actor: Actor,
	cfg: SyncConfiguration,
): boolean {
	return evaluateTrigger(before, after, actor, cfg).fire;
}
