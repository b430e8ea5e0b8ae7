import type { Board, HistoryEntry } from "./board";
import type { Faction } from "./constants";
import type { Rng } from "./dice";
import type { SpaceId } from "./map";

export type ActionKind = "command" | "special" | "event";

export type ActionRejectionReason =
	| "illegal_action"
	| "insufficient_resources"
	| "not_available";

/** Eligibility effects an Event leaves for the sequencer to apply. */
export type EligibilityEffect = "ineligible" | "ineligibleThroughNext" | "remainEligible";

export type ActionNotes = Record<string, number | string | boolean>;

export type ActionOutcome = {
	kind: ActionKind;
	name: string;
	faction: Faction;
	spaces: SpaceId[];
	/** Ledger entries written by this action, in order. */
	deltas: HistoryEntry[];
	notes: ActionNotes;
};

export type ActionResult =
	| { ok: true; outcome: ActionOutcome }
	| { ok: false; reason: ActionRejectionReason; error: string };

/** Per-turn scratch state shared by the actions one faction takes. */
export type ActionContext = {
	rng: Rng;
	outcomes: ActionOutcome[];
	/** War Parties serving as Tories this turn, by space. */
	commonCause: Record<SpaceId, number>;
	/** Spaces Raided this turn; Plunder may only follow a Raid. */
	raided: SpaceId[];
	/** Factions with a human player; bot-only defensive rules skip them. */
	humans: readonly Faction[];
	eligibility: Partial<Record<Faction, EligibilityEffect>>;
};

export function createActionContext(rng: Rng, humans: readonly Faction[] = []): ActionContext {
	return { rng, outcomes: [], commonCause: {}, raided: [], humans, eligibility: {} };
}

export function reject(reason: ActionRejectionReason, error: string): ActionResult {
	return { ok: false, reason, error };
}

export function illegal(error: string): ActionResult {
	return reject("illegal_action", error);
}

/** Marks the history position so the outcome can carry this action's deltas. */
export function beginAction(board: Board): number {
	return board.history.length;
}

export function completeAction(
	board: Board,
	ctx: ActionContext,
	meta: { kind: ActionKind; name: string; faction: Faction; spaces: readonly SpaceId[] },
	mark: number,
	notes: ActionNotes = {},
): ActionResult {
	const outcome: ActionOutcome = {
		kind: meta.kind,
		name: meta.name,
		faction: meta.faction,
		spaces: [...meta.spaces],
		deltas: board.history.slice(mark),
		notes,
	};
	ctx.outcomes.push(outcome);
	return { ok: true, outcome };
}

export function hasDuplicates(values: readonly string[]): boolean {
	return new Set(values).size !== values.length;
}
