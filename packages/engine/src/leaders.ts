import { type Board, leaderAt, leadersIn } from "./board";
import { LEADER_FACTION, type LeaderId, sideOf, type Side } from "./constants";
import type { SpaceId } from "./map";

export type LeaderHook =
	| "battle"
	| "skirmish"
	| "warPath"
	| "gather"
	| "raid"
	| "muster"
	| "specialActivity";

export type LeaderModifiers = {
	/** Win-the-Day shifts multiplied (Washington). */
	winTheDayMultiplier: number;
	/** Added to the loss the Rebellion takes when defending (Washington: -1). */
	rebelDefenceLossModifier: number;
	/** Added to the defender's loss when French attack (Lauzun). */
	frenchAttackLossBonus: number;
	skirmishExtraMilitia: number;
	warPathExtraMilitia: number;
	villageWarPartyCost: number;
	raidRange: number;
	freeRewardLoyaltyShift: boolean;
	lowerFniBeforeSpecial: boolean;
};

type Capability = {
	leader: LeaderId;
	hook: LeaderHook;
	/** Off-map leaders never apply; "space" leaders only where they stand. */
	scope: "space" | "map";
	apply: (mods: LeaderModifiers) => void;
};

export const LEADER_CAPABILITIES: readonly Capability[] = [
	{
		leader: "WASHINGTON",
		hook: "battle",
		scope: "space",
		apply: (m) => {
			m.winTheDayMultiplier = 2;
			m.rebelDefenceLossModifier -= 1;
		},
	},
	{
		leader: "LAUZUN",
		hook: "battle",
		scope: "space",
		apply: (m) => {
			m.frenchAttackLossBonus += 1;
		},
	},
	{
		leader: "CLINTON",
		hook: "skirmish",
		scope: "space",
		apply: (m) => {
			m.skirmishExtraMilitia += 1;
		},
	},
	{
		leader: "BRANT",
		hook: "warPath",
		scope: "space",
		apply: (m) => {
			m.warPathExtraMilitia += 1;
		},
	},
	{
		leader: "CORNPLANTER",
		hook: "gather",
		scope: "space",
		apply: (m) => {
			m.villageWarPartyCost = 1;
		},
	},
	{
		leader: "DRAGGING_CANOE",
		hook: "raid",
		scope: "space",
		apply: (m) => {
			m.raidRange = 2;
		},
	},
	{
		leader: "GAGE",
		hook: "muster",
		scope: "space",
		apply: (m) => {
			m.freeRewardLoyaltyShift = true;
		},
	},
	{
		leader: "HOWE",
		hook: "specialActivity",
		scope: "map",
		apply: (m) => {
			m.lowerFniBeforeSpecial = true;
		},
	},
];

function baseModifiers(): LeaderModifiers {
	return {
		winTheDayMultiplier: 1,
		rebelDefenceLossModifier: 0,
		frenchAttackLossBonus: 0,
		skirmishExtraMilitia: 0,
		warPathExtraMilitia: 0,
		villageWarPartyCost: 2,
		raidRange: 1,
		freeRewardLoyaltyShift: false,
		lowerFniBeforeSpecial: false,
	};
}

/** Modifiers from every leader whose capability hooks `hook` at `space`. */
export function leaderModifiers(board: Board, hook: LeaderHook, space: SpaceId | null): LeaderModifiers {
	const mods = baseModifiers();
	for (const cap of LEADER_CAPABILITIES) {
		if (cap.hook !== hook) continue;
		const at = leaderAt(board, cap.leader);
		if (at === null) continue;
		if (cap.scope === "space" && at !== space) continue;
		cap.apply(mods);
	}
	return mods;
}

const REBEL_GATE_LEADERS: readonly LeaderId[] = ["WASHINGTON", "ROCHAMBEAU", "LAUZUN"];

/** +1 for each British leader standing in the space. */
export function royalistLeaderBonus(board: Board, space: SpaceId): number {
	return leadersIn(board, space).filter((l) => LEADER_FACTION[l] === "BRITISH").length;
}

/** +1 when Washington, Rochambeau or Lauzun stands in the space. */
export function rebelLeaderBonus(board: Board, space: SpaceId): number {
	return leadersIn(board, space).some((l) => REBEL_GATE_LEADERS.includes(l)) ? 1 : 0;
}

export function hasSideLeader(board: Board, space: SpaceId, side: Side): boolean {
	return leadersIn(board, space).some((l) => sideOf(LEADER_FACTION[l]) === side);
}
