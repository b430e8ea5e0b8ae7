import { type ActionContext, type ActionResult, illegal } from "../actions";
import { type Board, cloneBoard, setFni } from "../board";
import type { Faction } from "../constants";
import { leaderModifiers } from "../leaders";
import { commonCause, type CommonCauseRequest } from "./commonCause";
import { navalPressure, type NavalPressureRequest } from "./navalPressure";
import { partisans, type PartisansRequest } from "./partisans";
import { persuasion, type PersuasionRequest } from "./persuasion";
import { plunder, type PlunderRequest } from "./plunder";
import { preparer, type PreparerRequest } from "./preparer";
import { skirmish, type SkirmishRequest } from "./skirmish";
import { trade, type TradeRequest } from "./trade";
import { warPath, type WarPathRequest } from "./warPath";

export type SpecialActivityRequests = {
	SKIRMISH: SkirmishRequest;
	COMMON_CAUSE: CommonCauseRequest;
	NAVAL_PRESSURE: NavalPressureRequest;
	PARTISANS: PartisansRequest;
	PERSUASION: PersuasionRequest;
	WAR_PATH: WarPathRequest;
	TRADE: TradeRequest;
	PLUNDER: PlunderRequest;
	PREPARER: PreparerRequest;
};

export type SpecialActivityName = keyof SpecialActivityRequests;

export type SpecialActivityHandler<K extends SpecialActivityName> = (
	board: Board,
	request: SpecialActivityRequests[K],
	ctx: ActionContext,
) => ActionResult;

export const SPECIAL_ACTIVITIES: { [K in SpecialActivityName]: SpecialActivityHandler<K> } = {
	SKIRMISH: skirmish,
	COMMON_CAUSE: commonCause,
	NAVAL_PRESSURE: navalPressure,
	PARTISANS: partisans,
	PERSUASION: persuasion,
	WAR_PATH: warPath,
	TRADE: trade,
	PLUNDER: plunder,
	PREPARER: preparer,
};

export const SPECIAL_ACTIVITY_FACTIONS: Record<SpecialActivityName, readonly Faction[]> = {
	SKIRMISH: ["BRITISH", "PATRIOTS", "FRENCH"],
	COMMON_CAUSE: ["BRITISH"],
	NAVAL_PRESSURE: ["BRITISH", "FRENCH"],
	PARTISANS: ["PATRIOTS"],
	PERSUASION: ["PATRIOTS"],
	WAR_PATH: ["INDIANS"],
	TRADE: ["INDIANS"],
	PLUNDER: ["INDIANS"],
	PREPARER: ["FRENCH"],
};

export type SpecialActivityInvocation<K extends SpecialActivityName = SpecialActivityName> = {
	[P in K]: { name: P; request: SpecialActivityRequests[P] };
}[K];

/**
 * Runs a Special Activity for `faction`. With Howe on the map a British
 * Special Activity first lowers FNI by one; a rejected activity leaves the
 * board as it was.
 */
export function executeSpecialActivity<K extends SpecialActivityName>(
	board: Board,
	faction: Faction,
	invocation: SpecialActivityInvocation<K>,
	ctx: ActionContext,
): ActionResult {
	if (!SPECIAL_ACTIVITY_FACTIONS[invocation.name].includes(faction)) {
		return illegal(`${faction} cannot ${invocation.name}`);
	}
	const request = invocation.request;
	if ("faction" in request && request.faction !== faction) {
		return illegal(`${faction} cannot run a ${invocation.name} for another faction`);
	}
	const handler = SPECIAL_ACTIVITIES[invocation.name];

	const howe = faction === "BRITISH" && leaderModifiers(board, "specialActivity", null).lowerFniBeforeSpecial;
	if (!howe || board.fni === 0) return handler(board, request, ctx);

	const trial = cloneBoard(board);
	setFni(trial, trial.fni - 1);
	const result = handler(trial, request, ctx);
	if (!result.ok) return result;
	Object.assign(board, trial);
	result.outcome.notes.howe = true;
	return result;
}

export { commonCause, navalPressure, partisans, persuasion, plunder, preparer, skirmish, trade, warPath };
export type {
	CommonCauseRequest,
	NavalPressureRequest,
	PartisansRequest,
	PersuasionRequest,
	PlunderRequest,
	PreparerRequest,
	SkirmishRequest,
	TradeRequest,
	WarPathRequest,
};
