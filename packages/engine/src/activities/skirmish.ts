import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
	reject,
} from "../actions";
import { type Board, count, removeCasualties } from "../board";
import {
	type Faction,
	FORT_BRI,
	FORT_PAT,
	MILITIA_A,
	MILITIA_U,
	type PieceTag,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	TORY,
} from "../constants";
import { leaderModifiers } from "../leaders";
import type { SpaceId } from "../map";

export type SkirmishOption = 1 | 2 | 3;

export type SkirmishRequest = {
	faction: Faction;
	space: SpaceId;
	option: SkirmishOption;
};

type SkirmishSide = {
	own: PieceTag;
	/** Removal order: Active pieces ahead of cubes. */
	targets: readonly PieceTag[];
	fort: PieceTag;
};

const SIDES: Partial<Record<Faction, SkirmishSide>> = {
	BRITISH: { own: REGULAR_BRI, targets: [MILITIA_A, REGULAR_PAT, REGULAR_FRE], fort: FORT_PAT },
	PATRIOTS: { own: REGULAR_PAT, targets: [REGULAR_BRI, TORY], fort: FORT_BRI },
	FRENCH: { own: REGULAR_FRE, targets: [REGULAR_BRI, TORY], fort: FORT_BRI },
};

function targetCount(board: Board, space: SpaceId, side: SkirmishSide): number {
	return side.targets.reduce((sum, tag) => sum + count(board, space, tag), 0);
}

function removeTarget(board: Board, space: SpaceId, side: SkirmishSide): void {
	const tag = side.targets.find((t) => count(board, space, t) > 0);
	if (tag) removeCasualties(board, space, tag, 1);
}

export function skirmish(board: Board, request: SkirmishRequest, ctx: ActionContext): ActionResult {
	const { faction, space, option } = request;
	const side = SIDES[faction];
	if (!side) return illegal(`${faction} cannot Skirmish`);
	if (faction === "FRENCH" && !board.toaPlayed) {
		return reject("not_available", "French cannot Skirmish before the Treaty of Alliance");
	}
	if (count(board, space, side.own) === 0) return illegal(`No ${side.own} in ${space} to Skirmish`);
	const targets = targetCount(board, space, side);
	if (option === 1 && targets < 1) return illegal(`No enemy cube or Active Militia in ${space}`);
	if (option === 2 && targets < 2) return illegal(`Option 2 needs two enemy pieces in ${space}`);
	if (option === 3) {
		if (targets > 0) return illegal("Option 3 only when no enemy cubes or Active Militia remain");
		if (count(board, space, side.fort) === 0) return illegal(`No enemy Fort in ${space}`);
	}

	const mark = beginAction(board);
	let removed = 0;
	if (option === 3) {
		removeCasualties(board, space, side.fort, 1);
		removed = 1;
	} else {
		for (let i = 0; i < option; i++) removeTarget(board, space, side);
		removed = option;
	}
	if (option !== 1) removeCasualties(board, space, side.own, 1);

	let bonus = faction === "BRITISH" ? leaderModifiers(board, "skirmish", space).skirmishExtraMilitia : 0;
	while (bonus > 0 && count(board, space, MILITIA_A) + count(board, space, MILITIA_U) > 0) {
		removeCasualties(board, space, count(board, space, MILITIA_A) > 0 ? MILITIA_A : MILITIA_U, 1);
		bonus -= 1;
		removed += 1;
	}

	return completeAction(board, ctx, { kind: "special", name: "SKIRMISH", faction, spaces: [space] }, mark, {
		option,
		removed,
	});
}
