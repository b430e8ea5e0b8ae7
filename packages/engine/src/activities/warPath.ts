import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
} from "../actions";
import { type Board, count, countAll, flip, remove, removeCasualties } from "../board";
import {
	FORT_PAT,
	MILITIA_A,
	MILITIA_U,
	type PieceTag,
	REGULAR_FRE,
	REGULAR_PAT,
	WARPARTY_A,
	WARPARTY_U,
} from "../constants";
import { leaderModifiers } from "../leaders";
import type { SpaceId } from "../map";

export type WarPathRequest = {
	space: SpaceId;
	/** 1: remove one unit. 2: lose a War Party, remove two. 3: lose a War Party, remove a Fort. */
	option: 1 | 2 | 3;
};

const REBEL_UNITS: readonly PieceTag[] = [REGULAR_PAT, REGULAR_FRE, MILITIA_A, MILITIA_U];

function removeUnits(board: Board, space: SpaceId, n: number): number {
	let removed = 0;
	for (const tag of REBEL_UNITS) {
		while (removed < n && count(board, space, tag) > 0) {
			removeCasualties(board, space, tag, 1);
			removed += 1;
		}
	}
	return removed;
}

export function canWarPathIn(board: Board, space: SpaceId): boolean {
	if (count(board, space, WARPARTY_U) === 0) return false;
	return countAll(board, space, REBEL_UNITS) + count(board, space, FORT_PAT) > 0;
}

export function warPath(board: Board, request: WarPathRequest, ctx: ActionContext): ActionResult {
	const { space, option } = request;
	const underground = count(board, space, WARPARTY_U);
	const units = countAll(board, space, REBEL_UNITS);
	if (underground < (option === 1 ? 1 : 2)) return illegal(`Not enough Underground War Parties in ${space}`);
	if (option !== 3 && units === 0) return illegal(`No Rebellion units in ${space}`);
	if (option === 3) {
		if (units > 0) return illegal("Option 3 only when no Rebellion units remain");
		if (count(board, space, FORT_PAT) === 0) return illegal(`No Patriot Fort in ${space}`);
	}

	const mark = beginAction(board);
	let removed = 0;
	if (option === 1) {
		flip(board, space, WARPARTY_U, WARPARTY_A, 1);
		removed = removeUnits(board, space, 1);
	} else {
		flip(board, space, WARPARTY_U, WARPARTY_A, 2);
		remove(board, space, WARPARTY_A, 1);
		if (option === 2) {
			removed = removeUnits(board, space, 2);
		} else {
			removeCasualties(board, space, FORT_PAT, 1);
			removed = 1;
		}
	}

	let bonus = leaderModifiers(board, "warPath", space).warPathExtraMilitia;
	while (bonus > 0 && count(board, space, MILITIA_A) + count(board, space, MILITIA_U) > 0) {
		removeCasualties(board, space, count(board, space, MILITIA_A) > 0 ? MILITIA_A : MILITIA_U, 1);
		bonus -= 1;
		removed += 1;
	}

	return completeAction(board, ctx, { kind: "special", name: "WAR_PATH", faction: "INDIANS", spaces: [space] }, mark, {
		option,
		removed,
	});
}
