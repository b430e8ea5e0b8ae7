import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
} from "../actions";
import { type Board, count, countAll, flip, remove, removeCasualties } from "../board";
import {
	FORT_BRI,
	MILITIA_A,
	MILITIA_U,
	type PieceTag,
	REGULAR_BRI,
	TORY,
	VILLAGE,
	WARPARTY_A,
	WARPARTY_U,
} from "../constants";
import type { SpaceId } from "../map";

export type PartisansRequest = {
	space: SpaceId;
	/** 1: remove one piece. 2: lose a Militia, remove two. 3: lose a Militia, remove a Village. */
	option: 1 | 2 | 3;
};

const ROYALIST_ORDER: readonly PieceTag[] = [TORY, WARPARTY_A, REGULAR_BRI, VILLAGE, FORT_BRI, WARPARTY_U];

function removeRoyalists(board: Board, space: SpaceId, n: number): number {
	let removed = 0;
	for (const tag of ROYALIST_ORDER) {
		while (removed < n && count(board, space, tag) > 0) {
			removeCasualties(board, space, tag, 1);
			removed += 1;
		}
	}
	return removed;
}

export function canPartisansIn(board: Board, space: SpaceId): boolean {
	return count(board, space, MILITIA_U) > 0 && countAll(board, space, ROYALIST_ORDER) > 0;
}

export function partisans(board: Board, request: PartisansRequest, ctx: ActionContext): ActionResult {
	const { space, option } = request;
	if (count(board, space, MILITIA_U) < (option === 1 ? 1 : 2)) {
		return illegal(`Not enough Underground Militia in ${space}`);
	}
	if (countAll(board, space, ROYALIST_ORDER) === 0) return illegal(`No Royalist pieces in ${space}`);
	if (option === 3) {
		if (count(board, space, WARPARTY_A) + count(board, space, WARPARTY_U) > 0) {
			return illegal("Option 3 only when no War Parties are present");
		}
		if (count(board, space, VILLAGE) === 0) return illegal(`No Village in ${space}`);
	}

	const mark = beginAction(board);
	let removed: number;
	if (option === 1) {
		flip(board, space, MILITIA_U, MILITIA_A, 1);
		removed = removeRoyalists(board, space, 1);
	} else {
		flip(board, space, MILITIA_U, MILITIA_A, 2);
		remove(board, space, MILITIA_A, 1);
		if (option === 2) {
			removed = removeRoyalists(board, space, 2);
		} else {
			removeCasualties(board, space, VILLAGE, 1);
			removed = 1;
		}
	}

	return completeAction(board, ctx, { kind: "special", name: "PARTISANS", faction: "PATRIOTS", spaces: [space] }, mark, {
		option,
		removed,
	});
}
