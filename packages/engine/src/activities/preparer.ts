import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	reject,
} from "../actions";
import { type Board, gainResources, poolCount, releaseBlockade, transfer } from "../board";
import { BLOCKADE, MARKER_CAPS, REGULAR_FRE } from "../constants";

export type PreparerChoice = "BLOCKADE" | "REGULARS" | "RESOURCES";

export type PreparerRequest = {
	choice: PreparerChoice;
};

export const PREPARER_REGULARS = 3;
export const PREPARER_RESOURCES = 2;

/** Préparer la Guerre. */
export function preparer(board: Board, request: PreparerRequest, ctx: ActionContext): ActionResult {
	if (!board.toaPlayed) return reject("not_available", "Préparer la Guerre needs the Treaty of Alliance");
	const { choice } = request;
	const blockades = board.markers[BLOCKADE];

	switch (choice) {
		case "BLOCKADE":
			if (board.unavailableBlockades === 0) return reject("not_available", "No Blockades remain out of play");
			if (blockades.pool + blockades.onMap.size >= MARKER_CAPS.Blockade) {
				return reject("not_available", "Every Blockade is already in play");
			}
			break;
		case "REGULARS":
			if (poolCount(board, "unavailable", REGULAR_FRE) < PREPARER_REGULARS) {
				return reject("not_available", "Fewer than 3 French Regulars are Unavailable");
			}
			break;
		case "RESOURCES":
			break;
	}

	const mark = beginAction(board);
	let gained = 0;
	if (choice === "BLOCKADE") releaseBlockade(board);
	else if (choice === "REGULARS") transfer(board, REGULAR_FRE, "unavailable", "available", PREPARER_REGULARS);
	else gained = gainResources(board, "FRENCH", PREPARER_RESOURCES);

	return completeAction(board, ctx, { kind: "special", name: "PREPARER", faction: "FRENCH", spaces: [] }, mark, {
		choice,
		gained,
	});
}
