import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
	reject,
} from "../actions";
import { type Board, gainResources, spendResources } from "../board";

export type HortalezRequest = {
	pay: number;
};

/** French pay `pay`; Patriots receive one more than that. */
export function hortalez(board: Board, request: HortalezRequest, ctx: ActionContext): ActionResult {
	const { pay } = request;
	if (board.toaPlayed) return reject("not_available", "Hortalez ends with the Treaty of Alliance");
	if (!Number.isInteger(pay) || pay < 1) return illegal("Hortalez pays at least 1 Resource");
	if (board.resources.FRENCH < pay) {
		return reject("insufficient_resources", `French have only ${board.resources.FRENCH} Resources`);
	}

	const mark = beginAction(board);
	spendResources(board, "FRENCH", pay);
	const gained = gainResources(board, "PATRIOTS", pay + 1);
	return completeAction(board, ctx, { kind: "command", name: "HORTALEZ", faction: "FRENCH", spaces: [] }, mark, {
		cost: pay,
		gained,
	});
}
