import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
	reject,
} from "../actions";
import { type Board, count, flip, gainResources, spendResources } from "../board";
import { VILLAGE, WARPARTY_A, WARPARTY_U } from "../constants";
import { rollD3 } from "../dice";
import { isProvince, type SpaceId } from "../map";

export type TradeRequest = {
	space: SpaceId;
	/** Resources the British hand over; 0 means the Indians roll instead. */
	transfer?: number;
};

export function canTradeIn(board: Board, space: SpaceId): boolean {
	return isProvince(space) && count(board, space, WARPARTY_U) > 0 && count(board, space, VILLAGE) > 0;
}

export function trade(board: Board, request: TradeRequest, ctx: ActionContext): ActionResult {
	const { space } = request;
	const transfer = request.transfer ?? 0;
	if (!canTradeIn(board, space)) return illegal(`${space} needs an Underground War Party and a Village`);
	if (!Number.isInteger(transfer) || transfer < 0) return illegal("Trade transfer must be a whole number");
	if (board.resources.BRITISH < transfer) {
		return reject("insufficient_resources", `British have only ${board.resources.BRITISH} Resources`);
	}

	const mark = beginAction(board);
	let gained: number;
	if (transfer > 0) {
		spendResources(board, "BRITISH", transfer);
		gained = gainResources(board, "INDIANS", transfer);
	} else {
		gained = gainResources(board, "INDIANS", rollD3(ctx.rng));
	}
	flip(board, space, WARPARTY_U, WARPARTY_A, 1);

	return completeAction(board, ctx, { kind: "special", name: "TRADE", faction: "INDIANS", spaces: [space] }, mark, {
		transfer,
		gained,
	});
}
