import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
	reject,
} from "../actions";
import { skirmish, type SkirmishOption } from "../activities/skirmish";
import { type Board, count, flip, move, spendResources } from "../board";
import { MILITIA_A, MILITIA_U, REGULAR_BRI, TORY, WARPARTY_A, WARPARTY_U } from "../constants";
import { isAdjacent, isCity, type SpaceId } from "../map";

export type ScoutRequest = {
	src: SpaceId;
	dst: SpaceId;
	warParties: number;
	regulars: number;
	tories?: number;
	/** British Skirmish in the destination with the arriving Regulars. */
	skirmish?: SkirmishOption;
};

export const SCOUT_COST = 1;

export function scout(board: Board, request: ScoutRequest, ctx: ActionContext): ActionResult {
	const { src, dst, warParties, regulars } = request;
	const tories = request.tories ?? 0;
	if (isCity(src) || isCity(dst)) return illegal("Scout moves only between Provinces");
	if (!isAdjacent(src, dst)) return illegal(`${src} is not adjacent to ${dst}`);
	if (warParties < 1 || regulars < 1) return illegal("Scout moves at least one War Party and one Regular");
	if (tories < 0 || tories > regulars) return illegal("Tories may not outnumber the moving Regulars");
	const wpHere = count(board, src, WARPARTY_U) + count(board, src, WARPARTY_A);
	if (warParties > wpHere) return illegal(`Only ${wpHere} War Parties in ${src}`);
	if (regulars > count(board, src, REGULAR_BRI)) return illegal(`Only ${count(board, src, REGULAR_BRI)} Regulars in ${src}`);
	if (tories > count(board, src, TORY)) return illegal(`Only ${count(board, src, TORY)} Tories in ${src}`);
	if (board.resources.INDIANS < SCOUT_COST) return reject("insufficient_resources", "Indians cannot pay for Scout");
	if (board.resources.BRITISH < SCOUT_COST) return reject("insufficient_resources", "British cannot pay for Scout");

	const mark = beginAction(board);
	spendResources(board, "INDIANS", SCOUT_COST);
	spendResources(board, "BRITISH", SCOUT_COST);

	const underground = Math.min(warParties, count(board, src, WARPARTY_U));
	move(board, src, dst, WARPARTY_U, underground, WARPARTY_A);
	move(board, src, dst, WARPARTY_A, warParties - underground);
	move(board, src, dst, REGULAR_BRI, regulars);
	move(board, src, dst, TORY, tories);
	const militia = count(board, dst, MILITIA_U);
	if (militia > 0) flip(board, dst, MILITIA_U, MILITIA_A, militia);

	const result = completeAction(board, ctx, { kind: "command", name: "SCOUT", faction: "INDIANS", spaces: [dst] }, mark, {
		cost: SCOUT_COST,
	});
	if (request.skirmish !== undefined && result.ok) {
		const followUp = skirmish(board, { faction: "BRITISH", space: dst, option: request.skirmish }, ctx);
		result.outcome.notes.skirmish = followUp.ok ? "done" : followUp.error;
	}
	return result;
}
