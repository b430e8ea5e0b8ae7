import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	illegal,
	reject,
} from "../actions";
import { type Board, place, poolCount, spendResources } from "../board";
import { ACTIVE_SUPPORT, MILITIA_U, REGULAR_PAT } from "../constants";
import type { SpaceId } from "../map";

export type AgentMobilizationRequest = {
	province: SpaceId;
	/** One Continental instead of two Underground Militia. */
	continental?: boolean;
};

export const AGENT_MOBILIZATION_PROVINCES: readonly SpaceId[] = [
	"Massachusetts",
	"New_Hampshire",
	"New_York",
	"Quebec",
];

export const AGENT_MOBILIZATION_COST = 1;

export function agentMobilization(board: Board, request: AgentMobilizationRequest, ctx: ActionContext): ActionResult {
	const { province } = request;
	if (board.toaPlayed) return reject("not_available", "Agent Mobilization ends with the Treaty of Alliance");
	if (!AGENT_MOBILIZATION_PROVINCES.includes(province)) {
		return illegal(`${province} is not open to Agent Mobilization`);
	}
	if ((board.support[province] ?? 0) === ACTIVE_SUPPORT) return illegal(`${province} is at Active Support`);
	const tag = request.continental ? REGULAR_PAT : MILITIA_U;
	const n = request.continental ? 1 : 2;
	if (poolCount(board, "available", tag) < n) return reject("not_available", `Not enough ${tag} available`);
	if (board.resources.FRENCH < AGENT_MOBILIZATION_COST) {
		return reject("insufficient_resources", "Agent Mobilization costs 1 Resource");
	}

	const mark = beginAction(board);
	spendResources(board, "FRENCH", AGENT_MOBILIZATION_COST);
	place(board, province, tag, n);
	return completeAction(
		board,
		ctx,
		{ kind: "command", name: "AGENT_MOBILIZATION", faction: "FRENCH", spaces: [province] },
		mark,
		{ cost: AGENT_MOBILIZATION_COST, placed: n },
	);
}
