import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	hasDuplicates,
	illegal,
} from "../actions";
import { type Board, count, flip } from "../board";
import { REGULAR_BRI, WARPARTY_A, WARPARTY_U } from "../constants";
import type { SpaceId } from "../map";

export type CommonCauseMode = "MARCH" | "BATTLE";

export type CommonCauseRequest = {
	spaces: SpaceId[];
	mode: CommonCauseMode;
	/** War Parties to use per space; omitted spaces use every usable one. */
	counts?: Record<SpaceId, number>;
	/** Never strip a space of its last War Party (its last Underground one in Battle). */
	preserveWp?: boolean;
};

/**
 * War Parties the British may borrow in a space. With preservation a March
 * leaves one War Party behind, and a Battle leaves one Underground.
 */
export function usableWarParties(board: Board, space: SpaceId, mode: CommonCauseMode, preserveWp: boolean): number {
	const total = count(board, space, WARPARTY_A) + count(board, space, WARPARTY_U);
	if (!preserveWp) return total;
	if (mode === "MARCH") return Math.max(0, total - 1);
	return total - Math.min(1, count(board, space, WARPARTY_U));
}

/** Underground War Parties that may be flipped to join. */
function flippable(board: Board, space: SpaceId, mode: CommonCauseMode, preserveWp: boolean): number {
	const underground = count(board, space, WARPARTY_U);
	return preserveWp && mode === "BATTLE" ? Math.max(0, underground - 1) : underground;
}

export function commonCause(board: Board, request: CommonCauseRequest, ctx: ActionContext): ActionResult {
	const { spaces, mode } = request;
	const preserveWp = request.preserveWp ?? true;
	if (spaces.length === 0) return illegal("Common Cause needs at least one space");
	if (hasDuplicates(spaces)) return illegal("Common Cause spaces must be distinct");

	const plan = new Map<SpaceId, { flipped: number; used: number }>();
	for (const space of spaces) {
		if (count(board, space, REGULAR_BRI) === 0) return illegal(`${space} has no British Regulars`);
		const limit = usableWarParties(board, space, mode, preserveWp);
		const used = request.counts?.[space] ?? limit;
		if (used < 0 || used > limit) return illegal(`Only ${limit} War Parties may join in ${space}`);
		if (used === 0) continue;
		plan.set(space, { flipped: Math.min(used, flippable(board, space, mode, preserveWp)), used });
	}
	if (plan.size === 0) return illegal("No War Parties can serve as Tories");

	const mark = beginAction(board);
	for (const [space, { flipped, used }] of plan) {
		flip(board, space, WARPARTY_U, WARPARTY_A, flipped);
		ctx.commonCause[space] = (ctx.commonCause[space] ?? 0) + used;
	}
	const used = [...plan.values()].reduce((sum, p) => sum + p.used, 0);
	return completeAction(
		board,
		ctx,
		{ kind: "special", name: "COMMON_CAUSE", faction: "BRITISH", spaces: [...plan.keys()] },
		mark,
		{ mode, used },
	);
}
