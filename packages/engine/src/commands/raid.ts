import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	hasDuplicates,
	illegal,
	reject,
} from "../actions";
import { type Board, count, flip, hasMarker, move, placeMarker, shiftSupport, spendResources } from "../board";
import { NEUTRAL, RAID, WARPARTY_A, WARPARTY_U } from "../constants";
import { leaderModifiers } from "../leaders";
import { isProvince, type SpaceId, SPACE_IDS, withinDistance } from "../map";

/** One Underground War Party moving into a Raided Province. */
export type RaidMove = { src: SpaceId; dst: SpaceId };

export type RaidRequest = {
	spaces: SpaceId[];
	moves?: RaidMove[];
};

export const MAX_RAID_SPACES = 3;

/** How far War Parties in `src` may travel to Raid (Dragging Canoe: 2). */
function reachFrom(board: Board, src: SpaceId): number {
	return leaderModifiers(board, "raid", src).raidRange;
}

function inReach(board: Board, src: SpaceId, dst: SpaceId): boolean {
	return withinDistance(src, reachFrom(board, src)).includes(dst);
}

/** Opposition Province with an Underground War Party in or within reach of it. */
export function canRaidIn(board: Board, space: SpaceId): boolean {
	if (!isProvince(space) || (board.support[space] ?? NEUTRAL) >= NEUTRAL) return false;
	if (count(board, space, WARPARTY_U) > 0) return true;
	return SPACE_IDS.some((src) => count(board, src, WARPARTY_U) > 0 && inReach(board, src, space));
}

export function raid(board: Board, request: RaidRequest, ctx: ActionContext): ActionResult {
	const { spaces } = request;
	const moves = request.moves ?? [];
	if (spaces.length === 0 || spaces.length > MAX_RAID_SPACES) {
		return illegal(`Raid selects 1 to ${MAX_RAID_SPACES} Provinces`);
	}
	if (hasDuplicates(spaces)) return illegal("Raid Provinces must be distinct");
	for (const space of spaces) {
		if (!canRaidIn(board, space)) return illegal(`${space} cannot be Raided`);
	}

	if (hasDuplicates(moves.map((m) => m.dst))) return illegal("Only one War Party may move into each Province");
	const outgoing = new Map<SpaceId, number>();
	for (const m of moves) {
		if (!spaces.includes(m.dst)) return illegal(`${m.dst} is not a Raided Province`);
		if (!inReach(board, m.src, m.dst)) return illegal(`${m.src} is out of Raid range of ${m.dst}`);
		outgoing.set(m.src, (outgoing.get(m.src) ?? 0) + 1);
	}
	for (const [src, n] of outgoing) {
		if (count(board, src, WARPARTY_U) < n) return illegal(`Only ${count(board, src, WARPARTY_U)} Underground War Parties in ${src}`);
	}
	for (const space of spaces) {
		const arriving = moves.filter((m) => m.dst === space).length;
		if (count(board, space, WARPARTY_U) - (outgoing.get(space) ?? 0) + arriving < 1) {
			return illegal(`${space} has no Underground War Party to Activate`);
		}
	}

	const cost = spaces.length;
	if (board.resources.INDIANS < cost) {
		return reject("insufficient_resources", `Indians need ${cost} Resources to Raid`);
	}

	const mark = beginAction(board);
	spendResources(board, "INDIANS", cost);
	for (const m of moves) move(board, m.src, m.dst, WARPARTY_U, 1);

	let markers = 0;
	for (const space of spaces) {
		flip(board, space, WARPARTY_U, WARPARTY_A, 1);
		if (board.markers[RAID].pool > 0 && !hasMarker(board, RAID, space)) {
			placeMarker(board, RAID, space);
			markers += 1;
		}
		shiftSupport(board, space, 1);
		ctx.raided.push(space);
	}

	return completeAction(board, ctx, { kind: "command", name: "RAID", faction: "INDIANS", spaces }, mark, {
		cost,
		markers,
	});
}
