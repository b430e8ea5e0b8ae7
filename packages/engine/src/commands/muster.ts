import {
	type ActionContext,
	type ActionResult,
	beginAction,
	completeAction,
	hasDuplicates,
	illegal,
	reject,
} from "../actions";
import {
	bases,
	type Board,
	count,
	hasMarker,
	place,
	poolCount,
	remove,
	removeMarker,
	shiftSupport,
	spendResources,
} from "../board";
import {
	ACTIVE_OPPOSITION,
	ACTIVE_SUPPORT,
	type Faction,
	FORT_BRI,
	MAX_BASES_PER_SPACE,
	type MarkerId,
	PASSIVE_OPPOSITION,
	PROPAGANDA,
	RAID,
	REGULAR_BRI,
	REGULAR_FRE,
	TORY,
} from "../constants";
import { britishPieces, control, rebellionPieces, royalistPieces } from "../control";
import { leaderModifiers } from "../leaders";
import { adjacent, isWestIndies, type SpaceId } from "../map";

export type MusterRequest = {
	faction: Faction;
	spaces: SpaceId[];
	/** British: up to 6 Regulars into one selected space. */
	regulars?: { space: SpaceId; n: number };
	/** British: Tories per selected space. */
	tories?: Record<SpaceId, number>;
	/** British: replace 3 cubes with a Fort here. */
	fortSpace?: SpaceId;
	/** British: shift up to 2 levels toward Active Support here. */
	rewardLoyalty?: { space: SpaceId; levels: number };
};

export const MAX_MUSTER_REGULARS = 6;
export const FRENCH_MUSTER_COST = 2;
export const FRENCH_MUSTER_REGULARS = 4;

/** Spaces holding, or adjacent to, British Regulars or a British Fort. */
export function nearBritishPower(board: Board, space: SpaceId): boolean {
	const has = (id: SpaceId) => count(board, id, REGULAR_BRI) + count(board, id, FORT_BRI) > 0;
	return has(space) || adjacent(space).some(has);
}

export function maxToriesAt(board: Board, space: SpaceId): number {
	if (isWestIndies(space)) return 0;
	const level = board.support[space] ?? 0;
	if (level === ACTIVE_OPPOSITION) return 0;
	return level === PASSIVE_OPPOSITION ? 1 : 2;
}

function markersAt(board: Board, space: SpaceId): MarkerId[] {
	return [PROPAGANDA, RAID].filter((m) => hasMarker(board, m, space));
}

export function muster(board: Board, request: MusterRequest, ctx: ActionContext): ActionResult {
	if (request.faction === "FRENCH") return musterFrench(board, request, ctx);
	if (request.faction !== "BRITISH") return illegal(`${request.faction} cannot Muster`);
	return musterBritish(board, request, ctx);
}

function musterFrench(board: Board, request: MusterRequest, ctx: ActionContext): ActionResult {
	if (!board.toaPlayed) return reject("not_available", "French cannot Muster before the Treaty of Alliance");
	if (request.spaces.length !== 1) return illegal("French Muster selects exactly one space");
	const [space] = request.spaces;
	if (space === undefined) return illegal("French Muster selects exactly one space");
	if (!isWestIndies(space) && control(board, space) !== "REBELLION") {
		return illegal(`French Muster needs Rebellion Control or the West Indies, not ${space}`);
	}
	if (board.resources.FRENCH < FRENCH_MUSTER_COST) {
		return reject("insufficient_resources", "French Muster costs 2 Resources");
	}
	const n = Math.min(FRENCH_MUSTER_REGULARS, poolCount(board, "available", REGULAR_FRE));
	if (n === 0) return reject("not_available", "No French Regulars available");

	const mark = beginAction(board);
	spendResources(board, "FRENCH", FRENCH_MUSTER_COST);
	place(board, space, REGULAR_FRE, n);
	return completeAction(board, ctx, { kind: "command", name: "MUSTER", faction: "FRENCH", spaces: [space] }, mark, {
		regulars: n,
	});
}

function musterBritish(board: Board, request: MusterRequest, ctx: ActionContext): ActionResult {
	const { spaces } = request;
	if (spaces.length === 0) return illegal("Muster needs at least one space");
	if (hasDuplicates(spaces)) return illegal("Muster spaces must be distinct");
	if (request.fortSpace && request.rewardLoyalty) {
		return illegal("Muster builds a Fort or Rewards Loyalty, not both");
	}

	const placedRegulars: Record<SpaceId, number> = {};
	if (request.regulars) {
		const { space, n } = request.regulars;
		if (!spaces.includes(space)) return illegal("Regulars must go to a selected space");
		if (n < 0 || n > MAX_MUSTER_REGULARS) return illegal(`Muster places at most ${MAX_MUSTER_REGULARS} Regulars`);
		placedRegulars[space] = Math.min(n, poolCount(board, "available", REGULAR_BRI));
	}

	const placedTories: Record<SpaceId, number> = {};
	let toryTotal = 0;
	for (const [space, n] of Object.entries(request.tories ?? {})) {
		if (n === 0) continue;
		if (!spaces.includes(space)) return illegal(`Tories must go to a selected space, not ${space}`);
		if (n > maxToriesAt(board, space)) return illegal(`At most ${maxToriesAt(board, space)} Tories in ${space}`);
		if (!nearBritishPower(board, space)) return illegal(`${space} is not in or next to British Regulars or a Fort`);
		placedTories[space] = n;
		toryTotal += n;
	}
	if (toryTotal > poolCount(board, "available", TORY)) return reject("not_available", "Not enough Tories available");

	const after = (space: SpaceId, tag: typeof REGULAR_BRI | typeof TORY) =>
		count(board, space, tag) + ((tag === REGULAR_BRI ? placedRegulars : placedTories)[space] ?? 0);

	if (request.fortSpace) {
		const space = request.fortSpace;
		if (!spaces.includes(space)) return illegal("Fort must be built in a selected space");
		if (bases(board, space) >= MAX_BASES_PER_SPACE) return illegal(`${space} has no room for a Fort`);
		if (after(space, REGULAR_BRI) + after(space, TORY) < 3) return illegal("A Fort needs 3 British cubes");
		if (poolCount(board, "available", FORT_BRI) === 0) return reject("not_available", "No British Forts available");
	}

	let loyaltyShifts = 0;
	let loyaltyCost = 0;
	let loyaltyMarkers: MarkerId[] = [];
	if (request.rewardLoyalty) {
		const { space, levels } = request.rewardLoyalty;
		if (!spaces.includes(space)) return illegal("Reward Loyalty must be in a selected space");
		if (after(space, REGULAR_BRI) === 0 || after(space, TORY) === 0) {
			return illegal("Reward Loyalty needs a British Regular and a Tory");
		}
		const placed = (placedRegulars[space] ?? 0) + (placedTories[space] ?? 0);
		const royalists = royalistPieces(board, space) + placed;
		const british = britishPieces(board, space) + placed;
		if (!(royalists > rebellionPieces(board, space) && british > 0)) {
			return illegal("Reward Loyalty needs British Control");
		}
		loyaltyShifts = Math.min(2, levels, ACTIVE_SUPPORT - (board.support[space] ?? 0));
		if (loyaltyShifts <= 0) return illegal(`${space} cannot shift further toward Support`);
		loyaltyMarkers = markersAt(board, space);
		const freeShift = leaderModifiers(board, "muster", space).freeRewardLoyaltyShift ? 1 : 0;
		loyaltyCost = loyaltyMarkers.length + loyaltyShifts - freeShift;
	}

	const cost = spaces.length + loyaltyCost;
	if (board.resources.BRITISH < cost) {
		return reject("insufficient_resources", `British need ${cost} Resources to Muster`);
	}

	const mark = beginAction(board);
	spendResources(board, "BRITISH", cost);
	for (const [space, n] of Object.entries(placedRegulars)) place(board, space, REGULAR_BRI, n);
	for (const [space, n] of Object.entries(placedTories)) place(board, space, TORY, n);

	if (request.fortSpace) {
		const space = request.fortSpace;
		const regulars = Math.min(3, count(board, space, REGULAR_BRI));
		remove(board, space, REGULAR_BRI, regulars);
		remove(board, space, TORY, 3 - regulars);
		place(board, space, FORT_BRI, 1);
	}
	if (request.rewardLoyalty) {
		const { space } = request.rewardLoyalty;
		for (const marker of loyaltyMarkers) removeMarker(board, marker, space);
		shiftSupport(board, space, loyaltyShifts);
	}

	return completeAction(board, ctx, { kind: "command", name: "MUSTER", faction: "BRITISH", spaces }, mark, {
		cost,
		loyaltyShifts,
	});
}
