import {
	ACTIVE_OPPOSITION,
	ACTIVE_SUPPORT,
	adjacent,
	bases,
	battle,
	type Board,
	BLOCKADE,
	canAfford,
	control,
	controlledCities,
	count,
	countAll,
	createActionContext,
	type Faction,
	flip,
	FORT_BRI,
	FORT_PAT,
	gainResources,
	hasMarker,
	isBlockaded,
	isCity,
	isColony,
	isReserve,
	isWestIndies,
	LEADER_FACTION,
	LEADER_SUCCESSOR,
	LEADERS,
	loseResources,
	MAX_BASES_PER_SPACE,
	MILITIA_A,
	MILITIA_U,
	move,
	moveLeader,
	PIECE_TAGS,
	type PieceTag,
	place,
	poolCount,
	population,
	PROPAGANDA,
	pushHistory,
	RAID,
	REGULAR_BRI,
	REGULAR_FRE,
	REGULAR_PAT,
	remove,
	removeMarker,
	type Rng,
	setFni,
	shiftSupport,
	type SpaceId,
	SPACE_IDS,
	spendResources,
	tallyVictory,
	TORY,
	transfer,
	victoryMargins,
	VILLAGE,
	WARPARTY_A,
	WARPARTY_U,
	WEST_INDIES,
} from "@liberty/engine";

const WEST_INDIES_INCOME = 5;
const DESERTION_RATE = 5;
const MAX_SUPPORT_SHIFTS = 2;

const UNITS: Record<Faction, readonly PieceTag[]> = {
	BRITISH: [REGULAR_BRI, TORY],
	PATRIOTS: [REGULAR_PAT, MILITIA_A, MILITIA_U],
	FRENCH: [REGULAR_FRE],
	INDIANS: [WARPARTY_A, WARPARTY_U],
};

function total(board: Board, tag: PieceTag): number {
	return SPACE_IDS.reduce((sum, space) => sum + count(board, space, tag), 0);
}

function pay(board: Board, faction: Faction): boolean {
	if (!canAfford(board, faction, 1)) return false;
	spendResources(board, faction, 1);
	return true;
}

/** Closest of `targets` by map steps; the first listed wins ties. */
function nearest(origin: SpaceId, targets: readonly SpaceId[]): SpaceId | null {
	const seen = new Set<SpaceId>([origin]);
	let frontier: SpaceId[] = [origin];
	while (frontier.length > 0) {
		const hit = targets.find((t) => frontier.includes(t));
		if (hit !== undefined) return hit;
		const next: SpaceId[] = [];
		for (const id of frontier) {
			for (const nb of adjacent(id)) {
				if (seen.has(nb)) continue;
				seen.add(nb);
				next.push(nb);
			}
		}
		frontier = next;
	}
	return null;
}

// --- Supply -------------------------------------------------------------------

function britishSupply(board: Board): void {
	for (const space of SPACE_IDS) {
		if (isWestIndies(space) || countAll(board, space, UNITS.BRITISH) === 0) continue;
		if (count(board, space, FORT_BRI) > 0) continue;
		if (isCity(space) && control(board, space) === "BRITISH") continue;
		if (pay(board, "BRITISH") || shiftSupport(board, space, -1) > 0) continue;
		for (const tag of UNITS.BRITISH) remove(board, space, tag, count(board, space, tag));
	}
}

function patriotSupply(board: Board): void {
	for (const space of SPACE_IDS) {
		const units = countAll(board, space, UNITS.PATRIOTS);
		if (units === 0 || count(board, space, FORT_PAT) > 0) continue;
		if ((isCity(space) || isColony(space)) && control(board, space) === "REBELLION") continue;
		if (pay(board, "PATRIOTS")) continue;
		let left = Math.floor(units / 2);
		for (const tag of [MILITIA_U, MILITIA_A, REGULAR_PAT]) {
			const n = Math.min(left, count(board, space, tag));
			remove(board, space, tag, n);
			left -= n;
		}
	}
}

/** French out of supply march to the nearest Patriot Fort, else pay, else go home. */
function frenchSupply(board: Board): void {
	for (const space of SPACE_IDS) {
		const regulars = count(board, space, REGULAR_FRE);
		if (regulars === 0 || isWestIndies(space)) continue;
		if (count(board, space, FORT_PAT) > 0 || control(board, space) === "REBELLION") continue;
		const forts = SPACE_IDS.filter((s) => count(board, s, FORT_PAT) > 0);
		const dest = nearest(space, forts);
		if (dest !== null) {
			move(board, space, dest, REGULAR_FRE, regulars);
			continue;
		}
		if (pay(board, "FRENCH")) continue;
		remove(board, space, REGULAR_FRE, regulars);
	}
}

function indianSupply(board: Board): void {
	if (total(board, VILLAGE) === 0 && poolCount(board, "available", VILLAGE) > 0) {
		const reserve = SPACE_IDS.find((s) => isReserve(s) && bases(board, s) < MAX_BASES_PER_SPACE);
		if (reserve !== undefined) place(board, reserve, VILLAGE, 1);
	}
	for (const space of SPACE_IDS) {
		if (countAll(board, space, UNITS.INDIANS) === 0) continue;
		if (count(board, space, VILLAGE) > 0 || isReserve(space)) continue;
		if (pay(board, "INDIANS")) continue;
		const dest = nearest(
			space,
			SPACE_IDS.filter((s) => count(board, s, VILLAGE) > 0),
		);
		if (dest === null) continue;
		for (const tag of UNITS.INDIANS) move(board, space, dest, tag, count(board, space, tag));
	}
}

/** French and British Regulars facing off in the West Indies fight, then each side pays upkeep or leaves. */
function westIndiesSupply(board: Board, rng: Rng): void {
	if (board.toaPlayed && count(board, WEST_INDIES, REGULAR_FRE) > 0 && count(board, WEST_INDIES, REGULAR_BRI) > 0) {
		const result = battle(board, { faction: "FRENCH", spaces: [WEST_INDIES], free: true }, createActionContext(rng));
		if (!result.ok) {
			pushHistory(board, { type: "note", message: `West Indies Battle not fought: ${result.error}`, faction: "FRENCH" });
		}
	}
	for (const [tag, faction] of [
		[REGULAR_FRE, "FRENCH"],
		[REGULAR_BRI, "BRITISH"],
	] as const) {
		const n = count(board, WEST_INDIES, tag);
		if (n > 0 && !pay(board, faction)) remove(board, WEST_INDIES, tag, n);
	}
}

export function supply(board: Board, rng: Rng): void {
	britishSupply(board);
	patriotSupply(board);
	frenchSupply(board);
	indianSupply(board);
	westIndiesSupply(board, rng);
}

// --- Income -------------------------------------------------------------------

/** Resources each faction collects in a Winter Quarters round. */
export function income(board: Board): Record<Faction, number> {
	const british =
		total(board, FORT_BRI) +
		controlledCities(board, "BRITISH")
			.filter((city) => !isBlockaded(board, city))
			.reduce((sum, city) => sum + population(city), 0) +
		(control(board, WEST_INDIES) === "BRITISH" ? WEST_INDIES_INCOME : 0);

	const rebellionSpaces = SPACE_IDS.filter((space) => control(board, space) === "REBELLION").length;
	const patriots = total(board, FORT_PAT) + Math.floor(rebellionSpaces / 2);

	const indians = Math.floor(total(board, VILLAGE) / 2);

	let french: number;
	if (!board.toaPlayed) {
		french = 2 * board.markers[BLOCKADE].pool;
	} else {
		french =
			board.fni +
			SPACE_IDS.filter((space) => isCity(space) && control(board, space) !== "BRITISH").reduce(
				(sum, city) => sum + population(city),
				0,
			) +
			(control(board, WEST_INDIES) === "REBELLION" ? WEST_INDIES_INCOME : 0);
	}

	return { BRITISH: british, PATRIOTS: patriots, FRENCH: french, INDIANS: indians };
}

/** Collects income for every faction, returning what each actually gained. */
export function collectIncome(board: Board): Record<Faction, number> {
	const owed = income(board);
	return {
		BRITISH: gainResources(board, "BRITISH", owed.BRITISH),
		PATRIOTS: gainResources(board, "PATRIOTS", owed.PATRIOTS),
		FRENCH: gainResources(board, "FRENCH", owed.FRENCH),
		INDIANS: gainResources(board, "INDIANS", owed.INDIANS),
	};
}

// --- Support ------------------------------------------------------------------

/**
 * Reward Loyalty, then Committees of Correspondence. Each Resource spent buys
 * one shift or one marker removal, and no space moves more than twice.
 */
export function supportPhase(board: Board): void {
	const shifted = new Map<SpaceId, number>();
	const level = (space: SpaceId) => board.support[space] ?? 0;

	for (const space of SPACE_IDS) {
		if (isWestIndies(space) || control(board, space) !== "BRITISH") continue;
		if (count(board, space, REGULAR_BRI) === 0 || count(board, space, TORY) === 0) continue;
		if (level(space) >= ACTIVE_SUPPORT) continue;
		let left = MAX_SUPPORT_SHIFTS;
		for (const marker of [RAID, PROPAGANDA]) {
			if (left > 0 && hasMarker(board, marker, space) && pay(board, "BRITISH")) {
				removeMarker(board, marker, space);
				left -= 1;
			}
		}
		while (left > 0 && level(space) < ACTIVE_SUPPORT && pay(board, "BRITISH")) {
			shiftSupport(board, space, 1);
			left -= 1;
		}
		shifted.set(space, MAX_SUPPORT_SHIFTS - left);
	}

	for (const space of SPACE_IDS) {
		if (isWestIndies(space) || control(board, space) !== "REBELLION") continue;
		if (countAll(board, space, UNITS.PATRIOTS) === 0 || level(space) <= ACTIVE_OPPOSITION) continue;
		let left = MAX_SUPPORT_SHIFTS - (shifted.get(space) ?? 0);
		if (left > 0 && hasMarker(board, RAID, space) && pay(board, "PATRIOTS")) {
			removeMarker(board, RAID, space);
			left -= 1;
		}
		while (left > 0 && level(space) > ACTIVE_OPPOSITION && pay(board, "PATRIOTS")) {
			shiftSupport(board, space, -1);
			left -= 1;
		}
	}
}

// --- Redeployment -------------------------------------------------------------

const REDEPLOY_ORDER: readonly Faction[] = ["INDIANS", "FRENCH", "BRITISH", "PATRIOTS"];

/** The first faction on the next card hands its leader on to the successor. */
export function changeLeader(board: Board, faction: Faction | null): void {
	if (faction === null || faction === "PATRIOTS") return;
	if (faction === "FRENCH" && !board.toaPlayed) return;
	for (const leader of LEADERS) {
		const next = LEADER_SUCCESSOR[leader];
		const at = board.leaders[leader];
		if (LEADER_FACTION[leader] !== faction || next === undefined || at === null) continue;
		moveLeader(board, next, at);
		moveLeader(board, leader, null);
		return;
	}
}

/** Leaders in play join their faction's largest stack, or leave the map when it has none. */
export function redeployLeaders(board: Board): void {
	for (const faction of REDEPLOY_ORDER) {
		let best: SpaceId | null = null;
		let most = 0;
		for (const space of SPACE_IDS) {
			const n = countAll(board, space, UNITS[faction]);
			if (n > most) {
				most = n;
				best = space;
			}
		}
		for (const leader of LEADERS) {
			if (LEADER_FACTION[leader] === faction && board.leaders[leader] !== null) moveLeader(board, leader, best);
		}
	}
}

export function releaseBritish(board: Board, n: number): void {
	transfer(board, REGULAR_BRI, "unavailable", "available", Math.min(n, poolCount(board, "unavailable", REGULAR_BRI)));
}

/** After the Treaty, FNI drops a box and one Blockade returns to the West Indies. */
export function driftFni(board: Board): void {
	if (!board.toaPlayed) return;
	if (board.fni > 0) setFni(board, board.fni - 1);
	const [city] = [...board.markers[BLOCKADE].onMap].sort();
	if (city !== undefined) removeMarker(board, BLOCKADE, city);
}

// --- Desertion ----------------------------------------------------------------

/** Space with the highest support among `spaces`; the first wins ties. */
function mostSupport(board: Board, spaces: readonly SpaceId[]): SpaceId | undefined {
	let best: SpaceId | undefined;
	for (const space of spaces) {
		if (best === undefined || (board.support[space] ?? 0) > (board.support[best] ?? 0)) best = space;
	}
	return best;
}

/** Removes up to `n` pieces, `tags` in order, walking `spaces` in order. */
function desert(board: Board, spaces: readonly SpaceId[], tags: readonly PieceTag[], n: number): void {
	let left = n;
	for (const space of spaces) {
		for (const tag of tags) {
			const k = Math.min(left, count(board, space, tag));
			remove(board, space, tag, k);
			left -= k;
		}
		if (left === 0) return;
	}
}

/**
 * One in five Militia and one in five Continentals in Colonies desert, as does
 * one in five Tories. The enemy picks the first of each from the space with the
 * most Support; the owner picks the rest.
 */
export function desertion(board: Board): void {
	const colonies = SPACE_IDS.filter(isColony);
	const militiaSpaces = colonies.filter((s) => countAll(board, s, [MILITIA_U, MILITIA_A]) > 0);
	const continentalSpaces = colonies.filter((s) => count(board, s, REGULAR_PAT) > 0);
	const torySpaces = SPACE_IDS.filter((s) => count(board, s, TORY) > 0);

	const militia = Math.floor(
		militiaSpaces.reduce((sum, s) => sum + countAll(board, s, [MILITIA_U, MILITIA_A]), 0) / DESERTION_RATE,
	);
	const continentals = Math.floor(
		continentalSpaces.reduce((sum, s) => sum + count(board, s, REGULAR_PAT), 0) / DESERTION_RATE,
	);
	const tories = Math.floor(torySpaces.reduce((sum, s) => sum + count(board, s, TORY), 0) / DESERTION_RATE);

	for (const [spaces, tags, n, rest] of [
		[militiaSpaces, [MILITIA_U, MILITIA_A], militia, colonies],
		[continentalSpaces, [REGULAR_PAT], continentals, colonies],
		[torySpaces, [TORY], tories, SPACE_IDS],
	] as const) {
		const first = mostSupport(board, spaces);
		if (n === 0 || first === undefined) continue;
		desert(board, [first], tags, 1);
		desert(board, rest, tags, n - 1);
	}
}

// --- Reset --------------------------------------------------------------------

/** Clears Propaganda and Raid markers, returns casualties and hides every Active piece. */
export function reset(board: Board): void {
	for (const marker of [PROPAGANDA, RAID]) {
		for (const space of [...board.markers[marker].onMap]) removeMarker(board, marker, space);
	}
	for (const tag of PIECE_TAGS) {
		const n = board.casualties[tag] ?? 0;
		if (n > 0) transfer(board, tag, "casualties", "available", n);
	}
	for (const space of SPACE_IDS) {
		const militia = count(board, space, MILITIA_A);
		if (militia > 0) flip(board, space, MILITIA_A, MILITIA_U, militia);
		const warParties = count(board, space, WARPARTY_A);
		if (warParties > 0) flip(board, space, WARPARTY_A, WARPARTY_U, warParties);
	}
}

/** Patriots and Indians whose second victory condition is met. */
function leadingSecondCondition(board: Board): Faction[] {
	const margins = victoryMargins(tallyVictory(board));
	return (["PATRIOTS", "INDIANS"] as const).filter((f) => margins[f][1] > 0);
}

/** The year's own text, resolved at the end of Reset. */
export function winterCardEffect(board: Board, cardId: number): void {
	switch (cardId) {
		case 97:
			gainResources(board, board.crc > board.cbc ? "FRENCH" : "BRITISH", 5);
			return;
		case 98:
			loseResources(board, board.crc > board.cbc ? "BRITISH" : "FRENCH", 3);
			return;
		case 99:
		case 100: {
			const cut = Math.floor(Math.abs(board.crc - board.cbc) / 2);
			if (board.crc > board.cbc) board.crc -= cut;
			else board.cbc -= cut;
			pushHistory(board, { type: "note", message: `CRC ${board.crc}, CBC ${board.cbc}`, cardId });
			return;
		}
		case 101:
		case 104:
			for (const faction of leadingSecondCondition(board)) loseResources(board, faction, 2);
			return;
		case 102:
		case 103:
			for (const faction of leadingSecondCondition(board)) {
				const base = faction === "PATRIOTS" ? FORT_PAT : VILLAGE;
				const space = SPACE_IDS.find((s) => count(board, s, base) > 0);
				if (space !== undefined) remove(board, space, base, 1);
			}
			return;
	}
}

// --- Round --------------------------------------------------------------------

export type WinterOptions = {
	cardId: number;
	rng: Rng;
	/** First faction on the card that follows, for the Leader Change. */
	nextFirst: Faction | null;
	/** British Regulars that leave Unavailable this year. */
	release: number;
	/** The last Winter Quarters ends after the Support phase. */
	finalRound: boolean;
};

export type WinterReport = {
	gained: Record<Faction, number>;
	final: boolean;
};

/** Runs one Winter Quarters round after the victory check, phase by phase. */
export function resolveWinterQuarters(board: Board, opts: WinterOptions): WinterReport {
	supply(board, opts.rng);
	const gained = collectIncome(board);
	supportPhase(board);
	if (opts.finalRound) return { gained, final: true };

	changeLeader(board, opts.nextFirst);
	redeployLeaders(board);
	releaseBritish(board, opts.release);
	driftFni(board);
	desertion(board);
	reset(board);
	winterCardEffect(board, opts.cardId);
	return { gained, final: false };
}
