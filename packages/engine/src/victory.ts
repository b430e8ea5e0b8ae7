import { type Board, count } from "./board";
import { type Faction, FORT_PAT, VILLAGE } from "./constants";
import { supportTotals } from "./control";

export type VictoryTally = {
	support: number;
	opposition: number;
	cbc: number;
	crc: number;
	patriotForts: number;
	villages: number;
	toaPlayed: boolean;
};

export type VictoryMargins = Record<Faction, [number, number]>;

export type VictoryCheck = {
	margins: VictoryMargins;
	winners: Faction[];
};

export function tallyVictory(board: Board): VictoryTally {
	let patriotForts = 0;
	let villages = 0;
	for (const space of Object.keys(board.spaces)) {
		patriotForts += count(board, space, FORT_PAT);
		villages += count(board, space, VILLAGE);
	}
	return {
		...supportTotals(board),
		cbc: board.cbc,
		crc: board.crc,
		patriotForts,
		villages,
		toaPlayed: board.toaPlayed,
	};
}

export function victoryMargins(tally: VictoryTally): VictoryMargins {
	return {
		BRITISH: [tally.support - tally.opposition - 10, tally.crc - tally.cbc],
		PATRIOTS: [tally.opposition - tally.support - 10, tally.patriotForts + 3 - tally.villages],
		FRENCH: [tally.opposition - tally.support - 10, tally.cbc - tally.crc],
		INDIANS: [tally.support - tally.opposition - 10, tally.villages - 3 - tally.patriotForts],
	};
}

/** Winter Quarters victory check: a faction wins when both margins are positive. */
export function checkVictory(board: Board): VictoryCheck {
	const tally = tallyVictory(board);
	const margins = victoryMargins(tally);
	const winners: Faction[] = [];
	for (const faction of ["BRITISH", "PATRIOTS", "FRENCH", "INDIANS"] as const) {
		if (faction === "FRENCH" && !tally.toaPlayed) continue;
		const [first, second] = margins[faction];
		if (first > 0 && second > 0) winners.push(faction);
	}
	return { margins, winners };
}

export type FinalScore = {
	totals: Record<Faction, number>;
	winner: Faction;
};

const FINAL_TIE_ORDER: readonly Faction[] = ["PATRIOTS", "BRITISH", "FRENCH", "INDIANS"];

/** End-of-game scoring: the sum of both margins, French only after the Treaty. */
export function finalScoring(board: Board): FinalScore {
	const tally = tallyVictory(board);
	const margins = victoryMargins(tally);
	const totals: Record<Faction, number> = {
		BRITISH: margins.BRITISH[0] + margins.BRITISH[1],
		PATRIOTS: margins.PATRIOTS[0] + margins.PATRIOTS[1],
		FRENCH: tally.toaPlayed ? margins.FRENCH[0] + margins.FRENCH[1] : Number.NEGATIVE_INFINITY,
		INDIANS: margins.INDIANS[0] + margins.INDIANS[1],
	};
	let winner: Faction = "PATRIOTS";
	for (const faction of FINAL_TIE_ORDER) {
		if (totals[faction] > totals[winner]) winner = faction;
	}
	return { totals, winner };
}
