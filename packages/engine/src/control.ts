import { type Board, count, countAll } from "./board";
import {
	type ControlValue,
	FORT_BRI,
	REBELLION_TAGS,
	REGULAR_BRI,
	ROYALIST_TAGS,
	TORY,
} from "./constants";
import { isCity, type SpaceId, SPACE_IDS } from "./map";

export function royalistPieces(board: Board, space: SpaceId): number {
	return countAll(board, space, ROYALIST_TAGS);
}

export function rebellionPieces(board: Board, space: SpaceId): number {
	return countAll(board, space, REBELLION_TAGS);
}

export function britishPieces(board: Board, space: SpaceId): number {
	return count(board, space, REGULAR_BRI) + count(board, space, TORY) + count(board, space, FORT_BRI);
}

/** Derived on every call from the current piece majority. */
export function control(board: Board, space: SpaceId): ControlValue {
	const rebels = rebellionPieces(board, space);
	const royalists = royalistPieces(board, space);
	if (rebels > royalists) return "REBELLION";
	if (royalists > rebels && britishPieces(board, space) > 0) return "BRITISH";
	return null;
}

export function controlledCities(board: Board, value: Exclude<ControlValue, null>): SpaceId[] {
	return SPACE_IDS.filter((id) => isCity(id) && control(board, id) === value);
}

export type SupportTotals = { support: number; opposition: number };

/** Sum of levels on each side of Neutral, unweighted by population. */
export function supportTotals(board: Board): SupportTotals {
	let support = 0;
	let opposition = 0;
	for (const level of Object.values(board.support)) {
		if (level > 0) support += level;
		else opposition -= level;
	}
	return { support, opposition };
}
