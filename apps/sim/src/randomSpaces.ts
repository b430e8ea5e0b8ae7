import { type Rng, rollD3, rollD6, SPACE_IDS, type SpaceId } from "@liberty/engine";
import { z } from "zod";
import randomSpacesData from "../data/random_spaces.json";

const SpaceIdSchema = z.string().refine((id) => SPACE_IDS.includes(id), "unknown space");

/** Random Spaces table: six rows (1D6) by three columns (1D3). */
const RandomSpacesSchema = z.array(z.array(z.array(SpaceIdSchema).min(1)).length(3)).length(6);

const RANDOM_SPACES = RandomSpacesSchema.parse(randomSpacesData);

/**
 * Every table space in visiting order, starting from a D6 row and D3 column:
 * the cells of the starting row across the columns, then the next rows, wrapping
 * back to the top.
 */
export function randomSpaceWalk(rng: Rng): SpaceId[] {
	const col = rollD3(rng) - 1;
	const row = rollD6(rng) - 1;
	const walk: SpaceId[] = [];
	for (let r = 0; r < RANDOM_SPACES.length; r++) {
		const cells = RANDOM_SPACES[(row + r) % RANDOM_SPACES.length] ?? [];
		for (let c = 0; c < cells.length; c++) {
			walk.push(...(cells[(col + c) % cells.length] ?? []));
		}
	}
	return walk;
}

/** Orders `candidates` by a fresh walk of the table; spaces off the table keep their order at the end. */
export function orderByRandomSpaces(rng: Rng, candidates: readonly SpaceId[]): SpaceId[] {
	const walk = randomSpaceWalk(rng);
	const rank = (id: SpaceId) => {
		const i = walk.indexOf(id);
		return i === -1 ? walk.length : i;
	};
	return [...candidates].sort((a, b) => rank(a) - rank(b));
}
