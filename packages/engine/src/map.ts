import { z } from "zod";
import mapData from "../data/map.json";
import { WEST_INDIES } from "./constants";

export type SpaceId = string;
export type SpaceType = "City" | "Colony" | "Reserve" | "WestIndies";

export const SpaceTypeSchema = z.enum(["City", "Colony", "Reserve", "WestIndies"]);

export const MapSchema = z.record(
	z.string(),
	z.object({
		type: SpaceTypeSchema,
		population: z.number().int().nonnegative(),
		adj: z.array(z.string()),
	}),
);

export type MapSpace = {
	id: SpaceId;
	type: SpaceType;
	population: number;
	adj: SpaceId[];
};

const parsed = MapSchema.parse(mapData);

export const MAP: Readonly<Record<SpaceId, MapSpace>> = Object.fromEntries(
	Object.entries(parsed).map(([id, space]): [SpaceId, MapSpace] => [id, { id, ...space }]),
);

/** Every space id in ascending order, West Indies included. */
export const SPACE_IDS: readonly SpaceId[] = Object.keys(MAP).sort();

export function getSpace(id: SpaceId): MapSpace {
	const space = MAP[id];
	if (!space) throw new Error(`Unknown space: ${id}`);
	return space;
}

export function spaceType(id: SpaceId): SpaceType {
	return getSpace(id).type;
}

export function isCity(id: SpaceId): boolean {
	return spaceType(id) === "City";
}

export function isColony(id: SpaceId): boolean {
	return spaceType(id) === "Colony";
}

export function isReserve(id: SpaceId): boolean {
	return spaceType(id) === "Reserve";
}

/** Colonies and Reserves. */
export function isProvince(id: SpaceId): boolean {
	const type = spaceType(id);
	return type === "Colony" || type === "Reserve";
}

export function isWestIndies(id: SpaceId): boolean {
	return id === WEST_INDIES;
}

export function population(id: SpaceId): number {
	return getSpace(id).population;
}

export function adjacent(id: SpaceId): readonly SpaceId[] {
	return getSpace(id).adj;
}

export function isAdjacent(a: SpaceId, b: SpaceId): boolean {
	return getSpace(a).adj.includes(b);
}

/** Spaces reachable in at most `steps` moves, excluding the origin. */
export function withinDistance(origin: SpaceId, steps: number): SpaceId[] {
	const seen = new Set<SpaceId>([origin]);
	let frontier: SpaceId[] = [origin];
	for (let i = 0; i < steps; i++) {
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
	seen.delete(origin);
	return [...seen].sort();
}
