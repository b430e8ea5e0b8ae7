import { describe, expect, test } from "vitest";
import {
	changeLeader,
	collectIncome,
	desertion,
	driftFni,
	income,
	redeployLeaders,
	releaseBritish,
	reset,
	resolveWinterQuarters,
	supply,
	supportPhase,
	winterCardEffect,
} from "../src/winterQuarters";
import { makeBoard, NO_RESOURCES, scriptedRng } from "./helpers";

function incomeBoard(toaPlayed: boolean) {
	return makeBoard({
		spaces: {
			Boston: { British_Regular: 2 },
			New_York_City: { British_Regular: 1 },
			Florida: { British_Fort: 1 },
			West_Indies: { British_Regular: 1 },
			Virginia: { Patriot_Fort: 1, Patriot_Militia_U: 1 },
			Massachusetts: { Patriot_Militia_U: 2 },
			Pennsylvania: { Patriot_Militia_U: 1 },
			Quebec: { Indian_Village: 1 },
			Northwest: { Indian_Village: 1 },
			Southwest: { Indian_Village: 1 },
		},
		markers: { Blockade: { pool: 1, on_map: ["New_York_City"] } },
		toaPlayed,
		fni: toaPlayed ? 1 : 0,
	});
}

describe("winter quarters income", () => {
	test("before the Treaty of Alliance", () => {
		expect(income(incomeBoard(false))).toEqual({ BRITISH: 7, PATRIOTS: 2, FRENCH: 2, INDIANS: 1 });
	});

	test("French income after the Treaty counts FNI and non-British Cities", () => {
		expect(income(incomeBoard(true)).FRENCH).toBe(7);
	});

	test("collected income respects the Resource cap", () => {
		const board = incomeBoard(false);
		board.resources.BRITISH = 48;
		expect(collectIncome(board)).toEqual({ BRITISH: 2, PATRIOTS: 2, FRENCH: 2, INDIANS: 1 });
		expect(board.resources.BRITISH).toBe(50);
	});
});

describe("winter quarters reset", () => {
	test("clears markers, returns casualties and hides Active pieces", () => {
		const board = makeBoard({
			spaces: {
				Massachusetts: { Patriot_Militia_A: 2 },
				Quebec: { Indian_WP_A: 1, Indian_WP_U: 1 },
			},
			available: { British_Regular: 3 },
			casualties: { British_Regular: 2, British_Tory: 1 },
			markers: {
				Propaganda: { pool: 11, on_map: ["Boston"] },
				Raid: { pool: 11, on_map: ["Georgia"] },
			},
		});
		reset(board);
		expect(board.markers.Propaganda.onMap.size).toBe(0);
		expect(board.markers.Propaganda.pool).toBe(12);
		expect(board.markers.Raid.pool).toBe(12);
		expect(board.casualties).toEqual({});
		expect(board.available).toEqual({ British_Regular: 5, British_Tory: 1 });
		expect(board.spaces.Massachusetts).toEqual({ Patriot_Militia_U: 2 });
		expect(board.spaces.Quebec).toEqual({ Indian_WP_U: 2 });
	});
});

describe("winter quarters supply", () => {
	test("British out of supply pay, then lose Support, then go home", () => {
		const board = makeBoard({
			spaces: {
				Boston: { British_Regular: 1 },
				Florida: { British_Regular: 1, British_Fort: 1 },
				Georgia: { British_Regular: 1 },
				South_Carolina: { British_Regular: 1 },
				Virginia: { British_Tory: 2 },
			},
			support: { South_Carolina: -2, Virginia: 1 },
			resources: { ...NO_RESOURCES, BRITISH: 1 },
		});
		supply(board, scriptedRng([0]));
		expect(board.resources.BRITISH).toBe(0);
		expect(board.spaces.Georgia).toEqual({ British_Regular: 1 });
		expect(board.spaces.South_Carolina).toEqual({});
		expect(board.available).toEqual({ British_Regular: 1 });
		expect(board.support.Virginia).toBe(0);
		expect(board.spaces.Virginia).toEqual({ British_Tory: 2 });
	});

	test("unsupplied Patriots lose half their units, Underground Militia first", () => {
		const board = makeBoard({
			spaces: {
				Northwest: { Patriot_Militia_U: 1, Patriot_Militia_A: 2, Patriot_Continental: 1 },
				Pennsylvania: { Patriot_Militia_U: 3, Patriot_Continental: 2 },
				Quebec: { Patriot_Militia_U: 1, Patriot_Fort: 1 },
			},
		});
		supply(board, scriptedRng([0]));
		expect(board.spaces.Northwest).toEqual({ Patriot_Militia_A: 1, Patriot_Continental: 1 });
		expect(board.spaces.Pennsylvania).toEqual({ Patriot_Militia_U: 3, Patriot_Continental: 2 });
		expect(board.spaces.Quebec).toEqual({ Patriot_Militia_U: 1, Patriot_Fort: 1 });
		expect(board.available).toEqual({ Patriot_Militia_U: 2 });
	});

	test("French out of supply march to the nearest Patriot Fort", () => {
		const board = makeBoard({
			spaces: {
				Georgia: { French_Regular: 1, British_Regular: 1, British_Fort: 1 },
				Pennsylvania: { Patriot_Fort: 1 },
				South_Carolina: { Patriot_Fort: 1 },
			},
			toaPlayed: true,
		});
		supply(board, scriptedRng([0]));
		expect(board.spaces.Georgia).toEqual({ British_Regular: 1, British_Fort: 1 });
		expect(board.spaces.South_Carolina).toEqual({ Patriot_Fort: 1, French_Regular: 1 });
		expect(board.spaces.Pennsylvania).toEqual({ Patriot_Fort: 1 });
	});

	test("Indians with no Village get one, and stray War Parties head for it", () => {
		const board = makeBoard({
			spaces: { Virginia: { Indian_WP_A: 1 }, Quebec: { Indian_WP_U: 2 } },
			available: { Indian_Village: 1 },
		});
		supply(board, scriptedRng([0]));
		expect(board.spaces.Florida).toEqual({ Indian_Village: 1, Indian_WP_A: 1 });
		expect(board.spaces.Virginia).toEqual({});
		expect(board.spaces.Quebec).toEqual({ Indian_WP_U: 2 });
	});

	test("West Indies garrisons cost a Resource each", () => {
		const board = makeBoard({
			spaces: { West_Indies: { British_Regular: 2, French_Regular: 1 } },
			resources: { ...NO_RESOURCES, FRENCH: 1 },
		});
		supply(board, scriptedRng([0]));
		expect(board.spaces.West_Indies).toEqual({ French_Regular: 1 });
		expect(board.resources.FRENCH).toBe(0);
		expect(board.available).toEqual({ British_Regular: 2 });
	});
});

describe("winter quarters support phase", () => {
	test("Reward Loyalty buys off a Raid first, Committees push toward Opposition", () => {
		const board = makeBoard({
			spaces: {
				Boston: { British_Regular: 1, British_Tory: 1 },
				Massachusetts: { Patriot_Militia_U: 1 },
			},
			support: { Massachusetts: 1 },
			markers: { Raid: { pool: 11, on_map: ["Boston"] } },
			resources: { BRITISH: 2, PATRIOTS: 5, FRENCH: 0, INDIANS: 0 },
		});
		supportPhase(board);
		expect(board.markers.Raid.pool).toBe(12);
		expect(board.support.Boston).toBe(1);
		expect(board.resources.BRITISH).toBe(0);
		expect(board.support.Massachusetts).toBe(-1);
		expect(board.resources.PATRIOTS).toBe(3);
	});
});

describe("winter quarters redeployment", () => {
	test("the next card's first faction changes leader, then leaders join the largest stack", () => {
		const board = makeBoard({
			spaces: {
				Boston: { British_Regular: 1 },
				New_York: { British_Regular: 3 },
				Massachusetts: { Patriot_Militia_U: 2 },
				Virginia: { Patriot_Militia_U: 1 },
			},
			leaders: { GAGE: "Boston", WASHINGTON: "Massachusetts" },
		});
		changeLeader(board, "PATRIOTS");
		expect(board.leaders.WASHINGTON).toBe("Massachusetts");
		changeLeader(board, "BRITISH");
		expect(board.leaders.GAGE).toBeNull();
		expect(board.leaders.HOWE).toBe("Boston");
		redeployLeaders(board);
		expect(board.leaders.HOWE).toBe("New_York");
		expect(board.leaders.WASHINGTON).toBe("Massachusetts");
		expect(board.leaders.CLINTON).toBeNull();
	});

	test("French leaders wait for the Treaty", () => {
		const board = makeBoard({ leaders: { ROCHAMBEAU: "West_Indies" } });
		changeLeader(board, "FRENCH");
		expect(board.leaders.ROCHAMBEAU).toBe("West_Indies");
	});

	test("British release moves no more Regulars than are Unavailable", () => {
		const board = makeBoard({ unavailable: { British_Regular: 6 } });
		releaseBritish(board, 4);
		releaseBritish(board, 4);
		expect(board.unavailable).toEqual({});
		expect(board.available).toEqual({ British_Regular: 6 });
	});

	test("after the Treaty FNI drops and a Blockade returns to the West Indies", () => {
		const markers = { Blockade: { pool: 0, on_map: ["New_York_City", "Boston"] } };
		const before = makeBoard({ fni: 2, markers });
		driftFni(before);
		expect(before.fni).toBe(2);
		expect(before.markers.Blockade.onMap.size).toBe(2);

		const after = makeBoard({ toaPlayed: true, fni: 2, markers });
		driftFni(after);
		expect(after.fni).toBe(1);
		expect(after.markers.Blockade.pool).toBe(1);
		expect([...after.markers.Blockade.onMap]).toEqual(["New_York_City"]);
	});
});

describe("winter quarters desertion", () => {
	test("one in five deserts, the first from the space with the most Support", () => {
		const board = makeBoard({
			spaces: {
				Massachusetts: { Patriot_Militia_U: 4 },
				Virginia: { Patriot_Militia_U: 3, Patriot_Militia_A: 3, Patriot_Continental: 5 },
				Boston: { British_Tory: 6 },
			},
			support: { Massachusetts: 1 },
		});
		desertion(board);
		expect(board.spaces.Massachusetts).toEqual({ Patriot_Militia_U: 2 });
		expect(board.spaces.Virginia).toEqual({ Patriot_Militia_U: 3, Patriot_Militia_A: 3, Patriot_Continental: 4 });
		expect(board.spaces.Boston).toEqual({ British_Tory: 5 });
	});
});

describe("winter quarters cards", () => {
	test("the casualty race pays whoever trails it", () => {
		const board = makeBoard({ crc: 3, cbc: 1 });
		winterCardEffect(board, 97);
		expect(board.resources.FRENCH).toBe(5);
		expect(board.resources.BRITISH).toBe(0);
	});

	test("the larger casualty count closes half the gap", () => {
		const board = makeBoard({ crc: 7, cbc: 2 });
		winterCardEffect(board, 99);
		expect(board.crc).toBe(5);
		expect(board.cbc).toBe(2);
	});

	test("a faction ahead on its second condition gives up a base", () => {
		const board = makeBoard({ spaces: { Quebec: { Patriot_Fort: 1 }, Northwest: { Indian_Village: 1 } } });
		winterCardEffect(board, 102);
		expect(board.spaces.Quebec).toEqual({});
		expect(board.spaces.Northwest).toEqual({ Indian_Village: 1 });
	});
});

describe("winter quarters round", () => {
	const setup = () =>
		makeBoard({
			casualties: { British_Regular: 1 },
			markers: { Raid: { pool: 11, on_map: ["Georgia"] } },
		});
	const opts = { cardId: 97, rng: scriptedRng([0]), nextFirst: null, release: 0 };

	test("the last round stops after the Support phase", () => {
		const board = setup();
		const report = resolveWinterQuarters(board, { ...opts, finalRound: true });
		expect(report).toEqual({ gained: NO_RESOURCES, final: true });
		expect(board.casualties).toEqual({ British_Regular: 1 });
		expect(board.markers.Raid.onMap.has("Georgia")).toBe(true);
		expect(board.resources.BRITISH).toBe(0);
	});

	test("other rounds reset the board and resolve the card", () => {
		const board = setup();
		const report = resolveWinterQuarters(board, { ...opts, finalRound: false });
		expect(report.final).toBe(false);
		expect(board.casualties).toEqual({});
		expect(board.available).toEqual({ British_Regular: 1 });
		expect(board.markers.Raid.onMap.size).toBe(0);
		expect(board.resources.BRITISH).toBe(5);
	});
});
