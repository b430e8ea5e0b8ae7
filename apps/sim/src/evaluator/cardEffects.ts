import { z } from "zod";
import cardEffectsData from "../../data/card_effects.json";

export const CARD_FLAGS = [
	"shiftsSupportRoyalist",
	"shiftsSupportRebel",
	"placesBritishPieces",
	"placesPatriotMilitiaU",
	"placesPatriotFort",
	"placesFrenchFromUnavailable",
	"placesFrenchOnMap",
	"placesVillage",
	"removesPatriotFort",
	"removesVillage",
	"addsBritishResources3plus",
	"addsPatriotResources3plus",
	"addsFrenchResources",
	"inflictsBritishCasualties",
	"grantsFreeGather",
	"isEffective",
] as const;

export type CardFlag = (typeof CARD_FLAGS)[number];

const SideFlagsSchema = z.array(z.enum(CARD_FLAGS)).default([]);

export const CardEffectsSchema = z.record(
	z.string().regex(/^\d+$/),
	z.object({ unshaded: SideFlagsSchema, shaded: SideFlagsSchema }),
);

const CARD_EFFECTS = CardEffectsSchema.parse(cardEffectsData);

/** Flags for one side of a card; unknown cards have none, so they read as ineffective. */
export function cardFlags(cardId: number, shaded: boolean): ReadonlySet<CardFlag> {
	const entry = CARD_EFFECTS[String(cardId)];
	return new Set(entry ? (shaded ? entry.shaded : entry.unshaded) : []);
}
