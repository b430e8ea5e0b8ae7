import type {
	ActionContext,
	Board,
	CommandName,
	Faction,
	HistoryEntry,
	SpaceId,
	SpecialActivityName,
} from "@liberty/engine";
import type { Card } from "./cards";

export type TurnAction = "pass" | "event" | "command";

/** What the faction in one half-card slot may do. */
export type SlotOptions = {
	actions: readonly TurnAction[];
	/** The Command must touch exactly one space. */
	limitedOnly: boolean;
	specialAllowed: boolean;
	eventAllowed: boolean;
};

/** Everything a decider sees for one half-card. The board is a scratch copy. */
export type TurnInput = {
	board: Board;
	faction: Faction;
	card: Card;
	slot: SlotOptions;
	ctx: ActionContext;
};

export type TurnDecision =
	| { action: "pass"; reason: string }
	| { action: "event"; shaded: boolean; reason: string }
	| {
			action: "command";
			/** Null for a turn spent on a Special Activity alone. */
			command: CommandName | null;
			special: SpecialActivityName | null;
	  };

export type FactionBot = {
	faction: Faction;
	name: string;
	takeTurn: (input: TurnInput) => TurnDecision;
};

/** External collaborator for factions with a human player. */
export type HumanDecider = (input: TurnInput) => TurnDecision;

export type TurnRecord = {
	faction: Faction;
	cardId: number;
	action: TurnAction;
	command?: CommandName;
	special?: SpecialActivityName;
	spaces: SpaceId[];
	deltas: HistoryEntry[];
	/** Why a decision was turned into a Pass. */
	rejected?: string;
};

export type GameEndReason = "victory" | "deck" | "maxCards";

export type GameResult = {
	seed: number;
	cardsPlayed: number;
	reason: GameEndReason;
	winners: Faction[];
	/** Sum of both victory margins per faction, with the leader named. */
	finalScore: { totals: Record<Faction, number>; winner: Faction };
	resources: Record<Faction, number>;
	turns: TurnRecord[];
};
