/**
 * Thrown by the ledger when a write would leave the board in a state the rules
 * cannot represent. Callers check legality first, so reaching this is a bug.
 */
export class InvariantViolation extends Error {
	readonly operation: string;
	readonly location: string;

	constructor(operation: string, location: string, detail: string) {
		super(`${operation} at ${location}: ${detail}`);
		this.name = "InvariantViolation";
		this.operation = operation;
		this.location = location;
	}
}
