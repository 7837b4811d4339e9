import { InvalidTransitionError } from "../../common/errors";

export const ESCROW_STATE = [
	"CREATED",
	"FORM_SUBMITTED",
	"AGREEMENT_PREVIEW",
	"AGREED",
	"FUNDED",
	"DELIVERED",
	"RELEASE_REQUESTED",
	"RELEASE_CONFIRMED",
	"COMPLETED",
	"DISPUTED",
	"CANCELLED",
	// no edge leads here: kept so stored rows from an expiry job stay readable
	"EXPIRED",
] as const;
export type EscrowState = (typeof ESCROW_STATE)[number];

export const INITIAL_ESCROW_STATE: EscrowState = "CREATED";

/**
 * The escrow transition graph. Every state must be listed, so adding a state
 * without deciding its outgoing edges does not compile.
 */
export const ESCROW_TRANSITIONS: Readonly<
	Record<EscrowState, readonly EscrowState[]>
> = Object.freeze({
	CREATED: ["FORM_SUBMITTED", "CANCELLED"],
	FORM_SUBMITTED: ["AGREEMENT_PREVIEW", "CANCELLED"],
	AGREEMENT_PREVIEW: ["AGREED", "CANCELLED"],
	AGREED: ["FUNDED", "CANCELLED"],
	FUNDED: ["DELIVERED", "DISPUTED", "CANCELLED"],
	DELIVERED: ["RELEASE_REQUESTED", "DISPUTED"],
	RELEASE_REQUESTED: ["RELEASE_CONFIRMED", "DISPUTED"],
	RELEASE_CONFIRMED: ["COMPLETED"],
	COMPLETED: [],
	DISPUTED: ["RELEASE_CONFIRMED", "CANCELLED"],
	CANCELLED: [],
	EXPIRED: [],
} satisfies Record<EscrowState, readonly EscrowState[]>);

export function isEscrowState(value: string): value is EscrowState {
	return ESCROW_STATE.some((state) => state === value);
}

export function canTransition(from: EscrowState, to: EscrowState): boolean {
	return ESCROW_TRANSITIONS[from].includes(to);
}

/**
 * @throws InvalidTransitionError when `to` is not reachable from `from` in one step
 */
export function assertTransition(from: EscrowState, to: EscrowState): void {
	if (!canTransition(from, to)) {
		throw new InvalidTransitionError(from, to);
	}
}

export function isTerminalState(state: EscrowState): boolean {
	return ESCROW_TRANSITIONS[state].length === 0;
}
