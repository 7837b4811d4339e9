import type { PartyRole } from "../../common/errors";
import type { EscrowState } from "../state/escrow-state";

type ActionBase = {
	label: string;
	/** Who may perform it; more than one role means either party */
	roles: readonly PartyRole[];
};

/** Moves the escrow along one edge of the state graph. */
export type TransitionAction = ActionBase & {
	kind: "transition";
	to: EscrowState;
};

/** One party's contribution to a condition every `requiredRoles` must meet. */
export type JointAction = ActionBase & {
	kind: "joint";
	acknowledgement: string;
	requiredRoles: readonly PartyRole[];
	to: EscrowState;
};

/** Recorded in the log only; valid while the escrow sits in `availableIn`. */
export type NoticeAction = ActionBase & {
	kind: "notice";
	logAs: string;
	availableIn: readonly EscrowState[];
};

export type EscrowActionDefinition = TransitionAction | JointAction | NoticeAction;

export const ESCROW_ACTION = [
	"agree_buyer",
	"agree_seller",
	"disagree",
	"paid_notify",
	"mark_delivered",
	"request_release",
	"confirm_release",
	"open_dispute",
] as const;
export type EscrowAction = (typeof ESCROW_ACTION)[number];

export const ESCROW_ACTIONS: Readonly<
	Record<EscrowAction, EscrowActionDefinition>
> = Object.freeze({
	agree_buyer: {
		kind: "joint",
		label: "✅ Agree (Buyer)",
		roles: ["buyer"],
		acknowledgement: "agreed",
		requiredRoles: ["buyer", "seller"],
		to: "AGREED",
	},
	agree_seller: {
		kind: "joint",
		label: "✅ Agree (Seller)",
		roles: ["seller"],
		acknowledgement: "agreed",
		requiredRoles: ["buyer", "seller"],
		to: "AGREED",
	},
	disagree: {
		kind: "transition",
		label: "❌ Disagree",
		roles: ["buyer", "seller"],
		to: "CANCELLED",
	},
	paid_notify: {
		kind: "notice",
		label: "I've Paid - Notify",
		roles: ["buyer"],
		logAs: "payment_notified",
		availableIn: ["AGREED"],
	},
	mark_delivered: {
		kind: "transition",
		label: "📦 Mark Delivered",
		roles: ["seller"],
		to: "DELIVERED",
	},
	request_release: {
		kind: "transition",
		label: "💸 Request Release",
		roles: ["seller"],
		to: "RELEASE_REQUESTED",
	},
	confirm_release: {
		kind: "transition",
		label: "✅ Yes, Release",
		roles: ["buyer"],
		to: "RELEASE_CONFIRMED",
	},
	open_dispute: {
		kind: "transition",
		label: "⚠️ Open Dispute",
		roles: ["buyer", "seller"],
		to: "DISPUTED",
	},
});

export function isEscrowAction(value: string): value is EscrowAction {
	return ESCROW_ACTION.some((action) => action === value);
}

const ROLE_NAMES: Readonly<Record<PartyRole, string>> = {
	buyer: "Buyer",
	seller: "Seller",
};

/**
 * Button text for one party's token. Actions open to both parties name the
 * holder, since a group chat shows both buttons side by side.
 */
export function offerLabel(action: EscrowAction, role: PartyRole): string {
	const definition = ESCROW_ACTIONS[action];
	return definition.roles.length > 1
		? `${definition.label} (${ROLE_NAMES[role]})`
		: definition.label;
}

export type ActionGrant = { action: EscrowAction; role: PartyRole };

/**
 * Tokens handed out when an escrow enters a state, one per choice that state
 * offers to each party.
 */
export const ACTION_GRANTS: Readonly<Partial<Record<EscrowState, readonly ActionGrant[]>>> =
	Object.freeze({
		AGREEMENT_PREVIEW: [
			{ action: "agree_buyer", role: "buyer" },
			{ action: "agree_seller", role: "seller" },
			{ action: "disagree", role: "buyer" },
			{ action: "disagree", role: "seller" },
		],
		AGREED: [{ action: "paid_notify", role: "buyer" }],
		FUNDED: [
			{ action: "mark_delivered", role: "seller" },
			{ action: "open_dispute", role: "buyer" },
			{ action: "open_dispute", role: "seller" },
		],
		DELIVERED: [
			{ action: "request_release", role: "seller" },
			{ action: "open_dispute", role: "buyer" },
			{ action: "open_dispute", role: "seller" },
		],
		RELEASE_REQUESTED: [
			{ action: "confirm_release", role: "buyer" },
			{ action: "open_dispute", role: "buyer" },
			{ action: "open_dispute", role: "seller" },
		],
	});
