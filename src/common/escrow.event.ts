import type { EscrowState } from "../escrows/state/escrow-state";
import type { ActionTokenDenialReason, EscrowErrorCode, PartyRole } from "./errors";

export type EscrowCode = string;

/** A token handed to one party, rendered as a button by the transport. */
export type ActionOffer = {
	action: string;
	label: string;
	role: PartyRole;
	partyId: string;
	token: string;
	expiresAt: number; // epoch ms
};

export const ESCROW_CREATED_ID = "escrow.created";
export type EscrowCreated = {
	eventId: string;
	code: EscrowCode;
	chatId?: string | null;
	buyerId: string;
	sellerId: string;
	createdAt: string; // ISO timestamp
};

/** What a listener needs to render the deal without reading storage. */
export type EscrowSnapshot = {
	buyerId: string;
	sellerId: string;
	title: string;
	description: string;
	refundConditions?: string | null;
	deliveryDeadline?: string; // ISO timestamp
};

export const ESCROW_STATE_CHANGED_ID = "escrow.state-changed";
export type EscrowStateChanged = {
	eventId: string;
	code: EscrowCode;
	chatId?: string | null;
	escrow: EscrowSnapshot;
	from: EscrowState;
	to: EscrowState;
	actorId: string;
	action: string;
	amountMinor: number;
	feeMinor: number;
	offers: ActionOffer[];
	changedAt: string;
};

/** Feedback only, never persisted. */
export const ESCROW_ACTION_DENIED_ID = "escrow.action-denied";
export type EscrowActionDenied = {
	eventId: string;
	code: EscrowCode;
	action: string;
	requestingParty: string;
	error: EscrowErrorCode;
	reason?: ActionTokenDenialReason;
	message: string;
	deniedAt: string;
};

export const ESCROW_JOINT_PENDING_ID = "escrow.joint-pending";
export type EscrowJointConditionPending = {
	eventId: string;
	code: EscrowCode;
	chatId?: string | null;
	acknowledgement: string;
	actorId: string;
	waitingOn: PartyRole[];
	recordedAt: string;
};

export const ESCROW_NOTICE_ID = "escrow.notice";
export type EscrowNotice = {
	eventId: string;
	code: EscrowCode;
	chatId?: string | null;
	notice: string;
	actorId: string;
	amountMinor: number;
	recordedAt: string;
};
