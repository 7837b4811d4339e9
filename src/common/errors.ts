import {
	BadRequestException,
	ConflictException,
	ForbiddenException,
	HttpException,
	NotFoundException,
	ServiceUnavailableException,
} from "@nestjs/common";
import type { EscrowState } from "../escrows/state/escrow-state";

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

export const ACTION_TOKEN_DENIAL = [
	"invalid_token",
	"already_used",
	"wrong_user",
	"expired",
] as const;
export type ActionTokenDenialReason = (typeof ACTION_TOKEN_DENIAL)[number];

export type EscrowErrorCode =
	| "invalid_transition"
	| "token_denied"
	| "unauthorized"
	| "not_found"
	| "storage_failure"
	| "malformed_callback";

/**
 * Shared by every escrow error: `code` is for machines, `userMessage` is safe
 * to show to a chat participant.
 */
export interface EscrowErrorDetails {
	readonly code: EscrowErrorCode;
	readonly userMessage: string;
	readonly reason?: ActionTokenDenialReason;
}

export function isEscrowError(
	err: unknown,
): err is HttpException & EscrowErrorDetails {
	return (
		err instanceof HttpException &&
		"code" in err &&
		"userMessage" in err &&
		typeof err.userMessage === "string"
	);
}

/** A user-facing refusal; reported to the requester, never retried. */
export type EscrowDenial =
	| InvalidTransitionError
	| ActionTokenDeniedError
	| UnauthorizedActionError
	| EscrowNotFoundError;

export function isEscrowDenial(err: unknown): err is EscrowDenial {
	return (
		err instanceof InvalidTransitionError ||
		err instanceof ActionTokenDeniedError ||
		err instanceof UnauthorizedActionError ||
		err instanceof EscrowNotFoundError
	);
}

export class InvalidTransitionError
	extends ConflictException
	implements EscrowErrorDetails
{
	readonly code = "invalid_transition";
	readonly userMessage = "This action is no longer available.";

	/** @param attempted target state, or the action name for log-only actions */
	constructor(
		readonly from: EscrowState,
		readonly attempted: string,
	) {
		super(`${from} -> ${attempted} is not allowed`);
	}
}

const TOKEN_DENIAL_MESSAGES: Record<ActionTokenDenialReason, string> = {
	invalid_token: "Action denied: this button is not valid.",
	already_used: "Action denied: already used.",
	wrong_user: "Action denied: this button belongs to another participant.",
	expired: "Action denied: this button has expired.",
};

export class ActionTokenDeniedError
	extends ForbiddenException
	implements EscrowErrorDetails
{
	readonly code = "token_denied";
	readonly userMessage: string;

	constructor(readonly reason: ActionTokenDenialReason) {
		super(`Action token denied: ${reason}`);
		this.userMessage = TOKEN_DENIAL_MESSAGES[reason];
	}
}

export type PartyRole = "buyer" | "seller";

export class UnauthorizedActionError
	extends ForbiddenException
	implements EscrowErrorDetails
{
	readonly code = "unauthorized";
	readonly userMessage: string;

	constructor(readonly allowed: readonly PartyRole[]) {
		const who = allowed.length === 1 ? `${allowed[0]} only` : "buyer or seller only";
		super(`Requesting party is not allowed: ${who}`);
		this.userMessage = `Not authorized for this escrow (${who}).`;
	}
}

export class EscrowNotFoundError
	extends NotFoundException
	implements EscrowErrorDetails
{
	readonly code = "not_found";
	readonly userMessage: string;

	constructor(readonly escrowCode: string) {
		super(`Escrow ${escrowCode} not found`);
		this.userMessage = `Escrow ${escrowCode} not found.`;
	}
}

export class StorageFailureError
	extends ServiceUnavailableException
	implements EscrowErrorDetails
{
	readonly code = "storage_failure";
	readonly userMessage = "Something went wrong, please try again.";

	constructor(cause: Error) {
		super("Storage failure", { cause });
	}
}

export class MalformedCallbackError
	extends BadRequestException
	implements EscrowErrorDetails
{
	readonly code = "malformed_callback";
	readonly userMessage = "Malformed action.";

	constructor(detail: string) {
		super(`Malformed callback data: ${detail}`);
	}
}
