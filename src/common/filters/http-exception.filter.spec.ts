import { BadRequestException } from "@nestjs/common";
import { HttpExceptionFilter } from "./http-exception.filter";
import {
	ActionTokenDeniedError,
	EscrowNotFoundError,
	InvalidTransitionError,
	StorageFailureError,
	UnauthorizedActionError,
} from "../errors";

describe("HttpExceptionFilter", () => {
	const filter = new HttpExceptionFilter();

	it("renders token denials with their reason", () => {
		expect(filter.toBody(new ActionTokenDeniedError("already_used"))).toEqual({
			statusCode: 403,
			error: "token_denied",
			message: "Action denied: already used.",
			reason: "already_used",
		});
	});

	it("renders role denials with the allowed role", () => {
		expect(filter.toBody(new UnauthorizedActionError(["buyer"]))).toEqual({
			statusCode: 403,
			error: "unauthorized",
			message: "Not authorized for this escrow (buyer only).",
		});
	});

	it("renders illegal transitions as conflicts", () => {
		expect(
			filter.toBody(new InvalidTransitionError("CANCELLED", "AGREED")),
		).toEqual({
			statusCode: 409,
			error: "invalid_transition",
			message: "This action is no longer available.",
		});
	});

	it("renders unknown escrows as not found", () => {
		expect(filter.toBody(new EscrowNotFoundError("PW-999"))).toEqual({
			statusCode: 404,
			error: "not_found",
			message: "Escrow PW-999 not found.",
		});
	});

	it("keeps the cause of storage failures out of the body", () => {
		const body = filter.toBody(
			new StorageFailureError(new Error("SQLITE_BUSY: database is locked")),
		);
		expect(body).toEqual({
			statusCode: 503,
			error: "storage_failure",
			message: "Something went wrong, please try again.",
		});
	});

	it("passes validation messages through", () => {
		const body = filter.toBody(
			new BadRequestException(["amount must be a positive number"]),
		);
		expect(body.statusCode).toBe(400);
		expect(body.message).toEqual(["amount must be a positive number"]);
	});

	it("hides unexpected errors behind a 500", () => {
		expect(filter.toBody(new TypeError("boom"))).toEqual({
			statusCode: 500,
			error: "internal_error",
			message: "Internal server error",
		});
	});
});
