import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { isEscrowError, toError } from "../errors";

export type ErrorBody = {
	statusCode: number;
	error: string;
	message: string | string[];
	reason?: string;
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();
		const body = this.toBody(exception);
		res.status(body.statusCode).json(body);
	}

	toBody(exception: unknown): ErrorBody {
		if (isEscrowError(exception)) {
			return {
				statusCode: exception.getStatus(),
				error: exception.code,
				message: exception.userMessage,
				...(exception.reason ? { reason: exception.reason } : {}),
			};
		}
		if (exception instanceof HttpException) {
			const response = exception.getResponse();
			const message =
				typeof response === "object" &&
				response !== null &&
				"message" in response &&
				(typeof response.message === "string" ||
					Array.isArray(response.message))
					? response.message
					: exception.message;
			return {
				statusCode: exception.getStatus(),
				error: exception.name,
				message,
			};
		}
		const err = toError(exception);
		this.logger.error(`Unhandled error: ${err.message}`, err.stack);
		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			error: "internal_error",
			message: "Internal server error",
		};
	}
}
