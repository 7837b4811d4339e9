import {
	Body,
	Controller,
	HttpCode,
	HttpStatus,
	Param,
	Post,
	Sse,
} from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiConflictResponse,
	ApiExtraModels,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { EscrowsService } from "../escrows/escrows.service";
import { GetEscrowDto } from "../escrows/dto/get-escrow.dto";
import {
	OperatorActionInDto,
	ResolveDisputeInDto,
} from "../escrows/dto/operator-action.dto";
import {
	EscrowNotificationsService,
	OutboundMessage,
} from "../notifications/escrow-notifications.service";
import type { SseEvent } from "../common/server-sent-events.service";

@ApiTags("Admin")
@ApiBasicAuth()
@ApiExtraModels(ApiEnvelopeShellDto, GetEscrowDto)
@Controller("api/admin/v1")
export class AdminController {
	constructor(
		private readonly escrowsService: EscrowsService,
		private readonly notifications: EscrowNotificationsService,
	) {}

	@Post("escrows/:code/confirm-funding")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Payment received out of band: AGREED -> FUNDED" })
	@ApiParam({ name: "code", example: "PW-100000" })
	@ApiBody({ type: OperatorActionInDto })
	@ApiOkResponse({
		description: "The funded escrow",
		schema: getSchemaPathForDto(GetEscrowDto),
	})
	@ApiNotFoundResponse({ description: "Escrow not found" })
	@ApiConflictResponse({ description: "Escrow is not awaiting payment" })
	async confirmFunding(
		@Param("code") code: string,
		@Body() dto: OperatorActionInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const data = await this.escrowsService.confirmFunding(
			code,
			dto.operatorId,
			dto.note,
		);
		return envelope(data);
	}

	@Post("escrows/:code/settle")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Payout made: RELEASE_CONFIRMED -> COMPLETED" })
	@ApiParam({ name: "code", example: "PW-100000" })
	@ApiBody({ type: OperatorActionInDto })
	@ApiOkResponse({
		description: "The completed escrow",
		schema: getSchemaPathForDto(GetEscrowDto),
	})
	@ApiNotFoundResponse({ description: "Escrow not found" })
	@ApiConflictResponse({ description: "Release not confirmed yet" })
	async settle(
		@Param("code") code: string,
		@Body() dto: OperatorActionInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const data = await this.escrowsService.settle(code, dto.operatorId, dto.note);
		return envelope(data);
	}

	@Post("escrows/:code/resolve")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Decide a dispute: release to seller or cancel" })
	@ApiParam({ name: "code", example: "PW-100000" })
	@ApiBody({ type: ResolveDisputeInDto })
	@ApiOkResponse({
		description: "The escrow after the verdict",
		schema: getSchemaPathForDto(GetEscrowDto),
	})
	@ApiNotFoundResponse({ description: "Escrow not found" })
	@ApiConflictResponse({ description: "Escrow is not disputed" })
	async resolve(
		@Param("code") code: string,
		@Body() dto: ResolveDisputeInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const data = await this.escrowsService.resolveDispute(
			code,
			dto.verdict,
			dto.operatorId,
			dto.note,
		);
		return envelope(data);
	}

	@Post("escrows/:code/cancel")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: "Cancel an escrow where its state allows it" })
	@ApiParam({ name: "code", example: "PW-100000" })
	@ApiBody({ type: OperatorActionInDto })
	@ApiOkResponse({
		description: "The cancelled escrow",
		schema: getSchemaPathForDto(GetEscrowDto),
	})
	@ApiNotFoundResponse({ description: "Escrow not found" })
	@ApiConflictResponse({ description: "Escrow can no longer be cancelled" })
	async cancel(
		@Param("code") code: string,
		@Body() dto: OperatorActionInDto,
	): Promise<ApiEnvelope<GetEscrowDto>> {
		const data = await this.escrowsService.cancel(code, dto.operatorId, dto.note);
		return envelope(data);
	}

	/** Chat messages for the transport; carries action tokens. */
	@Sse("outbox/sse")
	outbox(): Observable<SseEvent<OutboundMessage>> {
		return this.notifications.outbox.pipe(map((message) => ({ data: message })));
	}
}
