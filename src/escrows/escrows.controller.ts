import {
	BadRequestException,
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForListDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import { EscrowsService } from "./escrows.service";
import { CreateEscrowInDto, CreateEscrowOutDto } from "./dto/create-escrow.dto";
import { GetEscrowDto, GetEscrowLogDto } from "./dto/get-escrow.dto";
import {
	ActionCallbackInDto,
	ActionOutcomeDto,
	PerformActionInDto,
} from "./dto/perform-action.dto";
import { ActionOfferDto } from "./dto/action-offer.dto";
import { decodeActionCallback } from "./actions/action-callback.codec";

@ApiTags("1 - Escrows")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	CreateEscrowOutDto,
	GetEscrowDto,
	GetEscrowLogDto,
	ActionOutcomeDto,
	ActionOfferDto,
)
@Controller("api/v1/escrows")
export class EscrowsController {
	constructor(
		private readonly escrowsService: EscrowsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@ApiOperation({
		summary: "Submit an escrow form and send the agreement preview",
	})
	@ApiBody({ type: CreateEscrowInDto })
	@ApiCreatedResponse({
		description: "Escrow created, agreement buttons issued",
		schema: getSchemaPathForDto(CreateEscrowOutDto),
	})
	@ApiBadRequestResponse({ description: "Invalid form" })
	async create(
		@Body() dto: CreateEscrowInDto,
	): Promise<ApiEnvelope<CreateEscrowOutDto>> {
		const data = await this.escrowsService.create(dto);
		return envelope(data);
	}

	// declared before ":code" so that "sse" is not taken for a code
	@Sse("sse")
	@ApiQuery({ name: "code", required: false })
	@ApiOperation({ summary: "Escrow updates as server-sent events" })
	sse(@Query("code") code?: string): Observable<SseEvent> {
		return this.sseService
			.escrowEvents(code)
			.pipe(map((event) => ({ data: event })));
	}

	@Post("callbacks")
	@HttpCode(HttpStatus.OK)
	@ApiOperation({
		summary: "Perform an action from a chat button payload (action|code|token)",
	})
	@ApiBody({ type: ActionCallbackInDto })
	@ApiOkResponse({
		description: "Outcome of the action",
		schema: getSchemaPathForDto(ActionOutcomeDto),
	})
	@ApiBadRequestResponse({ description: "Malformed callback data" })
	@ApiForbiddenResponse({ description: "Token or role denied" })
	@ApiConflictResponse({ description: "Action not available in current state" })
	async callback(
		@Body() dto: ActionCallbackInDto,
	): Promise<ApiEnvelope<ActionOutcomeDto>> {
		const { action, escrowCode, token } = decodeActionCallback(dto.data);
		const data = await this.escrowsService.perform({
			action,
			escrowCode,
			token,
			requestingParty: dto.requestingParty,
		});
		return envelope(data);
	}

	@Get(":code")
	@ApiParam({ name: "code", example: "PW-100000" })
	@ApiOkResponse({
		description: "One escrow",
		schema: getSchemaPathForDto(GetEscrowDto),
	})
	@ApiNotFoundResponse({ description: "Escrow not found" })
	@ApiOperation({ summary: "Get an escrow by its public code" })
	async getOne(@Param("code") code: string): Promise<ApiEnvelope<GetEscrowDto>> {
		const data = await this.escrowsService.getByCode(code);
		return envelope(data);
	}

	@Get(":code/logs")
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1–100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiOkResponse({
		description: "A page of the escrow's action log, newest first",
		schema: getSchemaPathForPaginatedDto(GetEscrowLogDto),
	})
	@ApiNotFoundResponse({ description: "Escrow not found" })
	@ApiOperation({ summary: "Audit trail of an escrow" })
	async getLogs(
		@Param("code") code: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetEscrowLogDto[]>> {
		const { items, total, nextCursor } = await this.escrowsService.getLogs(
			code,
			limit,
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Get(":code/offers")
	@ApiQuery({ name: "party", required: true })
	@ApiOkResponse({
		description: "Buttons still open to the party",
		schema: getSchemaPathForListDto(ActionOfferDto),
	})
	@ApiOperation({ summary: "Unspent action tokens of one participant" })
	async liveOffers(
		@Param("code") code: string,
		@Query("party") party?: string,
	): Promise<ApiEnvelope<ActionOfferDto[]>> {
		if (!party) throw new BadRequestException("party is required");
		const data = await this.escrowsService.liveOffers(code, party);
		return envelope(data);
	}

	@Post(":code/actions")
	@HttpCode(HttpStatus.OK)
	@ApiBody({ type: PerformActionInDto })
	@ApiOkResponse({
		description: "Outcome of the action",
		schema: getSchemaPathForDto(ActionOutcomeDto),
	})
	@ApiNotFoundResponse({ description: "Escrow not found" })
	@ApiForbiddenResponse({ description: "Token or role denied" })
	@ApiConflictResponse({ description: "Action not available in current state" })
	@ApiOperation({ summary: "Perform a tokenized action on an escrow" })
	async perform(
		@Param("code") code: string,
		@Body() dto: PerformActionInDto,
	): Promise<ApiEnvelope<ActionOutcomeDto>> {
		const data = await this.escrowsService.perform({
			action: dto.action,
			escrowCode: code,
			token: dto.token,
			requestingParty: dto.requestingParty,
		});
		return envelope(data);
	}
}
