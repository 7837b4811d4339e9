import {
	BadRequestException,
	Inject,
	Injectable,
	Logger,
} from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { EntityManager, QueryFailedError } from "typeorm";
import { nanoid } from "nanoid";

import { Escrow } from "./escrow.entity";
import {
	assertTransition,
	EscrowState,
	INITIAL_ESCROW_STATE,
} from "./state/escrow-state";
import {
	ACTION_GRANTS,
	ESCROW_ACTIONS,
	EscrowActionDefinition,
	isEscrowAction,
	offerLabel,
} from "./actions/escrow-actions";
import { ActionTokensService } from "./tokens/action-tokens.service";
import { EscrowLogsService } from "./logs/escrow-logs.service";
import {
	AgreementReconciler,
	partyOf,
} from "./agreement/agreement-reconciler.service";
import {
	DeferredEvents,
	rowLock,
	UnitOfWork,
} from "../common/unit-of-work.service";
import {
	ActionTokenDeniedError,
	EscrowNotFoundError,
	InvalidTransitionError,
	isEscrowDenial,
	StorageFailureError,
	UnauthorizedActionError,
} from "../common/errors";
import {
	ActionOffer,
	ESCROW_ACTION_DENIED_ID,
	ESCROW_CREATED_ID,
	ESCROW_JOINT_PENDING_ID,
	ESCROW_NOTICE_ID,
	ESCROW_STATE_CHANGED_ID,
	EscrowActionDenied,
	EscrowCreated,
	EscrowJointConditionPending,
	EscrowNotice,
	EscrowStateChanged,
} from "../common/escrow.event";
import { ESCROW_CONFIG, EscrowConfig } from "../config/escrow.config";
import { Cursor, emptyCursor } from "../common/dto/envelopes";
import { CreateEscrowOutDto } from "./dto/create-escrow.dto";
import { GetEscrowDto, GetEscrowLogDto } from "./dto/get-escrow.dto";
import { ActionOutcomeDto } from "./dto/perform-action.dto";
import { DisputeVerdict } from "./dto/operator-action.dto";

export type CreateEscrowInput = {
	buyerId: string;
	sellerId: string;
	createdBy: string;
	chatId?: string;
	title: string;
	description: string;
	/** Major units, at most two decimals */
	amount: number;
	deliveryHours?: number;
	refundConditions?: string;
	disputeAgreement: boolean;
};

/** What the chat transport hands over once it has parsed a button press. */
export type ActionRequest = {
	action: string;
	escrowCode: string;
	token: string;
	requestingParty: string;
};

type TransitionStep = {
	manager: EntityManager;
	events: DeferredEvents;
	escrow: Escrow;
	to: EscrowState;
	actorId: string;
	action: string;
	now: Date;
	payload?: Record<string, unknown>;
};

type OperatorStep = {
	code: string;
	to: EscrowState;
	operatorId: string;
	action: string;
	note?: string;
	now: Date;
	/** Source state the operator action is reserved for */
	requiredFrom?: EscrowState;
};

type NewEscrowFields = Omit<CreateEscrowInput, "amount" | "deliveryHours"> & {
	amountMinor: number;
	feeMinor: number;
	deliveryDeadline: Date;
};

const NEW_ESCROW_LANE = "escrow:new";
const laneFor = (code: string) => `escrow:${code}`;

/** Codes come from a row count; another process may take the same one first. */
const CODE_ATTEMPTS = 3;

function isUniqueViolation(err: unknown): boolean {
	if (!(err instanceof QueryFailedError)) return false;
	const driverError: unknown = err.driverError;
	if (
		typeof driverError !== "object" ||
		driverError === null ||
		!("code" in driverError)
	) {
		return false;
	}
	// postgres, better-sqlite3, mysql
	return ["23505", "SQLITE_CONSTRAINT_UNIQUE", "ER_DUP_ENTRY"].includes(
		String(driverError.code),
	);
}

export function computeFeeMinor(amountMinor: number, feePercent: number): number {
	return Math.round((amountMinor * feePercent) / 100);
}

/**
 * Owns every write to an escrow's state. Each request runs as a single unit of
 * work: token spending, role checks, log entries and the transition commit or
 * roll back together, and domain events leave only after the commit.
 */
@Injectable()
export class EscrowsService {
	private readonly logger = new Logger(EscrowsService.name);

	constructor(
		@Inject(ESCROW_CONFIG)
		private readonly config: EscrowConfig,
		private readonly unitOfWork: UnitOfWork,
		private readonly tokens: ActionTokensService,
		private readonly logs: EscrowLogsService,
		private readonly reconciler: AgreementReconciler,
		private readonly events: EventEmitter2,
	) {}

	/** Form submission followed by the agreement preview. */
	async create(
		input: CreateEscrowInput,
		now: Date = new Date(),
	): Promise<CreateEscrowOutDto> {
		const submitted = await this.submitForm(input, now);
		const offers = await this.presentAgreement(
			submitted.code,
			input.createdBy,
			now,
		);
		return { escrow: await this.getByCode(submitted.code), offers };
	}

	async submitForm(
		input: CreateEscrowInput,
		now: Date = new Date(),
	): Promise<Escrow> {
		if (input.buyerId === input.sellerId) {
			throw new BadRequestException(
				"Buyer and seller must be different participants",
			);
		}
		const amountMinor = Math.round(input.amount * 100);
		if (!Number.isSafeInteger(amountMinor) || amountMinor <= 0) {
			throw new BadRequestException("Amount must be a positive number");
		}
		const deliveryHours = input.deliveryHours ?? this.config.deliveryWindowHours;
		const fields: NewEscrowFields = {
			...input,
			amountMinor,
			feeMinor: computeFeeMinor(amountMinor, this.config.feePercent),
			deliveryDeadline: new Date(now.getTime() + deliveryHours * 3_600_000),
		};

		for (let attempt = 0; ; attempt++) {
			try {
				const escrow = await this.unitOfWork.run(
					NEW_ESCROW_LANE,
					(manager, events) =>
						this.insertSubmitted(manager, events, fields, attempt, now),
				);
				this.logger.log(`Escrow ${escrow.code} submitted by ${input.createdBy}`);
				return escrow;
			} catch (e) {
				const codeTaken =
					e instanceof StorageFailureError && isUniqueViolation(e.cause);
				if (!codeTaken || attempt + 1 >= CODE_ATTEMPTS) throw e;
				this.logger.warn(`Escrow code taken, retrying (attempt ${attempt + 2})`);
			}
		}
	}

	private async insertSubmitted(
		manager: EntityManager,
		events: DeferredEvents,
		fields: NewEscrowFields,
		attempt: number,
		now: Date,
	): Promise<Escrow> {
		const existing = await manager.count(Escrow);
		const created = await manager.save(
			manager.create(Escrow, {
				code: `${this.config.codePrefix}-${this.config.codeBase + existing + attempt}`,
				chatId: fields.chatId ?? null,
				buyerId: fields.buyerId,
				sellerId: fields.sellerId,
				createdBy: fields.createdBy,
				title: fields.title,
				description: fields.description,
				amountMinor: fields.amountMinor,
				feeMinor: fields.feeMinor,
				refundConditions: fields.refundConditions ?? null,
				disputeAgreement: fields.disputeAgreement,
				state: INITIAL_ESCROW_STATE,
				deliveryDeadline: fields.deliveryDeadline,
			}),
		);
		events.defer(ESCROW_CREATED_ID, {
			eventId: nanoid(4),
			code: created.code,
			chatId: created.chatId,
			buyerId: created.buyerId,
			sellerId: created.sellerId,
			createdAt: now.toISOString(),
		} satisfies EscrowCreated);

		await this.transition({
			manager,
			events,
			escrow: created,
			to: "FORM_SUBMITTED",
			actorId: fields.createdBy,
			action: "submit_form",
			now,
		});
		await this.logs.append(
			{
				escrowId: created.id,
				chatId: created.chatId,
				actorId: fields.createdBy,
				action: "form_submitted",
				payload: {
					buyerId: fields.buyerId,
					sellerId: fields.sellerId,
					amountMinor: fields.amountMinor,
					feeMinor: fields.feeMinor,
					title: fields.title,
				},
			},
			manager,
		);
		return created;
	}

	/** Moves a submitted escrow into preview and issues the agreement tokens. */
	async presentAgreement(
		code: string,
		actorId: string,
		now: Date = new Date(),
	): Promise<ActionOffer[]> {
		return this.unitOfWork.run(laneFor(code), async (manager, events) => {
			const escrow = await this.lockByCode(manager, code);
			const offers = await this.transition({
				manager,
				events,
				escrow,
				to: "AGREEMENT_PREVIEW",
				actorId,
				action: "present_agreement",
				now,
			});
			await this.logs.append(
				{
					escrowId: escrow.id,
					chatId: escrow.chatId,
					actorId,
					action: "agreement_preview_sent",
					payload: { offers: offers.length },
				},
				manager,
			);
			return offers;
		});
	}

	/**
	 * Handles one button press. Denials (unknown escrow, token, role, state)
	 * leave no trace in storage and are announced as `escrow.action-denied`.
	 */
	async perform(
		request: ActionRequest,
		now: Date = new Date(),
	): Promise<ActionOutcomeDto> {
		try {
			const outcome = await this.unitOfWork.run(
				laneFor(request.escrowCode),
				(manager, events) => this.performInUnit(request, manager, events, now),
			);
			this.logger.log(
				`Escrow ${outcome.code}: ${request.action} by ${request.requestingParty} -> ${outcome.result} (${outcome.state})`,
			);
			return outcome;
		} catch (e) {
			if (isEscrowDenial(e)) {
				this.logger.warn(
					`Escrow ${request.escrowCode}: ${request.action} denied, ${e.message}`,
				);
				this.events.emit(ESCROW_ACTION_DENIED_ID, {
					eventId: nanoid(4),
					code: request.escrowCode,
					action: request.action,
					requestingParty: request.requestingParty,
					error: e.code,
					...(e instanceof ActionTokenDeniedError ? { reason: e.reason } : {}),
					message: e.userMessage,
					deniedAt: now.toISOString(),
				} satisfies EscrowActionDenied);
			}
			throw e;
		}
	}

	private async performInUnit(
		request: ActionRequest,
		manager: EntityManager,
		events: DeferredEvents,
		now: Date,
	): Promise<ActionOutcomeDto> {
		const escrow = await this.lockByCode(manager, request.escrowCode);
		await this.tokens.consume(
			{
				token: request.token,
				escrowId: escrow.id,
				action: request.action,
				partyId: request.requestingParty,
			},
			manager,
			now,
		);
		// tokens are only ever issued for catalogued actions
		if (!isEscrowAction(request.action)) {
			throw new ActionTokenDeniedError("invalid_token");
		}
		const definition: EscrowActionDefinition = ESCROW_ACTIONS[request.action];
		const allowed = definition.roles.map((role) => partyOf(escrow, role));
		if (!allowed.includes(request.requestingParty)) {
			throw new UnauthorizedActionError(definition.roles);
		}

		const base = { code: escrow.code, action: request.action };
		switch (definition.kind) {
			case "transition": {
				const offers = await this.transition({
					manager,
					events,
					escrow,
					to: definition.to,
					actorId: request.requestingParty,
					action: request.action,
					now,
				});
				return { ...base, result: "transitioned", state: escrow.state, offers };
			}
			case "joint": {
				assertTransition(escrow.state, definition.to);
				const joint = await this.reconciler.recordAndCheck(
					{
						escrow,
						actorId: request.requestingParty,
						acknowledgement: definition.acknowledgement,
						requiredRoles: definition.requiredRoles,
						payload: { action: request.action },
					},
					manager,
				);
				if (joint.status === "pending") {
					events.defer(ESCROW_JOINT_PENDING_ID, {
						eventId: nanoid(4),
						code: escrow.code,
						chatId: escrow.chatId,
						acknowledgement: definition.acknowledgement,
						actorId: request.requestingParty,
						waitingOn: joint.waitingOn,
						recordedAt: now.toISOString(),
					} satisfies EscrowJointConditionPending);
					return {
						...base,
						result: "pending",
						state: escrow.state,
						waitingOn: joint.waitingOn,
						offers: [],
					};
				}
				const offers = await this.transition({
					manager,
					events,
					escrow,
					to: definition.to,
					actorId: request.requestingParty,
					action: request.action,
					now,
				});
				return { ...base, result: "transitioned", state: escrow.state, offers };
			}
			case "notice": {
				if (!definition.availableIn.includes(escrow.state)) {
					throw new InvalidTransitionError(escrow.state, request.action);
				}
				await this.logs.append(
					{
						escrowId: escrow.id,
						chatId: escrow.chatId,
						actorId: request.requestingParty,
						action: definition.logAs,
						payload: { action: request.action },
					},
					manager,
				);
				events.defer(ESCROW_NOTICE_ID, {
					eventId: nanoid(4),
					code: escrow.code,
					chatId: escrow.chatId,
					notice: definition.logAs,
					actorId: request.requestingParty,
					amountMinor: escrow.amountMinor,
					recordedAt: now.toISOString(),
				} satisfies EscrowNotice);
				return { ...base, result: "recorded", state: escrow.state, offers: [] };
			}
		}
	}

	/** Operator confirmed the payment arrived out of band. */
	confirmFunding(
		code: string,
		operatorId: string,
		note?: string,
		now: Date = new Date(),
	): Promise<GetEscrowDto> {
		return this.operatorTransition({
			code,
			to: "FUNDED",
			operatorId,
			action: "confirm_funding",
			note,
			now,
		});
	}

	/** Operator reports the payout was made. */
	settle(
		code: string,
		operatorId: string,
		note?: string,
		now: Date = new Date(),
	): Promise<GetEscrowDto> {
		return this.operatorTransition({
			code,
			to: "COMPLETED",
			operatorId,
			action: "settle",
			note,
			now,
		});
	}

	resolveDispute(
		code: string,
		verdict: DisputeVerdict,
		operatorId: string,
		note?: string,
		now: Date = new Date(),
	): Promise<GetEscrowDto> {
		return this.operatorTransition({
			code,
			to: verdict === "release" ? "RELEASE_CONFIRMED" : "CANCELLED",
			operatorId,
			action: "resolve_dispute",
			note,
			now,
			requiredFrom: "DISPUTED",
		});
	}

	cancel(
		code: string,
		operatorId: string,
		note?: string,
		now: Date = new Date(),
	): Promise<GetEscrowDto> {
		return this.operatorTransition({
			code,
			to: "CANCELLED",
			operatorId,
			action: "cancel",
			note,
			now,
		});
	}

	private async operatorTransition(op: OperatorStep): Promise<GetEscrowDto> {
		const escrow = await this.unitOfWork.run(
			laneFor(op.code),
			async (manager, events) => {
				const found = await this.lockByCode(manager, op.code);
				// RELEASE_CONFIRMED and CANCELLED have other ways in
				if (op.requiredFrom && found.state !== op.requiredFrom) {
					throw new InvalidTransitionError(found.state, op.to);
				}
				await this.transition({
					manager,
					events,
					escrow: found,
					to: op.to,
					actorId: op.operatorId,
					action: op.action,
					now: op.now,
					payload: op.note ? { note: op.note } : undefined,
				});
				return found;
			},
		);
		this.logger.log(
			`Escrow ${op.code}: ${op.action} by operator ${op.operatorId} -> ${op.to}`,
		);
		return this.toDto(escrow);
	}

	/**
	 * The one place a state is written: checks the edge, records a
	 * `state_change` entry and issues the tokens the new state offers.
	 */
	private async transition(step: TransitionStep): Promise<ActionOffer[]> {
		const { manager, events, escrow, to, actorId, action, now } = step;
		const from = escrow.state;
		assertTransition(from, to);

		escrow.state = to;
		await manager.save(escrow);
		await this.logs.append(
			{
				escrowId: escrow.id,
				chatId: escrow.chatId,
				actorId,
				action: "state_change",
				payload: { from, to, action, ...step.payload },
			},
			manager,
		);
		const offers = await this.grantOffers(manager, escrow, now);
		events.defer(ESCROW_STATE_CHANGED_ID, {
			eventId: nanoid(4),
			code: escrow.code,
			chatId: escrow.chatId,
			escrow: {
				buyerId: escrow.buyerId,
				sellerId: escrow.sellerId,
				title: escrow.title,
				description: escrow.description,
				refundConditions: escrow.refundConditions,
				deliveryDeadline: escrow.deliveryDeadline?.toISOString(),
			},
			from,
			to,
			actorId,
			action,
			amountMinor: escrow.amountMinor,
			feeMinor: escrow.feeMinor,
			offers,
			changedAt: now.toISOString(),
		} satisfies EscrowStateChanged);
		this.logger.debug(`Escrow ${escrow.code}: ${from} -> ${to} staged`);
		return offers;
	}

	private async grantOffers(
		manager: EntityManager,
		escrow: Escrow,
		now: Date,
	): Promise<ActionOffer[]> {
		const offers: ActionOffer[] = [];
		for (const grant of ACTION_GRANTS[escrow.state] ?? []) {
			const partyId = partyOf(escrow, grant.role);
			const issued = await this.tokens.issue(
				{
					escrowId: escrow.id,
					action: grant.action,
					partyId,
					ttlSeconds: this.config.actionTokenTtlSeconds,
				},
				manager,
				now,
			);
			offers.push({
				action: grant.action,
				label: offerLabel(grant.action, grant.role),
				role: grant.role,
				partyId,
				token: issued.token,
				expiresAt: issued.expiresAt.getTime(),
			});
		}
		return offers;
	}

	private async lockByCode(
		manager: EntityManager,
		code: string,
	): Promise<Escrow> {
		return this.findIn(manager, code, rowLock(manager));
	}

	private async findIn(
		manager: EntityManager,
		code: string,
		lock: ReturnType<typeof rowLock> = {},
	): Promise<Escrow> {
		const escrow = await manager.findOne(Escrow, { where: { code }, ...lock });
		if (!escrow) {
			throw new EscrowNotFoundError(code);
		}
		return escrow;
	}

	// Reads below go through the unit of work so they never see a unit's
	// uncommitted writes. Never await them from inside a unit.

	async findByCode(code: string): Promise<Escrow> {
		return this.unitOfWork.read((manager) => this.findIn(manager, code));
	}

	async getByCode(code: string): Promise<GetEscrowDto> {
		return this.toDto(await this.findByCode(code));
	}

	async getLogs(
		code: string,
		limit = 20,
		cursor: Cursor = emptyCursor,
	): Promise<{ items: GetEscrowLogDto[]; total: number; nextCursor?: string }> {
		const { items, total, nextCursor } = await this.unitOfWork.read(
			async (manager) => {
				const escrow = await this.findIn(manager, code);
				return this.logs.page(escrow.id, limit, cursor, manager);
			},
		);
		return {
			items: items.map((l) => ({
				id: l.id,
				actorId: l.actorId,
				action: l.action,
				payload: l.payload,
				createdAt: l.createdAt.getTime(),
			})),
			total,
			nextCursor,
		};
	}

	/** Unspent, unexpired tokens of one party, for re-rendering its buttons. */
	async liveOffers(
		code: string,
		partyId: string,
		now: Date = new Date(),
	): Promise<ActionOffer[]> {
		const { escrow, live } = await this.unitOfWork.read(async (manager) => {
			const found = await this.findIn(manager, code);
			return { escrow: found, live: await this.tokens.findLive(found.id, now, manager) };
		});
		const offers: ActionOffer[] = [];
		for (const t of live) {
			if (t.partyId !== partyId || !isEscrowAction(t.action)) continue;
			const role = t.partyId === escrow.buyerId ? "buyer" : "seller";
			offers.push({
				action: t.action,
				label: offerLabel(t.action, role),
				role,
				partyId: t.partyId,
				token: t.token,
				expiresAt: t.expiresAt.getTime(),
			});
		}
		return offers;
	}

	private toDto(escrow: Escrow): GetEscrowDto {
		return {
			code: escrow.code,
			buyerId: escrow.buyerId,
			sellerId: escrow.sellerId,
			title: escrow.title,
			description: escrow.description,
			amountMinor: escrow.amountMinor,
			feeMinor: escrow.feeMinor,
			refundConditions: escrow.refundConditions ?? undefined,
			disputeAgreement: escrow.disputeAgreement,
			state: escrow.state,
			deliveryDeadline: escrow.deliveryDeadline?.getTime(),
			createdAt: escrow.createdAt.getTime(),
			updatedAt: escrow.updatedAt.getTime(),
		};
	}
}
