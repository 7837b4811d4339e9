import { Injectable, Logger } from "@nestjs/common";
import { EntityManager } from "typeorm";
import { EscrowLogsService } from "../logs/escrow-logs.service";
import { Escrow } from "../escrow.entity";
import {
	AcknowledgementStream,
	QuorumStatus,
	QuorumTracker,
} from "./quorum-tracker";
import type { PartyRole } from "../../common/errors";

export type RecordAcknowledgementInput = {
	escrow: Escrow;
	actorId: string;
	/** Log action that counts as the acknowledgement, e.g. `agreed` */
	acknowledgement: string;
	requiredRoles: readonly PartyRole[];
	payload?: Record<string, unknown>;
};

export type JointConditionResult =
	| { status: "satisfied" }
	| { status: "pending"; waitingOn: PartyRole[] };

/**
 * Acknowledgements recorded as escrow log rows inside the caller's
 * transaction.
 */
class EscrowLogAcknowledgements implements AcknowledgementStream<string> {
	constructor(
		private readonly logs: EscrowLogsService,
		private readonly manager: EntityManager,
		private readonly escrow: Escrow,
		private readonly acknowledgement: string,
		private readonly payload: Record<string, unknown>,
	) {}

	async append(actorId: string): Promise<void> {
		await this.logs.append(
			{
				escrowId: this.escrow.id,
				chatId: this.escrow.chatId,
				actorId,
				action: this.acknowledgement,
				payload: this.payload,
			},
			this.manager,
		);
	}

	distinctActors(): Promise<Set<string>> {
		return this.logs.distinctActors(
			this.escrow.id,
			this.acknowledgement,
			this.manager,
		);
	}
}

export function partyOf(escrow: Escrow, role: PartyRole): string {
	return role === "buyer" ? escrow.buyerId : escrow.sellerId;
}

@Injectable()
export class AgreementReconciler {
	private readonly logger = new Logger(AgreementReconciler.name);

	constructor(private readonly logs: EscrowLogsService) {}

	/**
	 * Logs `actorId`'s acknowledgement and reports whether every required
	 * party has now acknowledged. Run inside the unit that performs the
	 * follow-up transition.
	 */
	async recordAndCheck(
		input: RecordAcknowledgementInput,
		manager: EntityManager,
	): Promise<JointConditionResult> {
		const { escrow, requiredRoles } = input;
		const tracker = new QuorumTracker(
			requiredRoles.map((role) => partyOf(escrow, role)),
			new EscrowLogAcknowledgements(
				this.logs,
				manager,
				escrow,
				input.acknowledgement,
				input.payload ?? {},
			),
		);
		const status: QuorumStatus<string> = await tracker.contribute(input.actorId);
		if (status.status === "satisfied") {
			this.logger.debug(`Escrow ${escrow.code}: ${input.acknowledgement} by all`);
			return status;
		}
		const waitingOn = requiredRoles.filter((role) =>
			status.waitingOn.includes(partyOf(escrow, role)),
		);
		this.logger.debug(
			`Escrow ${escrow.code}: ${input.acknowledgement} waiting on ${waitingOn.join(", ")}`,
		);
		return { status: "pending", waitingOn };
	}
}
