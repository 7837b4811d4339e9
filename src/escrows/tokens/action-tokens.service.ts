import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { EntityManager, Repository } from "typeorm";
import { nanoid } from "nanoid";
import { ActionToken } from "./action-token.entity";
import { ActionTokenDeniedError } from "../../common/errors";
import { rowLock } from "../../common/unit-of-work.service";

// 32 url-safe characters, ~190 bits: also fits chat callback payloads
const TOKEN_LENGTH = 32;

export type IssueActionTokenInput = {
	escrowId: number;
	action: string;
	partyId: string;
	ttlSeconds: number;
};

export type ConsumeActionTokenInput = {
	token: string;
	escrowId: number;
	action: string;
	partyId: string;
};

/**
 * Single-use, party-bound, expiring capabilities. Issuing a new token never
 * revokes an older one: each token lives or dies by its own window.
 */
@Injectable()
export class ActionTokensService {
	private readonly logger = new Logger(ActionTokensService.name);

	constructor(
		@InjectRepository(ActionToken)
		private readonly repo: Repository<ActionToken>,
	) {}

	async issue(
		input: IssueActionTokenInput,
		manager: EntityManager = this.repo.manager,
		now: Date = new Date(),
	): Promise<ActionToken> {
		const entity = manager.create(ActionToken, {
			token: nanoid(TOKEN_LENGTH),
			escrowId: input.escrowId,
			action: input.action,
			partyId: input.partyId,
			expiresAt: new Date(now.getTime() + input.ttlSeconds * 1000),
			used: false,
		});
		const saved = await manager.save(entity);
		this.logger.debug(
			`Issued ${input.action} token for escrow #${input.escrowId}, expires ${saved.expiresAt.toISOString()}`,
		);
		return saved;
	}

	/**
	 * Validates and spends `input.token`. Must run inside the caller's
	 * transaction so that spending and the action it authorizes commit together.
	 *
	 * @throws ActionTokenDeniedError with the first failing check, in order:
	 * `invalid_token`, `already_used`, `wrong_user`, `expired`
	 */
	async consume(
		input: ConsumeActionTokenInput,
		manager: EntityManager = this.repo.manager,
		now: Date = new Date(),
	): Promise<ActionToken> {
		const found = await manager.findOne(ActionToken, {
			where: {
				token: input.token,
				escrowId: input.escrowId,
				action: input.action,
			},
			...rowLock(manager),
		});
		if (!found) {
			throw new ActionTokenDeniedError("invalid_token");
		}
		if (found.used) {
			throw new ActionTokenDeniedError("already_used");
		}
		if (found.partyId !== input.partyId) {
			throw new ActionTokenDeniedError("wrong_user");
		}
		if (found.expiresAt.getTime() <= now.getTime()) {
			throw new ActionTokenDeniedError("expired");
		}

		await manager.update(
			ActionToken,
			{ token: found.token },
			{ used: true, usedAt: now },
		);
		found.used = true;
		found.usedAt = now;
		return found;
	}

	async findLive(
		escrowId: number,
		now: Date = new Date(),
		manager: EntityManager = this.repo.manager,
	): Promise<ActionToken[]> {
		const tokens = await manager.find(ActionToken, {
			where: { escrowId, used: false },
			order: { createdAt: "ASC" },
		});
		return tokens.filter((t) => t.expiresAt.getTime() > now.getTime());
	}
}
