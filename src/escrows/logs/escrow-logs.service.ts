import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { EntityManager, Repository } from "typeorm";
import { EscrowLog, EscrowLogPayload } from "./escrow-log.entity";
import { Cursor, cursorToString, emptyCursor } from "../../common/dto/envelopes";

export type AppendLogInput = {
	escrowId: number;
	chatId?: string | null;
	actorId: string;
	action: string;
	payload?: EscrowLogPayload;
};

@Injectable()
export class EscrowLogsService {
	constructor(
		@InjectRepository(EscrowLog)
		private readonly repo: Repository<EscrowLog>,
	) {}

	async append(
		input: AppendLogInput,
		manager: EntityManager = this.repo.manager,
	): Promise<EscrowLog> {
		const entity = manager.create(EscrowLog, {
			escrowId: input.escrowId,
			chatId: input.chatId ?? null,
			actorId: input.actorId,
			action: input.action,
			payload: input.payload ?? {},
		});
		return manager.save(entity);
	}

	/** Actors that logged `action` on the escrow, each counted once. */
	async distinctActors(
		escrowId: number,
		action: string,
		manager: EntityManager = this.repo.manager,
	): Promise<Set<string>> {
		const rows = await manager
			.createQueryBuilder(EscrowLog, "l")
			.select("DISTINCT l.actorId", "actorId")
			.where("l.escrowId = :escrowId", { escrowId })
			.andWhere("l.action = :action", { action })
			.getRawMany<{ actorId: string }>();
		return new Set(rows.map((r) => r.actorId));
	}

	async findByAction(
		escrowId: number,
		action: string,
		manager: EntityManager = this.repo.manager,
	): Promise<EscrowLog[]> {
		return manager.find(EscrowLog, {
			where: { escrowId, action },
			order: { id: "ASC" },
		});
	}

	/** Newest first. */
	async page(
		escrowId: number,
		limit = 20,
		cursor: Cursor = emptyCursor,
		manager: EntityManager = this.repo.manager,
	): Promise<{ items: EscrowLog[]; total: number; nextCursor?: string }> {
		const take = Math.min(Math.max(limit, 1), 100);
		const qb = manager
			.createQueryBuilder(EscrowLog, "l")
			.where("l.escrowId = :escrowId", { escrowId });

		const total = await qb.clone().getCount();

		// ids grow with insertion order, so they alone give a stable keyset
		if (cursor.idBefore !== undefined) {
			qb.andWhere("l.id < :idBefore", { idBefore: cursor.idBefore });
		}

		const rows = await qb
			.orderBy("l.id", "DESC")
			.take(take + 1)
			.getMany();

		let nextCursor: string | undefined;
		if (rows.length > take) {
			const last = rows[take - 1];
			nextCursor = cursorToString(last.id);
			rows.length = take;
		}
		return { items: rows, total, nextCursor };
	}
}
