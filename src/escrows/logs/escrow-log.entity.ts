import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";

export type EscrowLogPayload = Record<string, unknown>;

/**
 * Append-only audit trail. Rows are inserted, never updated.
 */
@Entity("escrow_logs")
@Index(["escrowId", "action"])
export class EscrowLog {
	@PrimaryGeneratedColumn()
	id!: number;

	@Column({ type: "integer" })
	escrowId!: number;

	@Column({ type: "text", nullable: true })
	chatId?: string | null;

	@Column({ type: "text" })
	actorId!: string;

	@Column({ type: "text" })
	action!: string;

	@Column({ type: "simple-json" })
	payload!: EscrowLogPayload;

	@CreateDateColumn()
	createdAt!: Date;
}
