import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryColumn,
} from "typeorm";

@Entity("action_tokens")
@Index(["escrowId", "action"])
export class ActionToken {
	@PrimaryColumn({ type: "text" })
	token!: string;

	@Column({ type: "integer" })
	escrowId!: number;

	@Column({ type: "text" })
	action!: string;

	/** The only party allowed to spend this token */
	@Column({ type: "text" })
	partyId!: string;

	@Column()
	expiresAt!: Date;

	@Column({ type: "boolean", default: false })
	used!: boolean;

	@Column({ nullable: true })
	usedAt?: Date;

	@CreateDateColumn()
	createdAt!: Date;
}
