import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { ESCROW_STATE, EscrowState } from "./state/escrow-state";

@Entity("escrows")
export class Escrow {
	@PrimaryGeneratedColumn()
	id!: number;

	/** Public code shown to participants, e.g. `PW-100042` */
	@Index({ unique: true })
	@Column({ type: "text" })
	code!: string;

	@Column({ type: "text", nullable: true })
	chatId?: string | null;

	@Index()
	@Column({ type: "text" })
	buyerId!: string;

	@Index()
	@Column({ type: "text" })
	sellerId!: string;

	@Column({ type: "text" })
	createdBy!: string;

	@Column({ type: "text" })
	title!: string;

	@Column({ type: "text" })
	description!: string;

	// minor units (paise, cents)
	@Column({ type: "integer" })
	amountMinor!: number;

	@Column({ type: "integer" })
	feeMinor!: number;

	@Column({ type: "text", nullable: true })
	refundConditions?: string | null;

	@Column({ type: "boolean", default: false })
	disputeAgreement!: boolean;

	@Column({ type: "text", enum: ESCROW_STATE })
	state!: EscrowState;

	@Column({ nullable: true })
	deliveryDeadline?: Date;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
