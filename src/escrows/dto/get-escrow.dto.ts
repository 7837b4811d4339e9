import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { ESCROW_STATE, EscrowState } from "../state/escrow-state";

export class GetEscrowDto {
	@ApiProperty({ example: "PW-100042" })
	code!: string;

	@ApiProperty()
	buyerId!: string;

	@ApiProperty()
	sellerId!: string;

	@ApiProperty()
	title!: string;

	@ApiProperty()
	description!: string;

	@ApiProperty({ description: "Amount in minor units", example: 1000000 })
	amountMinor!: number;

	@ApiProperty({ description: "Fee in minor units", example: 60000 })
	feeMinor!: number;

	@ApiPropertyOptional()
	refundConditions?: string;

	@ApiProperty()
	disputeAgreement!: boolean;

	@ApiProperty({ enum: ESCROW_STATE })
	state!: EscrowState;

	@ApiPropertyOptional({ description: "Unix epoch in milliseconds" })
	deliveryDeadline?: number;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	createdAt!: number;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	updatedAt!: number;
}

export class GetEscrowLogDto {
	@ApiProperty()
	id!: number;

	@ApiProperty()
	actorId!: string;

	@ApiProperty({ example: "state_change" })
	action!: string;

	@ApiProperty({ type: "object", additionalProperties: true })
	payload!: Record<string, unknown>;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	createdAt!: number;
}
