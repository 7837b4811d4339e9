import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsNotEmpty, IsString, MaxLength } from "class-validator";
import { ESCROW_STATE, EscrowState } from "../state/escrow-state";
import { ESCROW_ACTION } from "../actions/escrow-actions";
import { ActionOfferDto } from "./action-offer.dto";

export class PerformActionInDto {
	// unknown names are denied by the lifecycle, not rejected here
	@ApiProperty({ enum: ESCROW_ACTION })
	@IsString()
	@IsNotEmpty()
	action!: string;

	@ApiProperty({ description: "Action token from the button" })
	@IsString()
	@IsNotEmpty()
	token!: string;

	@ApiProperty({ description: "Identity of the participant pressing the button" })
	@IsString()
	@IsNotEmpty()
	requestingParty!: string;
}

export class ActionCallbackInDto {
	@ApiProperty({ example: "agree_buyer|PW-100042|V1StGXR8_Z5jdHi6B-myTV1StGXR8_Z5" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(256)
	data!: string;

	@ApiProperty()
	@IsString()
	@IsNotEmpty()
	requestingParty!: string;
}

export const ACTION_RESULT = ["transitioned", "pending", "recorded"] as const;
export type ActionResult = (typeof ACTION_RESULT)[number];

export class ActionOutcomeDto {
	@ApiProperty({ example: "PW-100042" })
	code!: string;

	@ApiProperty({ enum: ESCROW_ACTION })
	action!: string;

	@ApiProperty({ enum: ACTION_RESULT })
	result!: ActionResult;

	@ApiProperty({ enum: ESCROW_STATE })
	state!: EscrowState;

	@ApiPropertyOptional({ enum: ["buyer", "seller"], isArray: true })
	waitingOn?: ("buyer" | "seller")[];

	@ApiProperty({ type: () => [ActionOfferDto] })
	offers!: ActionOfferDto[];
}
