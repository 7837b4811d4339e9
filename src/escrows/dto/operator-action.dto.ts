import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsIn, IsNotEmpty, IsOptional, IsString, MaxLength } from "class-validator";

export class OperatorActionInDto {
	@ApiProperty({ description: "Operator identity written to the action log" })
	@IsString()
	@IsNotEmpty()
	operatorId!: string;

	@ApiPropertyOptional()
	@IsString()
	@IsOptional()
	@MaxLength(500)
	note?: string;
}

export const DISPUTE_VERDICT = ["release", "cancel"] as const;
export type DisputeVerdict = (typeof DISPUTE_VERDICT)[number];

export class ResolveDisputeInDto extends OperatorActionInDto {
	@ApiProperty({ enum: DISPUTE_VERDICT })
	@IsIn(DISPUTE_VERDICT)
	verdict!: DisputeVerdict;
}
