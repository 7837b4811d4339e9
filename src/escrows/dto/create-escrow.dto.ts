import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsBoolean,
	IsInt,
	IsNotEmpty,
	IsNumber,
	IsOptional,
	IsPositive,
	IsString,
	Max,
	MaxLength,
	Min,
} from "class-validator";
import { GetEscrowDto } from "./get-escrow.dto";
import { ActionOfferDto } from "./action-offer.dto";

export class CreateEscrowInDto {
	@ApiProperty({ example: "tg:1001", description: "Opaque buyer identity" })
	@IsString()
	@IsNotEmpty()
	buyerId!: string;

	@ApiProperty({ example: "tg:2002", description: "Opaque seller identity" })
	@IsString()
	@IsNotEmpty()
	sellerId!: string;

	@ApiProperty({ description: "Who submitted the form" })
	@IsString()
	@IsNotEmpty()
	createdBy!: string;

	@ApiPropertyOptional({ description: "Chat or group the deal originates from" })
	@IsString()
	@IsOptional()
	chatId?: string;

	@ApiProperty({ example: "Account sale" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(200)
	title!: string;

	@ApiProperty({ example: "Full access and original email" })
	@IsString()
	@IsNotEmpty()
	@MaxLength(2000)
	description!: string;

	@ApiProperty({ example: 10000, description: "Amount in major units" })
	@IsNumber({ maxDecimalPlaces: 2 })
	@IsPositive()
	amount!: number;

	@ApiPropertyOptional({ example: 24, description: "Delivery window in hours" })
	@IsInt()
	@Min(1)
	@Max(24 * 90)
	@IsOptional()
	deliveryHours?: number;

	@ApiPropertyOptional({ example: "No refunds after release" })
	@IsString()
	@IsOptional()
	refundConditions?: string;

	@ApiProperty({ description: "Both parties accept admin dispute handling" })
	@IsBoolean()
	disputeAgreement!: boolean;
}

export class CreateEscrowOutDto {
	@ApiProperty({ type: () => GetEscrowDto })
	escrow!: GetEscrowDto;

	@ApiProperty({
		type: () => [ActionOfferDto],
		description: "Agreement buttons, one token per party and choice",
	})
	offers!: ActionOfferDto[];
}
