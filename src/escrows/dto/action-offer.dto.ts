import { ApiProperty } from "@nestjs/swagger";
import type { ActionOffer } from "../../common/escrow.event";
import { ESCROW_ACTION } from "../actions/escrow-actions";

export class ActionOfferDto implements ActionOffer {
	@ApiProperty({ enum: ESCROW_ACTION })
	action!: string;

	@ApiProperty({ example: "✅ Agree (Buyer)" })
	label!: string;

	@ApiProperty({ enum: ["buyer", "seller"] })
	role!: "buyer" | "seller";

	@ApiProperty()
	partyId!: string;

	@ApiProperty({ description: "Single-use action token" })
	token!: string;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	expiresAt!: number;
}
