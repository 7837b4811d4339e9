import { Test, type TestingModule } from "@nestjs/testing";
import { ConfigModule } from "@nestjs/config";
import { EventEmitterModule } from "@nestjs/event-emitter";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EscrowConfigModule } from "../src/config/escrow-config.module";
import {
	DEFAULT_ESCROW_CONFIG,
	ESCROW_CONFIG,
	type EscrowConfig,
} from "../src/config/escrow.config";
import { ESCROW_ENTITIES } from "../src/db/data-source";
import { EscrowsModule } from "../src/escrows/escrows.module";
import type { ActionOffer } from "../src/common/escrow.event";
import type { CreateEscrowInput } from "../src/escrows/escrows.service";

export const BUYER = "buyer-1";
export const SELLER = "seller-1";
export const OPERATOR = "operator-1";

export const createEscrowBody: CreateEscrowInput = {
	buyerId: BUYER,
	sellerId: SELLER,
	createdBy: BUYER,
	chatId: "group-1",
	title: "Account sale",
	description: "Full access and original email",
	amount: 10000,
	refundConditions: "No refunds after release",
	disputeAgreement: true,
};

/** Escrow services on an in-memory database, listeners registered. */
export async function createEscrowTestingModule(
	config: Partial<EscrowConfig> = {},
): Promise<TestingModule> {
	const moduleRef = await Test.createTestingModule({
		imports: [
			ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
			EventEmitterModule.forRoot(),
			EscrowConfigModule,
			TypeOrmModule.forRoot({
				type: "better-sqlite3",
				database: ":memory:",
				entities: ESCROW_ENTITIES,
				synchronize: true,
			}),
			EscrowsModule,
		],
	})
		.overrideProvider(ESCROW_CONFIG)
		.useValue({ ...DEFAULT_ESCROW_CONFIG, ...config })
		.compile();
	return moduleRef.init();
}

export function offerFor(
	offers: readonly ActionOffer[],
	action: string,
	partyId: string,
): ActionOffer {
	const offer = offers.find((o) => o.action === action && o.partyId === partyId);
	if (!offer) {
		throw new Error(`No ${action} offer for ${partyId}`);
	}
	return offer;
}

export function basicAuth(user: string, pass: string): string {
	return `Basic ${Buffer.from(`${user}:${pass}`).toString("base64")}`;
}
