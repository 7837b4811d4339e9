import { Global, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { buildEscrowConfig, ESCROW_CONFIG } from "./escrow.config";

@Global()
@Module({
	providers: [
		{
			provide: ESCROW_CONFIG,
			inject: [ConfigService],
			useFactory: buildEscrowConfig,
		},
	],
	exports: [ESCROW_CONFIG],
})
export class EscrowConfigModule {}
