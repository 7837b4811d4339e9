import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { Escrow } from "./escrow.entity";
import { ActionToken } from "./tokens/action-token.entity";
import { EscrowLog } from "./logs/escrow-log.entity";
import { EscrowsService } from "./escrows.service";
import { EscrowsController } from "./escrows.controller";
import { ActionTokensService } from "./tokens/action-tokens.service";
import { EscrowLogsService } from "./logs/escrow-logs.service";
import { AgreementReconciler } from "./agreement/agreement-reconciler.service";
import { UnitOfWork } from "../common/unit-of-work.service";
import { ServerSentEventsService } from "../common/server-sent-events.service";

@Module({
	imports: [TypeOrmModule.forFeature([Escrow, ActionToken, EscrowLog])],
	providers: [
		EscrowsService,
		ActionTokensService,
		EscrowLogsService,
		AgreementReconciler,
		UnitOfWork,
		ServerSentEventsService,
	],
	controllers: [EscrowsController],
	exports: [EscrowsService, ServerSentEventsService],
})
export class EscrowsModule {}
