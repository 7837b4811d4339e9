import { Module } from "@nestjs/common";
import { EscrowNotificationsService } from "./escrow-notifications.service";

@Module({
	providers: [EscrowNotificationsService],
	exports: [EscrowNotificationsService],
})
export class NotificationsModule {}
