import { Module } from "@nestjs/common";
import { AdminController } from "./admin.controller";
import { EscrowsModule } from "../escrows/escrows.module";
import { NotificationsModule } from "../notifications/notifications.module";

@Module({
	imports: [EscrowsModule, NotificationsModule],
	controllers: [AdminController],
})
export class AdminModule {}
