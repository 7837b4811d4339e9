import { Controller, Get } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { DataSource } from "typeorm";

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(
		private readonly configService: ConfigService,
		private readonly dataSource: DataSource,
	) {}

	@Get()
	@ApiOperation({ summary: "Health check endpoint" })
	@ApiResponse({
		status: 200,
		description: "Application is up; `database` tells whether storage is reachable",
		schema: {
			type: "object",
			properties: {
				status: { type: "string", example: "ok" },
				database: { type: "string", example: "up" },
				timestamp: { type: "string", example: "2026-03-01T10:00:00.000Z" },
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
			},
		},
	})
	async healthCheck() {
		let database: "up" | "down" = "down";
		if (this.dataSource.isInitialized) {
			database = await this.dataSource.query("SELECT 1").then(
				() => "up" as const,
				() => "down" as const,
			);
		}
		return {
			status: database === "up" ? "ok" : "degraded",
			database,
			timestamp: new Date().toISOString(),
			uptime: process.uptime(),
			environment: this.configService.get("NODE_ENV", "development"),
		};
	}
}
