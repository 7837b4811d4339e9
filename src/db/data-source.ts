import { ConfigService } from "@nestjs/config";
import { TypeOrmModuleOptions } from "@nestjs/typeorm";
import { Escrow } from "../escrows/escrow.entity";
import { ActionToken } from "../escrows/tokens/action-token.entity";
import { EscrowLog } from "../escrows/logs/escrow-log.entity";

export const ESCROW_ENTITIES = [Escrow, ActionToken, EscrowLog];

export function buildDatabaseOptions(
	config: ConfigService,
): TypeOrmModuleOptions {
	const isTest = config.get<string>("NODE_ENV") === "test";
	const isDev = config.get<string>("NODE_ENV") === "development";
	const synchronize = config.get<string>("DB_SYNCHRONIZE") !== "false";
	const base = { entities: ESCROW_ENTITIES, synchronize };

	if (isTest) {
		return { ...base, type: "better-sqlite3", database: ":memory:" };
	}

	const dbType = config.get<string>("DB_TYPE") ?? "better-sqlite3";
	switch (dbType) {
		case "better-sqlite3":
			return {
				...base,
				type: "better-sqlite3",
				database: config.get<string>("SQLITE_DB_PATH") ?? "escrow.sqlite",
			};
		case "postgres": {
			const host = config.get<string>("POSTGRES_HOST");
			const port = config.get<string>("POSTGRES_PORT");
			const username = config.get<string>("POSTGRES_USER");
			const password = config.get<string>("POSTGRES_PASSWORD");
			const database = config.get<string>("POSTGRES_DB");
			if (!host || !port || !username || !password || !database) {
				throw new Error(
					`Missing Postgres env vars. Host ${host}, port ${port}, user ${username}, db ${database}`,
				);
			}
			return {
				...base,
				type: "postgres",
				host,
				port: Number(port),
				username,
				password,
				database,
				logging: isDev,
			};
		}
		default:
			throw new Error(`Unsupported DB_TYPE "${dbType}"`);
	}
}
