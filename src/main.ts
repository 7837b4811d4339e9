import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp, setupSwagger } from "./app.setup";
import { toError } from "./common/errors";

dotenv.config();

async function bootstrap() {
	const app = await NestFactory.create(AppModule);
	configureApp(app);
	setupSwagger(app);

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((e: unknown) => {
	const err = toError(e);
	Logger.error(`Failed to start: ${err.message}`, err.stack, "Bootstrap");
	process.exit(1);
});
