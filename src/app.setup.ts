import { type INestApplication, ValidationPipe } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";

/** Global pipes and filters, shared by the server and the e2e specs. */
export function configureApp(app: INestApplication): INestApplication {
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	app.enableCors();
	return app;
}

export function setupSwagger(app: INestApplication) {
	const config = new DocumentBuilder()
		.setTitle("Escrow Workflow API")
		.setDescription(
			"Two-party escrow agreements driven by single-use action tokens. Admin routes use HTTP Basic auth.",
		)
		.setVersion("0.1.0")
		.addBasicAuth()
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});
}
