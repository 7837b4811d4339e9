import request from "supertest";
import { Test, type TestingModule } from "@nestjs/testing";
import type { INestApplication } from "@nestjs/common";
import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";
import type { ActionOffer } from "../src/common/escrow.event";
import { basicAuth, BUYER, createEscrowBody, offerFor, SELLER } from "./utils";

describe("Escrow from form to funding over HTTP", () => {
	let app: INestApplication;
	let code: string;
	let offers: ActionOffer[];

	beforeAll(async () => {
		process.env.BACKOFFICE_BASIC_USER = "admin";
		process.env.BACKOFFICE_BASIC_PASS = "test-secret";
		const moduleFixture: TestingModule = await Test.createTestingModule({
			imports: [AppModule],
		}).compile();

		app = configureApp(moduleFixture.createNestApplication());
		await app.init();
	});

	afterAll(async () => {
		await app.close();
	});

	it("should reject an incomplete form", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows")
			.send({ ...createEscrowBody, amount: -5, title: undefined })
			.expect(400);
		expect(res.body.statusCode).toBe(400);
	});

	it("should create an escrow and hand out agreement buttons", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows")
			.send(createEscrowBody)
			.expect(201);
		code = res.body.data.escrow.code;
		offers = res.body.data.offers;
		expect(code).toBe("PW-100000");
		expect(res.body.data.escrow.state).toBe("AGREEMENT_PREVIEW");
		expect(offers).toHaveLength(4);
	});

	it("should record the buyer's agreement and wait for the seller", async () => {
		const buyerAgree = offerFor(offers, "agree_buyer", BUYER);
		const res = await request(app.getHttpServer())
			.post(`/api/v1/escrows/${code}/actions`)
			.send({
				action: buyerAgree.action,
				token: buyerAgree.token,
				requestingParty: BUYER,
			})
			.expect(200);
		expect(res.body.data).toMatchObject({
			code,
			action: "agree_buyer",
			result: "pending",
			waitingOn: ["seller"],
		});
	});

	it("should refuse a button pressed by the wrong participant", async () => {
		const sellerAgree = offerFor(offers, "agree_seller", SELLER);
		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows/callbacks")
			.send({
				data: `agree_seller|${code}|${sellerAgree.token}`,
				requestingParty: BUYER,
			})
			.expect(403);
		expect(res.body).toEqual({
			statusCode: 403,
			error: "token_denied",
			message: "Action denied: this button belongs to another participant.",
			reason: "wrong_user",
		});
	});

	it("should agree on the seller's callback", async () => {
		const sellerAgree = offerFor(offers, "agree_seller", SELLER);
		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows/callbacks")
			.send({
				data: `agree_seller|${code}|${sellerAgree.token}`,
				requestingParty: SELLER,
			})
			.expect(200);
		expect(res.body.data.result).toBe("transitioned");
		expect(res.body.data.state).toBe("AGREED");
	});

	it("should refuse a button pressed twice", async () => {
		const sellerAgree = offerFor(offers, "agree_seller", SELLER);
		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows/callbacks")
			.send({
				data: `agree_seller|${code}|${sellerAgree.token}`,
				requestingParty: SELLER,
			})
			.expect(403);
		expect(res.body.reason).toBe("already_used");
	});

	it("should reject malformed callback data", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/escrows/callbacks")
			.send({ data: "agree_seller|only-two", requestingParty: SELLER })
			.expect(400);
		expect(res.body.error).toBe("malformed_callback");
	});

	it("should page through the action log", async () => {
		const first = await request(app.getHttpServer())
			.get(`/api/v1/escrows/${code}/logs?limit=5`)
			.expect(200);
		expect(first.body.data).toHaveLength(5);
		expect(first.body.meta.total).toBe(7);
		expect(first.body.data[0].payload).toEqual({
			from: "AGREEMENT_PREVIEW",
			to: "AGREED",
			action: "agree_seller",
		});

		const second = await request(app.getHttpServer())
			.get(`/api/v1/escrows/${code}/logs`)
			.query({ limit: 5, cursor: first.body.meta.nextCursor })
			.expect(200);
		expect(second.body.data).toHaveLength(2);
		expect(second.body.meta.nextCursor).toBeUndefined();
	});

	it("should keep the operator routes behind basic auth", async () => {
		await request(app.getHttpServer())
			.post(`/api/admin/v1/escrows/${code}/confirm-funding`)
			.send({ operatorId: "operator-1" })
			.expect(401);
		await request(app.getHttpServer())
			.post(`/api/admin/v1/escrows/${code}/confirm-funding`)
			.set("Authorization", basicAuth("admin", "wrong"))
			.send({ operatorId: "operator-1" })
			.expect(401);
	});

	it("should confirm funding for the operator", async () => {
		const res = await request(app.getHttpServer())
			.post(`/api/admin/v1/escrows/${code}/confirm-funding`)
			.set("Authorization", basicAuth("admin", "test-secret"))
			.send({ operatorId: "operator-1", note: "UTR 123" })
			.expect(200);
		expect(res.body.data.state).toBe("FUNDED");

		const offersRes = await request(app.getHttpServer())
			.get(`/api/v1/escrows/${code}/offers`)
			.query({ party: SELLER })
			.expect(200);
		const actions: string[] = offersRes.body.data.map(
			(o: ActionOffer) => o.action,
		);
		expect(actions).toContain("mark_delivered");
	});

	it("should answer 404 for unknown escrows", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/escrows/PW-404")
			.expect(404);
		expect(res.body.error).toBe("not_found");
	});

	it("should report health", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200);
		expect(res.body.status).toBe("ok");
	});
});
