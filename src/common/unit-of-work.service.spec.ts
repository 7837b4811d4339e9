import { ConflictException } from "@nestjs/common";
import type { TestingModule } from "@nestjs/testing";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DataSource } from "typeorm";
import { rowLock, UnitOfWork } from "./unit-of-work.service";
import { StorageFailureError } from "./errors";
import { EscrowLog } from "../escrows/logs/escrow-log.entity";
import { createEscrowTestingModule } from "../../test/utils";

describe("UnitOfWork", () => {
	let moduleRef: TestingModule;
	let unitOfWork: UnitOfWork;
	let dataSource: DataSource;
	let received: string[];

	beforeEach(async () => {
		moduleRef = await createEscrowTestingModule();
		unitOfWork = moduleRef.get(UnitOfWork);
		dataSource = moduleRef.get(DataSource);
		received = [];
		moduleRef
			.get(EventEmitter2)
			.on("test.event", (payload: { n: number }) => received.push(`event ${payload.n}`));
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	const insertLog = (manager: DataSource["manager"]) =>
		manager.save(
			manager.create(EscrowLog, {
				escrowId: 1,
				actorId: "buyer-1",
				action: "agreed",
				payload: {},
			}),
		);

	it("emits deferred events after the commit", async () => {
		const result = await unitOfWork.run("escrow:1", async (manager, events) => {
			await insertLog(manager);
			events.defer("test.event", { n: 1 });
			received.push("work done");
			return "ok";
		});

		expect(result).toBe("ok");
		expect(received).toEqual(["work done", "event 1"]);
		expect(await dataSource.getRepository(EscrowLog).count()).toBe(1);
	});

	it("rolls back and drops events when the work fails", async () => {
		const attempt = unitOfWork.run("escrow:1", async (manager, events) => {
			await insertLog(manager);
			events.defer("test.event", { n: 1 });
			throw new Error("disk full");
		});

		await expect(attempt).rejects.toBeInstanceOf(StorageFailureError);
		expect(received).toEqual([]);
		expect(await dataSource.getRepository(EscrowLog).count()).toBe(0);
	});

	it("lets HTTP errors through untouched", async () => {
		const denial = new ConflictException("nope");
		await expect(
			unitOfWork.run("escrow:1", async () => {
				throw denial;
			}),
		).rejects.toBe(denial);
	});

	it("never overlaps units of the same lane", async () => {
		const trace: string[] = [];
		const unit = (name: string) =>
			unitOfWork.run("escrow:1", async (manager) => {
				trace.push(`${name} start`);
				await insertLog(manager);
				trace.push(`${name} end`);
			});

		await Promise.all([unit("a"), unit("b"), unit("c")]);
		expect(trace).toEqual([
			"a start",
			"a end",
			"b start",
			"b end",
			"c start",
			"c end",
		]);
	});

	it("keeps going after a failed unit", async () => {
		const failed = unitOfWork.run("escrow:1", async () => {
			throw new Error("boom");
		});
		const next = unitOfWork.run("escrow:1", async () => "next");

		await expect(failed).rejects.toBeInstanceOf(StorageFailureError);
		await expect(next).resolves.toBe("next");
	});

	it("holds reads until the running unit has finished", async () => {
		const reads: Promise<number>[] = [];
		const unit = unitOfWork.run("escrow:1", async (manager) => {
			await insertLog(manager);
			reads.push(unitOfWork.read((m) => m.count(EscrowLog)));
			throw new Error("disk full");
		});

		await expect(unit).rejects.toBeInstanceOf(StorageFailureError);
		await expect(Promise.all(reads)).resolves.toEqual([0]);
	});

	it("skips row locks where the driver has none", () => {
		expect(rowLock(dataSource.manager)).toEqual({});
	});
});
