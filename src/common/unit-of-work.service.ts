import { HttpException, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DataSource, DataSourceOptions, EntityManager } from "typeorm";
import { StorageFailureError, toError } from "./errors";

/** Drivers that hold a single connection: every unit must wait its turn. */
const SINGLE_CONNECTION_DRIVERS: ReadonlyArray<DataSourceOptions["type"]> = [
	"better-sqlite3",
	"sqlite",
	"sqljs",
];

const ROW_LOCKING_DRIVERS: ReadonlyArray<DataSourceOptions["type"]> = [
	"postgres",
	"cockroachdb",
	"mysql",
	"mariadb",
];

/**
 * `SELECT ... FOR UPDATE` where the driver has it. Spread into find options.
 */
export function rowLock(manager: EntityManager): {
	lock?: { mode: "pessimistic_write" };
} {
	return ROW_LOCKING_DRIVERS.includes(manager.connection.options.type)
		? { lock: { mode: "pessimistic_write" } }
		: {};
}

/**
 * Events recorded during a unit and handed to the emitter only once the
 * transaction has committed.
 */
export class DeferredEvents {
	private readonly pending: Array<{ name: string; payload: unknown }> = [];

	defer<T>(name: string, payload: T): void {
		this.pending.push({ name, payload });
	}

	drain(): ReadonlyArray<{ name: string; payload: unknown }> {
		return this.pending.splice(0, this.pending.length);
	}
}

export type UnitOfWorkFn<T> = (
	manager: EntityManager,
	events: DeferredEvents,
) => Promise<T>;

@Injectable()
export class UnitOfWork {
	private readonly logger = new Logger(UnitOfWork.name);
	private readonly lanes = new Map<string, Promise<void>>();
	private readonly wholeDatabaseLane: boolean;

	constructor(
		private readonly dataSource: DataSource,
		private readonly events: EventEmitter2,
	) {
		this.wholeDatabaseLane = SINGLE_CONNECTION_DRIVERS.includes(
			dataSource.options.type,
		);
	}

	/**
	 * Runs `work` in one transaction. Units sharing a `lane` (an escrow code,
	 * usually) never overlap inside this process; row locks cover the rest.
	 * Non-HTTP errors raised inside are reported as {@link StorageFailureError}.
	 */
	async run<T>(lane: string, work: UnitOfWorkFn<T>): Promise<T> {
		const key = this.wholeDatabaseLane ? "*" : lane;
		const events = new DeferredEvents();
		const result = await this.serialize(key, async () => {
			try {
				return await this.dataSource.transaction((manager) =>
					work(manager, events),
				);
			} catch (e) {
				if (e instanceof HttpException) throw e;
				const err = toError(e);
				this.logger.error(`Unit of work on ${lane} aborted: ${err.message}`, err.stack);
				throw new StorageFailureError(err);
			}
		});
		for (const { name, payload } of events.drain()) {
			this.events.emit(name, payload);
		}
		return result;
	}

	/**
	 * Plain reads, no transaction. On a single-connection driver an open unit
	 * shares the connection, so reads queue behind it and see committed rows only.
	 */
	async read<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
		if (!this.wholeDatabaseLane) {
			return work(this.dataSource.manager);
		}
		return this.serialize("*", () => work(this.dataSource.manager));
	}

	private async serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.lanes.get(key) ?? Promise.resolve();
		const current = previous.then(task);
		// the lane only tracks completion, failures reach the caller through `current`
		const tail = current.then(
			() => undefined,
			() => undefined,
		);
		this.lanes.set(key, tail);
		try {
			return await current;
		} finally {
			if (this.lanes.get(key) === tail) {
				this.lanes.delete(key);
			}
		}
	}
}
