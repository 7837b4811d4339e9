import { AcknowledgementStream, QuorumTracker } from "./quorum-tracker";

class InMemoryStream implements AcknowledgementStream<string> {
	readonly appended: string[] = [];

	async append(actor: string): Promise<void> {
		this.appended.push(actor);
	}

	async distinctActors(): Promise<Set<string>> {
		return new Set(this.appended);
	}
}

describe("QuorumTracker", () => {
	it("stays pending until every required actor contributed", async () => {
		const stream = new InMemoryStream();
		const tracker = new QuorumTracker(["buyer-1", "seller-1"], stream);

		await expect(tracker.contribute("buyer-1")).resolves.toEqual({
			status: "pending",
			waitingOn: ["seller-1"],
		});
		await expect(tracker.contribute("seller-1")).resolves.toEqual({
			status: "satisfied",
		});
	});

	it("does not count the same actor twice", async () => {
		const stream = new InMemoryStream();
		const tracker = new QuorumTracker(["buyer-1", "seller-1"], stream);

		await tracker.contribute("buyer-1");
		const second = await tracker.contribute("buyer-1");

		expect(second).toEqual({ status: "pending", waitingOn: ["seller-1"] });
		expect(stream.appended).toEqual(["buyer-1", "buyer-1"]);
	});

	it("ignores contributions from outsiders", async () => {
		const tracker = new QuorumTracker(["buyer-1"], new InMemoryStream());
		await expect(tracker.contribute("someone-else")).resolves.toEqual({
			status: "pending",
			waitingOn: ["buyer-1"],
		});
	});

	it("needs at least one required actor", () => {
		expect(() => new QuorumTracker([], new InMemoryStream())).toThrow(
			"A quorum needs at least one required actor",
		);
	});
});
