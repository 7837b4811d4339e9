import {
	assertTransition,
	canTransition,
	ESCROW_STATE,
	ESCROW_TRANSITIONS,
	isEscrowState,
	isTerminalState,
} from "./escrow-state";
import { InvalidTransitionError } from "../../common/errors";

describe("escrow state graph", () => {
	it("allows the happy path one edge at a time", () => {
		const path = [
			"CREATED",
			"FORM_SUBMITTED",
			"AGREEMENT_PREVIEW",
			"AGREED",
			"FUNDED",
			"DELIVERED",
			"RELEASE_REQUESTED",
			"RELEASE_CONFIRMED",
			"COMPLETED",
		] as const;
		for (let i = 1; i < path.length; i++) {
			expect(canTransition(path[i - 1], path[i])).toBe(true);
		}
	});

	it("allows exactly the listed edges over all state pairs", () => {
		const edges: Record<string, readonly string[]> = {
			CREATED: ["FORM_SUBMITTED", "CANCELLED"],
			FORM_SUBMITTED: ["AGREEMENT_PREVIEW", "CANCELLED"],
			AGREEMENT_PREVIEW: ["AGREED", "CANCELLED"],
			AGREED: ["FUNDED", "CANCELLED"],
			FUNDED: ["DELIVERED", "DISPUTED", "CANCELLED"],
			DELIVERED: ["RELEASE_REQUESTED", "DISPUTED"],
			RELEASE_REQUESTED: ["RELEASE_CONFIRMED", "DISPUTED"],
			RELEASE_CONFIRMED: ["COMPLETED"],
			DISPUTED: ["RELEASE_CONFIRMED", "CANCELLED"],
			COMPLETED: [],
			CANCELLED: [],
			EXPIRED: [],
		};
		expect(ESCROW_STATE).toHaveLength(12);

		let pairs = 0;
		for (const from of ESCROW_STATE) {
			for (const to of ESCROW_STATE) {
				pairs++;
				const listed = edges[from].includes(to);
				expect([from, to, canTransition(from, to)]).toEqual([from, to, listed]);
				if (listed) {
					expect(() => assertTransition(from, to)).not.toThrow();
				} else {
					expect(() => assertTransition(from, to)).toThrow(InvalidTransitionError);
				}
			}
		}
		expect(pairs).toBe(144);
	});

	it("rejects skipping a state", () => {
		expect(canTransition("AGREEMENT_PREVIEW", "FUNDED")).toBe(false);
		expect(canTransition("FUNDED", "COMPLETED")).toBe(false);
	});

	it("has no way out of CANCELLED or COMPLETED", () => {
		for (const to of ESCROW_STATE) {
			expect(canTransition("CANCELLED", to)).toBe(false);
			expect(canTransition("COMPLETED", to)).toBe(false);
		}
		expect(isTerminalState("CANCELLED")).toBe(true);
		expect(isTerminalState("COMPLETED")).toBe(true);
		expect(isTerminalState("DISPUTED")).toBe(false);
	});

	it("never leads into EXPIRED", () => {
		for (const from of ESCROW_STATE) {
			expect(canTransition(from, "EXPIRED")).toBe(false);
		}
	});

	it("is frozen", () => {
		expect(Object.isFrozen(ESCROW_TRANSITIONS)).toBe(true);
	});

	it("throws InvalidTransitionError carrying both ends", () => {
		expect(() => assertTransition("CREATED", "FORM_SUBMITTED")).not.toThrow();
		let caught: unknown;
		try {
			assertTransition("CANCELLED", "AGREED");
		} catch (e) {
			caught = e;
		}
		expect(caught).toBeInstanceOf(InvalidTransitionError);
		expect(caught).toMatchObject({ from: "CANCELLED", attempted: "AGREED" });
	});

	it("recognizes state names", () => {
		expect(isEscrowState("DISPUTED")).toBe(true);
		expect(isEscrowState("disputed")).toBe(false);
	});
});
