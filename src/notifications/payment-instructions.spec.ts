import {
	formatMoney,
	paymentInstructions,
	upiPaymentUri,
} from "./payment-instructions";

const payment = { upiId: "desk@upi", payeeName: "Escrow Desk" };

describe("payment instructions", () => {
	it("builds a UPI deep link with the amount in major units", () => {
		expect(upiPaymentUri(payment, 1_050_000, "PW-100000")).toBe(
			"upi://pay?pa=desk@upi&pn=Escrow%20Desk&am=10500.00&tn=PW-100000",
		);
	});

	it("keeps paise", () => {
		expect(upiPaymentUri(payment, 12_345, "PW-1")).toBe(
			"upi://pay?pa=desk@upi&pn=Escrow%20Desk&am=123.45&tn=PW-1",
		);
	});

	it("formats rupees with Indian grouping", () => {
		expect(formatMoney(1_050_000, "INR")).toBe("₹10,500.00");
	});

	it("names the escrow and the exact amount", () => {
		const lines = paymentInstructions(
			{ payment, currency: "INR" },
			"PW-100000",
			1_050_000,
		).split("\n");
		expect(lines).toContain("UPI ID: desk@upi");
		expect(lines).toContain("Amount: ₹10,500.00");
		expect(lines).toContain("Escrow ID: PW-100000");
		expect(lines).toContain(
			"Pay: upi://pay?pa=desk@upi&pn=Escrow%20Desk&am=10500.00&tn=PW-100000",
		);
	});
});
