import type { EscrowConfig } from "../config/escrow.config";

export function formatMoney(minor: number, currency: string): string {
	return new Intl.NumberFormat("en-IN", {
		style: "currency",
		currency,
		minimumFractionDigits: 2,
	}).format(minor / 100);
}

/** Standard UPI deep link, also what the payment QR code encodes. */
export function upiPaymentUri(
	payment: EscrowConfig["payment"],
	amountMinor: number,
	note: string,
): string {
	return (
		`upi://pay?pa=${payment.upiId}` +
		`&pn=${encodeURIComponent(payment.payeeName)}` +
		`&am=${(amountMinor / 100).toFixed(2)}` +
		`&tn=${encodeURIComponent(note)}`
	);
}

export function paymentInstructions(
	config: Pick<EscrowConfig, "payment" | "currency">,
	code: string,
	amountMinor: number,
): string {
	return [
		"💳 PAYMENT DETAILS",
		"",
		`UPI ID: ${config.payment.upiId}`,
		`Amount: ${formatMoney(amountMinor, config.currency)}`,
		`Escrow ID: ${code}`,
		`Pay: ${upiPaymentUri(config.payment, amountMinor, code)}`,
		"",
		"⚠️ Send the exact amount only. Include the Escrow ID in the note.",
	].join("\n");
}
