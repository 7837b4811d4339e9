import { ConfigService } from "@nestjs/config";

export const ESCROW_CONFIG = Symbol("ESCROW_CONFIG");

/**
 * Process-wide, read-only settings. Built once at startup by
 * {@link buildEscrowConfig} and injected where needed.
 */
export type EscrowConfig = Readonly<{
	feePercent: number;
	actionTokenTtlSeconds: number;
	deliveryWindowHours: number;
	codePrefix: string;
	codeBase: number;
	currency: string;
	payment: Readonly<{
		upiId: string;
		payeeName: string;
	}>;
	logChatId?: string;
}>;

export const DEFAULT_ESCROW_CONFIG: EscrowConfig = Object.freeze({
	feePercent: 6,
	actionTokenTtlSeconds: 3600,
	deliveryWindowHours: 24,
	codePrefix: "PW",
	codeBase: 100_000,
	currency: "INR",
	payment: Object.freeze({ upiId: "escrow@upi", payeeName: "Escrow Desk" }),
});

function readNumber(
	config: ConfigService,
	key: string,
	fallback: number,
	{ min, integer }: { min: number; integer: boolean },
): number {
	const raw = config.get<string>(key);
	if (raw === undefined || raw === "") return fallback;
	const value = Number(raw);
	if (!Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
		throw new Error(`${key} must be ${integer ? "an integer" : "a number"} >= ${min}, got "${raw}"`);
	}
	return value;
}

export function buildEscrowConfig(config: ConfigService): EscrowConfig {
	const logChatId = config.get<string>("LOG_CHAT_ID");
	return Object.freeze({
		feePercent: readNumber(config, "ESCROW_FEE_PERCENT", DEFAULT_ESCROW_CONFIG.feePercent, {
			min: 0,
			integer: false,
		}),
		actionTokenTtlSeconds: readNumber(
			config,
			"ACTION_TOKEN_TTL_SECONDS",
			DEFAULT_ESCROW_CONFIG.actionTokenTtlSeconds,
			{ min: 1, integer: true },
		),
		deliveryWindowHours: readNumber(
			config,
			"ESCROW_DELIVERY_HOURS",
			DEFAULT_ESCROW_CONFIG.deliveryWindowHours,
			{ min: 1, integer: true },
		),
		codePrefix:
			config.get<string>("ESCROW_CODE_PREFIX") ?? DEFAULT_ESCROW_CONFIG.codePrefix,
		codeBase: DEFAULT_ESCROW_CONFIG.codeBase,
		currency: config.get<string>("ESCROW_CURRENCY") ?? DEFAULT_ESCROW_CONFIG.currency,
		payment: Object.freeze({
			upiId: config.get<string>("PAYMENT_UPI_ID") ?? DEFAULT_ESCROW_CONFIG.payment.upiId,
			payeeName:
				config.get<string>("PAYMENT_PAYEE_NAME") ??
				DEFAULT_ESCROW_CONFIG.payment.payeeName,
		}),
		...(logChatId ? { logChatId } : {}),
	});
}
