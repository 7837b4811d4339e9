import { MalformedCallbackError } from "../../common/errors";

const SEPARATOR = "|";

export type ActionCallback = {
	action: string;
	escrowCode: string;
	token: string;
};

/** Chat button payload: `action|escrowCode|token` */
export function encodeActionCallback({
	action,
	escrowCode,
	token,
}: ActionCallback): string {
	for (const part of [action, escrowCode, token]) {
		if (part.length === 0 || part.includes(SEPARATOR)) {
			throw new MalformedCallbackError(`invalid part "${part}"`);
		}
	}
	return [action, escrowCode, token].join(SEPARATOR);
}

/**
 * Only the shape is checked here; an unknown action or escrow code is left
 * for the lifecycle to deny.
 */
export function decodeActionCallback(data: string): ActionCallback {
	const parts = data.split(SEPARATOR);
	if (parts.length !== 3) {
		throw new MalformedCallbackError(`expected 3 parts, got ${parts.length}`);
	}
	const [action, escrowCode, token] = parts;
	if (!action || !escrowCode || !token) {
		throw new MalformedCallbackError("empty part");
	}
	return { action, escrowCode, token };
}
