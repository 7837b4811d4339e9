import { Inject, Injectable, Logger } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { Subject } from "rxjs";
import {
	ActionOffer,
	ESCROW_ACTION_DENIED_ID,
	ESCROW_JOINT_PENDING_ID,
	ESCROW_NOTICE_ID,
	ESCROW_STATE_CHANGED_ID,
	type EscrowActionDenied,
	type EscrowJointConditionPending,
	type EscrowNotice,
	type EscrowStateChanged,
} from "../common/escrow.event";
import { ESCROW_CONFIG, EscrowConfig } from "../config/escrow.config";
import { encodeActionCallback } from "../escrows/actions/action-callback.codec";
import { formatMoney, paymentInstructions } from "./payment-instructions";

export type MessageTarget =
	| { kind: "chat"; chatId: string }
	| { kind: "party"; partyId: string };

export type OutboundButton = {
	label: string;
	/** `action|code|token`, sent back through the callbacks endpoint */
	callbackData: string;
};

export type OutboundMessage = {
	to: MessageTarget;
	text: string;
	buttons: OutboundButton[];
};

/**
 * Turns committed escrow events into chat messages. A transport subscribes to
 * {@link outbox} and delivers them; nothing here talks to a chat API.
 */
@Injectable()
export class EscrowNotificationsService {
	private readonly logger = new Logger(EscrowNotificationsService.name);
	private readonly outbox$ = new Subject<OutboundMessage>();

	constructor(
		@Inject(ESCROW_CONFIG)
		private readonly config: EscrowConfig,
	) {}

	get outbox() {
		return this.outbox$.asObservable();
	}

	@OnEvent(ESCROW_STATE_CHANGED_ID)
	onStateChanged(evt: EscrowStateChanged) {
		switch (evt.to) {
			case "AGREEMENT_PREVIEW":
				this.sendWithOffers(evt, this.agreementPreview(evt));
				return;
			case "AGREED":
				this.sendWithOffers(
					evt,
					`Both parties agreed. Escrow ${evt.code} is now AGREED.\n\n` +
						paymentInstructions(this.config, evt.code, evt.amountMinor),
				);
				this.toLogChat(
					`✅ PAYMENT AVAILABLE for ${evt.code}, amount ${formatMoney(evt.amountMinor, this.config.currency)}`,
				);
				return;
			case "CANCELLED":
				this.sendWithOffers(evt, `Escrow ${evt.code} has been cancelled.`);
				this.toLogChat(`🚫 Escrow ${evt.code} cancelled by ${evt.actorId}`);
				return;
			default:
				this.sendWithOffers(evt, `Escrow ${evt.code} is now ${evt.to}.`);
		}
	}

	@OnEvent(ESCROW_JOINT_PENDING_ID)
	onJointPending(evt: EscrowJointConditionPending) {
		this.push({
			to: { kind: "party", partyId: evt.actorId },
			text: `Your agreement is recorded. Waiting for the ${evt.waitingOn.join(" and ")}.`,
			buttons: [],
		});
	}

	@OnEvent(ESCROW_ACTION_DENIED_ID)
	onActionDenied(evt: EscrowActionDenied) {
		this.push({
			to: { kind: "party", partyId: evt.requestingParty },
			text: evt.message,
			buttons: [],
		});
	}

	@OnEvent(ESCROW_NOTICE_ID)
	onNotice(evt: EscrowNotice) {
		if (evt.notice === "payment_notified") {
			this.toLogChat(
				`💰 Buyer reports payment for ${evt.code}, amount ${formatMoney(evt.amountMinor, this.config.currency)}. Confirm funding once received.`,
			);
		}
	}

	private agreementPreview(evt: EscrowStateChanged): string {
		const { escrow } = evt;
		const lines = [
			"🔐 ESCROW AGREEMENT",
			"",
			`🆔 Escrow ID: ${evt.code}`,
			"",
			`👤 Buyer: ${escrow.buyerId}`,
			`👤 Seller: ${escrow.sellerId}`,
			"",
			`📦 Deal: ${escrow.title}`,
			`📝 Details: ${escrow.description}`,
			`💰 Amount: ${formatMoney(evt.amountMinor, this.config.currency)}`,
			`💸 Fee: ${this.config.feePercent}% (${formatMoney(evt.feeMinor, this.config.currency)})`,
		];
		if (escrow.deliveryDeadline) {
			lines.push(`⏳ Delivery by: ${escrow.deliveryDeadline}`);
		}
		if (escrow.refundConditions) {
			lines.push(`↩️ Refunds: ${escrow.refundConditions}`);
		}
		lines.push(
			"",
			"⚖️ Terms:",
			"• Funds held until buyer confirms delivery",
			"• No chargebacks after release",
			"• Disputes handled by escrow admins",
			"",
			"Proceed?",
		);
		return lines.join("\n");
	}

	/**
	 * One message to the deal's chat with every button, or one per party with
	 * only its own buttons when the deal has no chat.
	 */
	private sendWithOffers(evt: EscrowStateChanged, text: string) {
		if (evt.chatId) {
			this.push({
				to: { kind: "chat", chatId: evt.chatId },
				text,
				buttons: evt.offers.map((o) => this.toButton(evt.code, o)),
			});
			return;
		}
		for (const partyId of [evt.escrow.buyerId, evt.escrow.sellerId]) {
			this.push({
				to: { kind: "party", partyId },
				text,
				buttons: evt.offers
					.filter((o) => o.partyId === partyId)
					.map((o) => this.toButton(evt.code, o)),
			});
		}
	}

	private toButton(code: string, offer: ActionOffer): OutboundButton {
		return {
			label: offer.label,
			callbackData: encodeActionCallback({
				action: offer.action,
				escrowCode: code,
				token: offer.token,
			}),
		};
	}

	private toLogChat(text: string) {
		if (!this.config.logChatId) return;
		this.push({
			to: { kind: "chat", chatId: this.config.logChatId },
			text,
			buttons: [],
		});
	}

	private push(message: OutboundMessage) {
		this.logger.debug(
			`Outbound to ${message.to.kind} ${message.to.kind === "chat" ? message.to.chatId : message.to.partyId}`,
		);
		this.outbox$.next(message);
	}
}
