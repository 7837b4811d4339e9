import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import {
	ESCROW_CREATED_ID,
	ESCROW_JOINT_PENDING_ID,
	ESCROW_NOTICE_ID,
	ESCROW_STATE_CHANGED_ID,
	type EscrowCreated,
	type EscrowJointConditionPending,
	type EscrowNotice,
	type EscrowStateChanged,
} from "./escrow.event";
import type { EscrowState } from "../escrows/state/escrow-state";

// action tokens never go out on this stream, it is readable by anyone
export type EscrowSse =
	| { type: "new_escrow"; code: string }
	| { type: "escrow_updated"; code: string; from: EscrowState; to: EscrowState }
	| { type: "agreement_pending"; code: string }
	| { type: "notice"; code: string; notice: string };

export type SseEvent<T = EscrowSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowSse>();

	escrowEvents(code?: string) {
		if (code) {
			return this.events$.pipe(filter((e) => e.code === code));
		}
		return this.events$.asObservable();
	}

	@OnEvent(ESCROW_CREATED_ID)
	onEscrowCreated(evt: EscrowCreated) {
		this.events$.next({ type: "new_escrow", code: evt.code });
	}

	@OnEvent(ESCROW_STATE_CHANGED_ID)
	onStateChanged(evt: EscrowStateChanged) {
		this.events$.next({
			type: "escrow_updated",
			code: evt.code,
			from: evt.from,
			to: evt.to,
		});
	}

	@OnEvent(ESCROW_JOINT_PENDING_ID)
	onJointPending(evt: EscrowJointConditionPending) {
		this.events$.next({ type: "agreement_pending", code: evt.code });
	}

	@OnEvent(ESCROW_NOTICE_ID)
	onNotice(evt: EscrowNotice) {
		this.events$.next({ type: "notice", code: evt.code, notice: evt.notice });
	}
}
