/**
 * Where acknowledgements are recorded. Implementations must be append-only:
 * `distinctActors` reflects every `append` made before it, duplicates included
 * only once.
 */
export interface AcknowledgementStream<TActor> {
	append(actor: TActor): Promise<void>;
	distinctActors(): Promise<ReadonlySet<TActor>>;
}

export type QuorumStatus<TActor> =
	| { status: "satisfied" }
	| { status: "pending"; waitingOn: TActor[] };

/**
 * Decides when every required actor has acknowledged. The answer is computed
 * from the stream on each contribution, so repeating a contribution is harmless.
 */
export class QuorumTracker<TActor> {
	private readonly required: ReadonlySet<TActor>;

	constructor(
		required: Iterable<TActor>,
		private readonly stream: AcknowledgementStream<TActor>,
	) {
		this.required = new Set(required);
		if (this.required.size === 0) {
			throw new Error("A quorum needs at least one required actor");
		}
	}

	async contribute(actor: TActor): Promise<QuorumStatus<TActor>> {
		await this.stream.append(actor);
		return this.status();
	}

	async status(): Promise<QuorumStatus<TActor>> {
		const seen = await this.stream.distinctActors();
		const waitingOn = [...this.required].filter((a) => !seen.has(a));
		return waitingOn.length === 0
			? { status: "satisfied" }
			: { status: "pending", waitingOn };
	}
}
