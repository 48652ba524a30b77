import type { FetchedFiling } from "./types.js";

/**
 * Lazily fetched filings. Each item costs one document download, and the
 * stream can be consumed once.
 *
 * @example
 * ```typescript
 * for await (const { filingId, html } of fetcher.fetch("AAPL", "10-K", { count: 3 })) {
 *   await orchestrator.processFiling(filingId, html);
 * }
 * ```
 */
export class FilingStream implements AsyncIterable<FetchedFiling> {
	private consumed = false;

	constructor(private readonly source: () => AsyncGenerator<FetchedFiling>) {}

	[Symbol.asyncIterator](): AsyncIterator<FetchedFiling> {
		if (this.consumed) {
			throw new Error("FilingStream has already been consumed");
		}
		this.consumed = true;
		return this.source();
	}

	/**
	 * Drain the stream into an array.
	 */
	async toArray(): Promise<FetchedFiling[]> {
		const filings: FetchedFiling[] = [];
		for await (const filing of this) {
			filings.push(filing);
		}
		return filings;
	}
}
