/**
 * Filing Fetcher
 *
 * Selection on top of an EdgarSource: latest, by index, by count, by
 * accession number, with year and date-range filters.
 */

import {
	createFilingIdentifier,
	FetchError,
	type FilingInfo,
	type FormType,
	isFormType,
	ISO_DATE_PATTERN,
	SUPPORTED_FORMS,
	ValidationError,
} from "@secsearch/domain";
import { FilingStream } from "./filing-stream.js";
import { log } from "./logger.js";
import type {
	EdgarSource,
	FetchedFiling,
	FetchOneOptions,
	FetchOptions,
	FilingFilters,
	FilingListing,
} from "./types.js";

export interface FilingFetcherOptions {
	/** Default count when none is given */
	maxFilings: number;
}

// ============================================
// Filtering
// ============================================

function validateFormType(formType: string): FormType {
	const normalized = formType.trim().toUpperCase();
	if (!isFormType(normalized)) {
		throw new FetchError(`Unsupported form type: ${formType}`, {
			details: `Supported forms: ${SUPPORTED_FORMS.join(", ")}`,
		});
	}
	return normalized;
}

function validateDate(value: string | undefined, label: string): void {
	if (value !== undefined && !ISO_DATE_PATTERN.test(value)) {
		throw new ValidationError(`Invalid ${label}: ${value}`, { details: "Expected YYYY-MM-DD." });
	}
}

export function describeFilters(filters: FilingFilters): string {
	const parts: string[] = [];
	if (filters.year !== undefined) {
		const years = typeof filters.year === "number" ? [filters.year] : filters.year;
		parts.push(`year=${years.join(",")}`);
	}
	if (filters.startDate !== undefined || filters.endDate !== undefined) {
		parts.push(`date=${filters.startDate ?? ""}:${filters.endDate ?? ""}`);
	}
	return parts.length > 0 ? parts.join(", ") : "no filters";
}

export function hasFilters(filters: FilingFilters): boolean {
	return (
		filters.year !== undefined || filters.startDate !== undefined || filters.endDate !== undefined
	);
}

export function matchesFilters(filingDate: string, filters: FilingFilters): boolean {
	if (filters.year !== undefined) {
		const years = typeof filters.year === "number" ? [filters.year] : filters.year;
		if (!years.includes(Number(filingDate.slice(0, 4)))) {
			return false;
		}
	}
	if (filters.startDate !== undefined && filingDate < filters.startDate) {
		return false;
	}
	if (filters.endDate !== undefined && filingDate > filters.endDate) {
		return false;
	}
	return true;
}

function toInfo(listing: FilingListing): FilingInfo {
	return {
		ticker: listing.ticker,
		formType: listing.formType,
		filingDate: listing.filingDate,
		accessionNumber: listing.accessionNumber,
		companyName: listing.companyName,
	};
}

// ============================================
// Fetcher Class
// ============================================

export class FilingFetcher {
	readonly maxFilings: number;

	constructor(
		private readonly source: EdgarSource,
		options: FilingFetcherOptions,
	) {
		this.maxFilings = options.maxFilings;
	}

	/**
	 * Matching listings, newest first.
	 *
	 * @throws FetchError when nothing matches
	 */
	private async select(
		ticker: string,
		formType: string,
		filters: FilingFilters,
	): Promise<FilingListing[]> {
		const form = validateFormType(formType);
		validateDate(filters.startDate, "start date");
		validateDate(filters.endDate, "end date");

		const symbol = ticker.trim().toUpperCase();
		const listings = (await this.source.listFilings(symbol, form)).filter((listing) =>
			matchesFilters(listing.filingDate, filters),
		);

		if (listings.length === 0) {
			throw new FetchError(`No ${form} filings found for ${symbol} (${describeFilters(filters)})`, {
				details: "Try adjusting your filter criteria.",
			});
		}
		return listings;
	}

	private async download(listing: FilingListing): Promise<FetchedFiling> {
		const html = await this.source.getFilingHtml(listing);
		const filingId = createFilingIdentifier(listing);
		log.info(
			{
				ticker: filingId.ticker,
				formType: filingId.formType,
				filingDate: filingId.filingDate,
				characters: html.length,
			},
			"Fetched filing",
		);
		return { filingId, html };
	}

	/**
	 * Preview filings without downloading them.
	 */
	async listAvailable(
		ticker: string,
		formType: string,
		options: FetchOptions = {},
	): Promise<FilingInfo[]> {
		const listings = await this.select(ticker, formType, options);
		const result = listings.slice(0, options.count ?? this.maxFilings).map(toInfo);
		log.info({ ticker, formType, count: result.length }, "Listed available filings");
		return result;
	}

	async fetchLatest(ticker: string, formType: string): Promise<FetchedFiling> {
		return this.fetchOne(ticker, formType, { index: 0 });
	}

	/**
	 * @throws FetchError when the index is past the matching filings
	 */
	async fetchOne(
		ticker: string,
		formType: string,
		options: FetchOneOptions = {},
	): Promise<FetchedFiling> {
		const index = options.index ?? 0;
		const listings = await this.select(ticker, formType, options);
		const listing = listings[index];
		if (!listing || index < 0) {
			throw new FetchError(`Index ${index} out of range`, {
				details: `Only ${listings.length} filings available.`,
			});
		}
		return this.download(listing);
	}

	/**
	 * Up to `count` filings, downloaded one at a time as the stream is read.
	 * Filings whose download fails are logged and skipped.
	 */
	fetch(ticker: string, formType: string, options: FetchOptions = {}): FilingStream {
		return new FilingStream(() => this.streamFilings(ticker, formType, options));
	}

	private async *streamFilings(
		ticker: string,
		formType: string,
		options: FetchOptions,
	): AsyncGenerator<FetchedFiling> {
		const count = options.count ?? this.maxFilings;
		const listings = await this.select(ticker, formType, options);
		if (listings.length > count) {
			log.info({ ticker, formType, available: listings.length, count }, "Limiting filings");
		}

		for (const listing of listings.slice(0, count)) {
			let fetched: FetchedFiling;
			try {
				fetched = await this.download(listing);
			} catch (error) {
				if (!(error instanceof FetchError)) {
					throw error;
				}
				log.warn(
					{ accessionNumber: listing.accessionNumber, error: error.message },
					"Skipping filing that could not be fetched",
				);
				continue;
			}
			yield fetched;
		}
	}

	/**
	 * @throws FetchError when no filing of this form has the accession number
	 */
	async fetchByAccession(
		ticker: string,
		formType: string,
		accessionNumber: string,
	): Promise<FetchedFiling> {
		const form = validateFormType(formType);
		const symbol = ticker.trim().toUpperCase();
		const listing = (await this.source.listFilings(symbol, form)).find(
			(candidate) => candidate.accessionNumber === accessionNumber,
		);
		if (!listing) {
			throw new FetchError(`Filing not found: ${accessionNumber}`, {
				details: `No ${form} filing with this accession number for ${symbol}.`,
			});
		}
		return this.download(listing);
	}

	/**
	 * Previews for several tickers. Tickers that fail map to an empty list.
	 */
	async listAvailableBatch(
		tickers: readonly string[],
		formType: string,
		options: FetchOptions = {},
	): Promise<Record<string, FilingInfo[]>> {
		const result: Record<string, FilingInfo[]> = {};
		for (const ticker of tickers) {
			const symbol = ticker.trim().toUpperCase();
			try {
				result[symbol] = await this.listAvailable(symbol, formType, options);
			} catch (error) {
				if (!(error instanceof FetchError)) {
					throw error;
				}
				log.warn({ ticker: symbol, error: error.message }, "No filings listed for ticker");
				result[symbol] = [];
			}
		}
		return result;
	}

	/**
	 * Filings for several tickers in one stream. Tickers that fail are skipped.
	 */
	fetchBatch(tickers: readonly string[], formType: string, options: FetchOptions = {}): FilingStream {
		return new FilingStream(() => this.streamBatch(tickers, formType, options));
	}

	private async *streamBatch(
		tickers: readonly string[],
		formType: string,
		options: FetchOptions,
	): AsyncGenerator<FetchedFiling> {
		for (const ticker of tickers) {
			const filings = this.streamFilings(ticker, formType, options);
			while (true) {
				let next: IteratorResult<FetchedFiling>;
				try {
					next = await filings.next();
				} catch (error) {
					if (!(error instanceof FetchError)) {
						throw error;
					}
					log.warn({ ticker, error: error.message }, "Skipping ticker");
					break;
				}
				if (next.done) {
					break;
				}
				yield next.value;
			}
		}
	}
}
