/**
 * SEC EDGAR Client
 *
 * Wrapper around sec-edgar-toolkit for company lookup and filing listings,
 * plus direct downloads of primary documents from the SEC archives.
 */

import { FetchError, type FormType } from "@secsearch/domain";
import {
	EdgarClient as ToolkitClient,
	type EdgarClientConfig as ToolkitConfig,
} from "sec-edgar-toolkit";
import { z } from "zod";
import { log } from "./logger.js";
import type { EdgarSource, FilingListing } from "./types.js";

// ============================================
// Configuration
// ============================================

export interface EdgarClientConfig {
	/** User-Agent string for SEC requests ("Name email"). Required by SEC. */
	userAgent: string;
	/** Delay between requests in seconds. Default: 0.1 (100ms) */
	rateLimitDelay?: number;
	/** Request timeout in milliseconds. Default: 30000 */
	timeout?: number;
}

/** Fields of a company-index entry this client reads */
export interface CompanyEntry {
	cik_str: string | number;
	title: string;
}

/**
 * The toolkit calls this client relies on.
 */
export interface EdgarToolkit {
	getCompanyByTicker(ticker: string): Promise<CompanyEntry | null>;
	getCompanySubmissions(cik: string): Promise<unknown>;
}

export type FetchLike = (url: string, init: { headers: Record<string, string> }) => Promise<Response>;

const ARCHIVES_BASE_URL = "https://www.sec.gov/Archives/edgar/data";

// Parallel arrays, one entry per filing
const SubmissionsSchema = z.object({
	filings: z.object({
		recent: z.object({
			form: z.array(z.string()),
			accessionNumber: z.array(z.string()),
			filingDate: z.array(z.string()),
			primaryDocument: z.array(z.string()).optional(),
		}),
	}),
});

// ============================================
// Client Class
// ============================================

/**
 * @example
 * ```typescript
 * const client = new EdgarClient({ userAgent: "Jane Analyst jane@example.com" });
 * const filings = await client.listFilings("AAPL", "10-K");
 * const html = await client.getFilingHtml(filings[0]);
 * ```
 */
export class EdgarClient implements EdgarSource {
	private readonly toolkit: EdgarToolkit;
	private readonly userAgent: string;
	private readonly fetchImpl: FetchLike;

	constructor(config: EdgarClientConfig, toolkit?: EdgarToolkit, fetchImpl: FetchLike = fetch) {
		const toolkitConfig: ToolkitConfig = {
			userAgent: config.userAgent,
			rateLimitDelay: config.rateLimitDelay ?? 0.1,
			timeout: config.timeout ?? 30000,
		};
		this.toolkit = toolkit ?? new ToolkitClient(toolkitConfig);
		this.userAgent = config.userAgent;
		this.fetchImpl = fetchImpl;
	}

	async listFilings(ticker: string, formType: FormType): Promise<FilingListing[]> {
		const symbol = ticker.trim().toUpperCase();

		let company: CompanyEntry | null;
		try {
			company = await this.toolkit.getCompanyByTicker(symbol);
		} catch (error) {
			throw new FetchError(`Failed to look up ticker ${symbol}`, {
				details: error instanceof Error ? error.message : String(error),
				cause: error,
			});
		}
		if (!company) {
			throw new FetchError(`Ticker not found: ${symbol}`, {
				details: "The ticker is not listed in SEC EDGAR's company index.",
			});
		}

		const cik = String(company.cik_str);
		let submissions: unknown;
		try {
			submissions = await this.toolkit.getCompanySubmissions(cik);
		} catch (error) {
			throw new FetchError(`Failed to retrieve filings for ${symbol}`, {
				details: error instanceof Error ? error.message : String(error),
				cause: error,
			});
		}

		const parsed = SubmissionsSchema.safeParse(submissions);
		if (!parsed.success) {
			throw new FetchError(`Invalid filing data structure for ${symbol}`, {
				details: parsed.error.message,
			});
		}

		const recent = parsed.data.filings.recent;
		const listings: FilingListing[] = [];

		for (let i = 0; i < recent.form.length; i++) {
			const accessionNumber = recent.accessionNumber[i];
			const filingDate = recent.filingDate[i];
			if (recent.form[i] !== formType || !accessionNumber || !filingDate) {
				continue;
			}
			const primaryDocument = recent.primaryDocument?.[i] || `${accessionNumber}.txt`;
			listings.push({
				ticker: symbol,
				formType,
				filingDate,
				accessionNumber,
				companyName: company.title,
				documentUrl: this.getFilingUrl(cik, accessionNumber, primaryDocument),
			});
		}

		// ISO dates sort lexically; stable for same-day filings
		listings.sort((a, b) => b.filingDate.localeCompare(a.filingDate));

		log.debug({ ticker: symbol, formType, count: listings.length }, "Listed EDGAR filings");
		return listings;
	}

	async getFilingHtml(listing: FilingListing): Promise<string> {
		let response: Response;
		try {
			response = await this.fetchImpl(listing.documentUrl, {
				headers: {
					"User-Agent": this.userAgent,
				},
			});
		} catch (error) {
			throw new FetchError(`Failed to fetch content for ${listing.accessionNumber}`, {
				details: error instanceof Error ? error.message : String(error),
				cause: error,
			});
		}

		if (!response.ok) {
			throw new FetchError(`Failed to fetch content for ${listing.accessionNumber}`, {
				details: `${response.status} ${response.statusText}`,
			});
		}

		const html = await response.text();
		if (!html.trim()) {
			throw new FetchError("Empty HTML content received", {
				details: `Filing ${listing.accessionNumber} returned no content.`,
			});
		}
		return html;
	}

	/**
	 * Archive URL of a filing document.
	 */
	getFilingUrl(cik: string, accessionNumber: string, primaryDocument: string): string {
		const cikUnpadded = cik.replace(/^0+/, "");
		const accessionClean = accessionNumber.replace(/-/g, "");
		return `${ARCHIVES_BASE_URL}/${cikUnpadded}/${accessionClean}/${primaryDocument}`;
	}
}
