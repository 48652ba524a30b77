/**
 * Mock EDGAR Source
 *
 * Serves canned filing listings and fixture HTML in place of SEC EDGAR.
 */

import { FetchError, type FormType } from "@secsearch/domain";
import type { EdgarSource, FilingListing } from "@secsearch/filings";
import { loadFixture } from "./fixtures.js";

// ============================================
// Types
// ============================================

export interface MockFiling {
	formType: FormType;
	filingDate: string;
	accessionNumber: string;
	/** Defaults to the 10-K or 10-Q fixture */
	html?: string;
}

export interface MockCompany {
	companyName: string;
	filings: MockFiling[];
}

export interface MockEdgarConfig {
	/** Simulated latency per call (ms) */
	delayMs?: number;
	/** Accession numbers whose download fails */
	failDownloads?: string[];
	/** Tickers whose listing fails with a network error */
	failListings?: string[];
}

// ============================================
// Mock Source
// ============================================

export class MockEdgarSource implements EdgarSource {
	private readonly config: Required<MockEdgarConfig>;
	/** Accession numbers downloaded, in order */
	readonly downloads: string[] = [];

	constructor(
		private readonly companies: Record<string, MockCompany>,
		config: MockEdgarConfig = {},
	) {
		this.config = {
			delayMs: config.delayMs ?? 0,
			failDownloads: config.failDownloads ?? [],
			failListings: config.failListings ?? [],
		};
	}

	async listFilings(ticker: string, formType: FormType): Promise<FilingListing[]> {
		await this.delay();
		const symbol = ticker.trim().toUpperCase();
		if (this.config.failListings.includes(symbol)) {
			throw new FetchError(`Failed to retrieve filings for ${symbol}`, {
				details: "Simulated network failure",
			});
		}

		const company = this.companies[symbol];
		if (!company) {
			throw new FetchError(`Ticker not found: ${symbol}`);
		}

		return company.filings
			.filter((filing) => filing.formType === formType)
			.map((filing) => ({
				ticker: symbol,
				formType: filing.formType,
				filingDate: filing.filingDate,
				accessionNumber: filing.accessionNumber,
				companyName: company.companyName,
				documentUrl: `https://edgar.test/${symbol}/${filing.accessionNumber}.htm`,
			}))
			.sort((a, b) => b.filingDate.localeCompare(a.filingDate));
	}

	async getFilingHtml(listing: FilingListing): Promise<string> {
		await this.delay();
		if (this.config.failDownloads.includes(listing.accessionNumber)) {
			throw new FetchError(`Failed to fetch content for ${listing.accessionNumber}`, {
				details: "503 Service Unavailable",
			});
		}
		this.downloads.push(listing.accessionNumber);

		const filing = this.companies[listing.ticker]?.filings.find(
			(candidate) => candidate.accessionNumber === listing.accessionNumber,
		);
		return (
			filing?.html ??
			loadFixture(
				listing.formType === "10-K" ? "sample-10k.html" : "sample-10q.html",
				listing.companyName,
			)
		);
	}

	private async delay(): Promise<void> {
		if (this.config.delayMs > 0) {
			await new Promise((resolve) => setTimeout(resolve, this.config.delayMs));
		}
	}
}

/**
 * Two companies with two 10-Ks and two 10-Qs each.
 */
export function createMockEdgarSource(config?: MockEdgarConfig): MockEdgarSource {
	return new MockEdgarSource(
		{
			ACME: {
				companyName: "Acme Sensors Inc.",
				filings: [
					{ formType: "10-K", filingDate: "2024-02-20", accessionNumber: "0001000001-24-000010" },
					{ formType: "10-K", filingDate: "2023-02-21", accessionNumber: "0001000001-23-000008" },
					{ formType: "10-Q", filingDate: "2024-08-05", accessionNumber: "0001000001-24-000044" },
					{ formType: "10-Q", filingDate: "2024-05-06", accessionNumber: "0001000001-24-000031" },
				],
			},
			BOLT: {
				companyName: "Bolt Water Systems Corp.",
				filings: [
					{ formType: "10-K", filingDate: "2024-03-01", accessionNumber: "0002000002-24-000005" },
					{ formType: "10-K", filingDate: "2023-03-03", accessionNumber: "0002000002-23-000004" },
					{ formType: "10-Q", filingDate: "2024-07-30", accessionNumber: "0002000002-24-000027" },
					{ formType: "10-Q", filingDate: "2024-04-29", accessionNumber: "0002000002-24-000019" },
				],
			},
		},
		config,
	);
}
