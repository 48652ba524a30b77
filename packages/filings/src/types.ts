/**
 * Filings Package Types
 */

import type { FilingIdentifier, FilingInfo, FormType } from "@secsearch/domain";

// ============================================
// Filing Source
// ============================================

/**
 * One filing as listed by the source, before its document is downloaded.
 */
export interface FilingListing extends FilingInfo {
	/** URL of the primary HTML document */
	documentUrl: string;
}

/**
 * Where filings come from. Implemented by EdgarClient; replaced in tests.
 */
export interface EdgarSource {
	/**
	 * All filings of one form for a ticker, newest first.
	 *
	 * @throws FetchError when the ticker is unknown or the listing fails
	 */
	listFilings(ticker: string, formType: FormType): Promise<FilingListing[]>;

	/**
	 * @throws FetchError when the document cannot be downloaded
	 */
	getFilingHtml(listing: FilingListing): Promise<string>;
}

// ============================================
// Fetch Options
// ============================================

export interface FilingFilters {
	/** Single filing year or a list of years */
	year?: number | readonly number[];
	/** Inclusive, YYYY-MM-DD */
	startDate?: string;
	/** Inclusive, YYYY-MM-DD */
	endDate?: string;
}

export interface FetchOptions extends FilingFilters {
	/** Maximum filings; defaults to the configured filing limit */
	count?: number;
}

export interface FetchOneOptions extends FilingFilters {
	/** 0 is the most recent matching filing */
	index?: number;
}

export interface FetchedFiling {
	filingId: FilingIdentifier;
	html: string;
}
