/**
 * Core Domain Types
 *
 * Identifiers and value objects shared by the ingestion pipeline, the
 * stores and the search engine.
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { type FormType, normalizeFormType } from "./forms.js";

// ============================================
// Filing Identifier
// ============================================

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const IsoDateSchema = z.string().regex(ISO_DATE_PATTERN, "Expected a YYYY-MM-DD date");

/**
 * Identity of one filing. The accession number is the key shared by the
 * vector store and the metadata registry.
 */
export interface FilingIdentifier {
	readonly ticker: string;
	readonly formType: FormType;
	/** YYYY-MM-DD */
	readonly filingDate: string;
	readonly accessionNumber: string;
}

export interface FilingIdentifierInput {
	ticker: string;
	formType: string;
	filingDate: string;
	accessionNumber: string;
}

/**
 * Build a normalised, frozen identifier (ticker and form uppercased, fields trimmed).
 */
export function createFilingIdentifier(input: FilingIdentifierInput): FilingIdentifier {
	const ticker = input.ticker.trim().toUpperCase();
	const filingDate = input.filingDate.trim();
	const accessionNumber = input.accessionNumber.trim();

	if (ticker.length === 0) {
		throw new ValidationError("Empty ticker");
	}
	if (!ISO_DATE_PATTERN.test(filingDate)) {
		throw new ValidationError(`Invalid filing date: ${input.filingDate}`, {
			details: "Expected YYYY-MM-DD.",
		});
	}
	if (accessionNumber.length === 0) {
		throw new ValidationError("Empty accession number");
	}

	return Object.freeze({
		ticker,
		formType: normalizeFormType(input.formType),
		filingDate,
		accessionNumber,
	});
}

export function filingIdentifiersEqual(a: FilingIdentifier, b: FilingIdentifier): boolean {
	return (
		a.ticker === b.ticker &&
		a.formType === b.formType &&
		a.filingDate === b.filingDate &&
		a.accessionNumber === b.accessionNumber
	);
}

export function formatFilingIdentifier(id: FilingIdentifier): string {
	return `${id.ticker} ${id.formType} ${id.filingDate} (${id.accessionNumber})`;
}

// ============================================
// Segments and Chunks
// ============================================

export const CONTENT_TYPES = ["text", "textsmall", "table"] as const;
export const ContentTypeSchema = z.enum(CONTENT_TYPES);
export type ContentType = z.infer<typeof ContentTypeSchema>;

/** Path used for content that appears before any section heading */
export const ROOT_PATH = "(root)";

/** Separator between levels of a section path */
export const PATH_SEPARATOR = " > ";

export interface Segment {
	path: string;
	contentType: ContentType;
	content: string;
	filingId: FilingIdentifier;
}

export interface Chunk {
	content: string;
	path: string;
	contentType: ContentType;
	filingId: FilingIdentifier;
	/** Position within the whole filing, contiguous from 0 */
	chunkIndex: number;
}

/**
 * Storage id of a chunk.
 *
 * @example
 * createChunkId(id, 7) // "AAPL_10-K_2024-11-01_007"
 */
export function createChunkId(filingId: FilingIdentifier, chunkIndex: number): string {
	const paddedIndex = chunkIndex.toString().padStart(3, "0");
	return `${filingId.ticker}_${filingId.formType}_${filingId.filingDate}_${paddedIndex}`;
}

export interface ChunkMetadata {
	path: string;
	contentType: ContentType;
	ticker: string;
	formType: FormType;
	filingDate: string;
	accessionNumber: string;
}

export function chunkMetadata(chunk: Chunk): ChunkMetadata {
	return {
		path: chunk.path,
		contentType: chunk.contentType,
		ticker: chunk.filingId.ticker,
		formType: chunk.filingId.formType,
		filingDate: chunk.filingId.filingDate,
		accessionNumber: chunk.filingId.accessionNumber,
	};
}

// ============================================
// Pipeline Results
// ============================================

export interface IngestResult {
	filingId: FilingIdentifier;
	segmentCount: number;
	chunkCount: number;
	durationSeconds: number;
}

/**
 * Output of the orchestrator for one filing, ready to be written to both stores.
 */
export interface ProcessedFiling {
	filingId: FilingIdentifier;
	segments: Segment[];
	chunks: Chunk[];
	/** One vector per chunk, in chunk order */
	embeddings: number[][];
	ingestResult: IngestResult;
}

/**
 * Lightweight filing preview (no document content).
 */
export interface FilingInfo {
	ticker: string;
	formType: FormType;
	filingDate: string;
	accessionNumber: string;
	companyName: string;
}

// ============================================
// Registry and Search
// ============================================

export interface FilingRecord {
	id: number;
	ticker: string;
	formType: FormType;
	filingDate: string;
	accessionNumber: string;
	chunkCount: number;
	/** ISO-8601 timestamp */
	ingestedAt: string;
}

export interface SearchResult {
	content: string;
	path: string;
	contentType: ContentType;
	ticker: string;
	formType: FormType;
	/** 1 - cosine distance */
	similarity: number;
	filingDate: string;
	accessionNumber: string;
	chunkId: string;
}

/** Path reported for results whose stored path is missing */
export const UNKNOWN_PATH = "(unknown)";
