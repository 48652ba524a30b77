/**
 * Chunker Tests
 */

import { ChunkingError, createFilingIdentifier, type Segment } from "@secsearch/domain";
import { describe, expect, test } from "vitest";
import { Chunker, countTokens, splitSentences } from "./chunker.js";

const filingId = createFilingIdentifier({
	ticker: "MSFT",
	formType: "10-Q",
	filingDate: "2024-10-30",
	accessionNumber: "0000950170-24-118967",
});

function segment(content: string, path = "Part I > Item 2"): Segment {
	return { path, contentType: "text", content, filingId };
}

/** n sentences of five words each */
function sentences(n: number): string {
	return Array.from({ length: n }, (_, i) => `Sentence ${i} has five words.`).join(" ");
}

// ============================================
// Token counting
// ============================================

describe("countTokens", () => {
	test("counts whitespace-separated words", () => {
		expect(countTokens("Revenue grew  12%\nyear over year")).toBe(6);
	});

	test("handles empty and blank strings", () => {
		expect(countTokens("")).toBe(0);
		expect(countTokens("   \n\t")).toBe(0);
	});
});

describe("splitSentences", () => {
	test("splits after terminal punctuation", () => {
		expect(splitSentences("Sales rose. Costs fell! Why? Margins improved")).toEqual([
			"Sales rose.",
			"Costs fell!",
			"Why?",
			"Margins improved",
		]);
	});

	test("keeps decimals intact", () => {
		expect(splitSentences("Revenue was $4.5 billion. Up 3.2%.")).toEqual([
			"Revenue was $4.5 billion.",
			"Up 3.2%.",
		]);
	});
});

// ============================================
// Chunker
// ============================================

describe("Chunker", () => {
	test("keeps a segment at the limit as one unchanged chunk", () => {
		const chunker = new Chunker({ tokenLimit: 10, tolerance: 0 });
		const content = sentences(2); // 10 tokens

		const chunks = chunker.chunk([segment(content)]);

		expect(chunks).toHaveLength(1);
		expect(chunks[0]?.content).toBe(content);
		expect(chunks[0]?.path).toBe("Part I > Item 2");
		expect(chunks[0]?.chunkIndex).toBe(0);
	});

	test("splits long segments on sentence boundaries within limit + tolerance", () => {
		const chunker = new Chunker({ tokenLimit: 10, tolerance: 5 });

		// 5 sentences x 5 tokens = 25 tokens; at most 15 tokens (3 sentences) per chunk
		const chunks = chunker.chunk([segment(sentences(5))]);

		expect(chunks.map((chunk) => countTokens(chunk.content))).toEqual([15, 10]);
		expect(chunks[0]?.content).toBe(
			"Sentence 0 has five words. Sentence 1 has five words. Sentence 2 has five words.",
		);
	});

	test("never emits an empty chunk for an oversized sentence", () => {
		const chunker = new Chunker({ tokenLimit: 3, tolerance: 0 });
		const long = "one two three four five six.";

		const chunks = chunker.chunk([segment(`${long} ${long}`)]);

		expect(chunks.map((chunk) => chunk.content)).toEqual([long, long]);
	});

	test("numbers chunks contiguously across segments", () => {
		const chunker = new Chunker({ tokenLimit: 10, tolerance: 0 });

		const chunks = chunker.chunk([
			segment(sentences(4), "Part I > Item 1"),
			segment("A short table note.", "Part I > Item 1A"),
			segment(sentences(3), "Part II > Item 7"),
		]);

		expect(chunks.map((chunk) => chunk.chunkIndex)).toEqual([0, 1, 2, 3, 4]);
		expect(chunks.map((chunk) => chunk.path)).toEqual([
			"Part I > Item 1",
			"Part I > Item 1",
			"Part I > Item 1A",
			"Part II > Item 7",
			"Part II > Item 7",
		]);
	});

	test("carries content type and filing id", () => {
		const chunker = new Chunker();
		const table: Segment = {
			path: "(root)",
			contentType: "table",
			content: "Revenue | 100 | 90",
			filingId,
		};

		const [chunk] = chunker.chunk([table]);

		expect(chunk?.contentType).toBe("table");
		expect(chunk?.filingId).toBe(filingId);
	});

	test("uses 500/50 defaults", () => {
		const chunker = new Chunker();
		expect(chunker.tokenLimit).toBe(500);
		expect(chunker.tolerance).toBe(50);
	});

	test("rejects an empty segment list", () => {
		const chunker = new Chunker();
		expect(() => chunker.chunk([])).toThrow(ChunkingError);
		expect(() => chunker.chunk([])).toThrow("No segments to chunk");
	});
});
