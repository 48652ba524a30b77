/**
 * Filing Parser
 *
 * Turns 10-K/10-Q HTML into ordered segments with hierarchical section
 * paths ("Part II > Item 7. Management's Discussion ... > Liquidity").
 */

import * as cheerio from "cheerio";
import {
	type ContentType,
	type FilingIdentifier,
	PATH_SEPARATOR,
	ParseError,
	ROOT_PATH,
	type Segment,
} from "@secsearch/domain";
import { log } from "../logger.js";

// ============================================
// Patterns
// ============================================

/** Leaf blocks visited in document order */
const BLOCK_SELECTOR = "p, div, li, h1, h2, h3, h4, h5, h6, table";

const HEADING_SELECTOR = "h1, h2, h3, h4, h5, h6";

const EMPHASIS_SELECTOR = [
	"b",
	"strong",
	"[style*='font-weight:bold']",
	"[style*='font-weight: bold']",
	"[style*='font-weight:700']",
	"[style*='font-weight: 700']",
].join(", ");

/** Content never shown to readers (scripts, inline XBRL header, hidden blocks) */
const IGNORED_SELECTOR = [
	"script",
	"style",
	"head",
	"noscript",
	"ix\\:header",
	"[style*='display:none']",
	"[style*='display: none']",
].join(", ");

export const PART_PATTERN = /^part\s+(i{1,3}|iv)\b/i;
export const ITEM_PATTERN = /^item\s+\d{1,2}[a-c]?\b/i;

const FOOTNOTE_PATTERN = /^(\(\d{1,2}\)|\*{1,3}|†|‡)\s/;
const FONT_SIZE_PATTERN = /font-size:\s*([\d.]+)\s*(pt|px)/i;

const MAX_HEADING_LENGTH = 200;
const MAX_TITLE_WORDS = 20;
const SMALL_FONT_PT = 10;

type HeadingLevel = "part" | "item" | "title";

// ============================================
// Helpers
// ============================================

export function normalizeText(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}

function fontSizeInPoints(style: string | undefined): number | null {
	const match = style ? FONT_SIZE_PATTERN.exec(style) : null;
	if (!match?.[1]) {
		return null;
	}
	const size = Number.parseFloat(match[1]);
	return match[2]?.toLowerCase() === "px" ? size * 0.75 : size;
}

/**
 * Part/Item headings recognised from text alone.
 */
export function headingLevelOf(text: string): HeadingLevel | null {
	if (text.length === 0 || text.length > MAX_HEADING_LENGTH) {
		return null;
	}
	// Cross-references such as "Item 7 discusses liquidity." are sentences, not headings
	const sentence = /[.;:]$/.test(text) && text.length > 20;
	if (sentence) {
		return null;
	}
	if (PART_PATTERN.test(text)) {
		return "part";
	}
	if (ITEM_PATTERN.test(text)) {
		return "item";
	}
	return null;
}

/**
 * h1-h6 and short fully-bold blocks open a sub-section.
 */
function styledHeadingLevel(
	text: string,
	headingTag: boolean,
	emphasised: boolean,
): HeadingLevel | null {
	if (headingTag) {
		return "title";
	}
	if (!emphasised || text.split(" ").length > MAX_TITLE_WORDS || /[.;,]$/.test(text)) {
		return null;
	}
	return "title";
}

/**
 * Text sitting directly in a container next to block children would be
 * skipped with the container; wrap each such run in its own paragraph.
 */
function wrapLooseText($: cheerio.CheerioAPI): void {
	$("body")
		.add($("body").find("div, li"))
		.each((_, element) => {
			const $container = $(element);
			if ($container.parents("table").length > 0) {
				return;
			}
			const nodes = $container.contents();
			const blocks = nodes.toArray().map((node) => $(node).is(BLOCK_SELECTOR));
			if (!blocks.includes(true)) {
				return;
			}

			const runs: Array<[number, number]> = [];
			let start = -1;
			blocks.forEach((block, index) => {
				if (!block && start < 0) {
					start = index;
				} else if (block && start >= 0) {
					runs.push([start, index]);
					start = -1;
				}
			});
			if (start >= 0) {
				runs.push([start, blocks.length]);
			}

			for (const [from, to] of runs) {
				const run = nodes.slice(from, to);
				if (normalizeText(run.text())) {
					run.wrapAll("<p></p>");
				}
			}
		});
}

/**
 * Tracks the current Part / Item / title and renders the section path.
 */
class SectionPath {
	private part: string | null = null;
	private item: string | null = null;
	private title: string | null = null;

	enter(level: HeadingLevel, text: string): void {
		switch (level) {
			case "part":
				this.part = text;
				this.item = null;
				this.title = null;
				break;
			case "item":
				this.item = text;
				this.title = null;
				break;
			case "title":
				this.title = text;
				break;
		}
	}

	toString(): string {
		const levels = [this.part, this.item, this.title].filter(
			(level): level is string => level !== null,
		);
		return levels.length > 0 ? levels.join(PATH_SEPARATOR) : ROOT_PATH;
	}
}

// ============================================
// Parser Class
// ============================================

/**
 * @example
 * ```typescript
 * const parser = new FilingParser();
 * const segments = parser.parse(html, filingId);
 * ```
 */
export class FilingParser {
	/**
	 * @throws ParseError for empty input or when nothing could be extracted
	 */
	parse(html: string, filingId: FilingIdentifier): Segment[] {
		if (!html.trim()) {
			throw new ParseError("Empty HTML content", {
				details: "Cannot parse empty or whitespace-only content.",
			});
		}

		log.info(
			{ ticker: filingId.ticker, formType: filingId.formType, characters: html.length },
			"Parsing filing",
		);

		// Forgiving mode handles malformed EDGAR HTML
		const $ = cheerio.load(html, { xml: false });
		$(IGNORED_SELECTOR).remove();
		wrapLooseText($);

		const segments: Segment[] = [];
		const section = new SectionPath();

		const emit = (contentType: ContentType, content: string): void => {
			segments.push({ path: section.toString(), contentType, content, filingId });
		};

		$("body")
			.find(BLOCK_SELECTOR)
			.each((_, element) => {
				const $el = $(element);

				// Table cells are rendered with their table
				if ($el.parents("table").length > 0) {
					return;
				}

				if ($el.is("table")) {
					const rows: string[] = [];
					$el.find("tr").each((_, row) => {
						const cells = $(row)
							.find("td, th")
							.map((_, cell) => normalizeText($(cell).text()))
							.get()
							.filter((cell) => cell.length > 0);
						if (cells.length > 0) {
							rows.push(cells.join(" | "));
						}
					});

					// Single-row layout tables often hold "Item 7. | Management's Discussion ..."
					const only = rows.length === 1 ? (rows[0] ?? "").replace(/ \| /g, " ") : "";
					const layoutHeading = only ? headingLevelOf(only) : null;
					if (layoutHeading) {
						section.enter(layoutHeading, only);
					} else if (rows.length > 0) {
						emit("table", rows.join("\n"));
					}
					return;
				}

				// Containers are visited through their children
				if ($el.find(BLOCK_SELECTOR).length > 0) {
					return;
				}

				const text = normalizeText($el.text());
				if (!text) {
					return;
				}

				const plain = $el.clone();
				plain.find(EMPHASIS_SELECTOR).remove();
				const emphasised =
					$el.is(EMPHASIS_SELECTOR) ||
					($el.find(EMPHASIS_SELECTOR).length > 0 && normalizeText(plain.text()) === "");

				const heading =
					headingLevelOf(text) ?? styledHeadingLevel(text, $el.is(HEADING_SELECTOR), emphasised);
				if (heading) {
					section.enter(heading, text);
					return;
				}

				const fontSizes: number[] = [];
				$el.add($el.find("[style]")).each((_, node) => {
					const size = fontSizeInPoints($(node).attr("style"));
					if (size !== null) {
						fontSizes.push(size);
					}
				});
				const unwrapped = $el.clone();
				unwrapped.find("small").remove();
				const small =
					($el.find("small").length > 0 && normalizeText(unwrapped.text()) === "") ||
					(fontSizes.length > 0 && Math.max(...fontSizes) < SMALL_FONT_PT) ||
					FOOTNOTE_PATTERN.test(text);

				emit(small ? "textsmall" : "text", text);
			});

		if (segments.length === 0) {
			throw new ParseError("No segments extracted from HTML", {
				details: "The document structure may be unsupported.",
			});
		}

		log.info(
			{ ticker: filingId.ticker, formType: filingId.formType, segments: segments.length },
			"Extracted segments",
		);

		return segments;
	}
}
