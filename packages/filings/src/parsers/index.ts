export { FilingParser, headingLevelOf, ITEM_PATTERN, normalizeText, PART_PATTERN } from "./filing-parser.js";
