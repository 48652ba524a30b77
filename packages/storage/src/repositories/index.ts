export {
	mapRow,
	mapRows,
	RepositoryError,
	type RepositoryErrorCode,
	whereEquals,
} from "./base.js";
export { type FilingFilters, FilingsRepository } from "./filings.js";
