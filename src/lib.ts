export {
	type Archive,
	type ArchiveEntry,
	ArchiveError,
	type ArchiveErrorKind,
	type ArchiveFormat,
	extractAll,
	type OpenOptions,
	type RandomAccessSource,
	resolveEntryDestination,
} from "./archive/archive.js";
export { decompose, formatComponents, hostPlatform, separatorFor } from "./core/components.js";
export { InvalidInputError, isInvalidInputError } from "./core/errors.js";
export {
	emitComponents,
	isSanitizedPath,
	type RawPath,
	resolveEmitted,
	SanitizedPath,
	type SanitizeResult,
	safeSanitize,
	sanitize,
} from "./core/sanitize.js";
export type {
	NulBytePolicy,
	PathComponent,
	PathPlatform,
	SanitizeOptions,
	SanitizeReport,
} from "./core/types.js";
