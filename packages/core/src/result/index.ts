export {
	ConfigurationError,
	JobStoreError,
	LocalCommitError,
	TimeoutError,
	TrackLinkError,
	toError,
} from "./errors";
export {
	Err,
	Ok,
	type Result,
	unwrapOrThrow,
} from "./result";
