export {
	API_ERROR_CODES,
	type ApiErrorCode,
	BindError,
	DeadlineExceededError,
	type ErrorStatus,
	HandlerFaultError,
	NotFoundError,
	type NotFoundReason,
	ParseError,
	PayloadTooLargeError,
	SessionError,
	statusForError,
	SwitchyardError,
	toError,
	UnavailableError,
} from "./errors";
export { Err, fromPromise, Ok, type Result } from "./result";
