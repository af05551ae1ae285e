export {
	connectWithRetry,
	DEFAULT_READ_TIMEOUT_MS,
	DEFAULT_WRITE_TIMEOUT_MS,
	type RetryOptions,
	readWithTimeout,
	withRetry,
	writeWithTimeout,
} from "./transport";
