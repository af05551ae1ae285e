export {
	AbortError,
	type ConnectFailureKind,
	ConnectionError,
	classifyConnectError,
	DecodeError,
	type DecodeErrorReason,
	DeviceNotFoundError,
	FastFailError,
	type FrameHeader,
	isTransientBLEError,
	NotConnectedError,
	normalizeError,
	SubscriptionError,
	TimeoutError,
	throwIfAborted,
	TransportConnectError,
	withTimeout,
} from "./errors";
