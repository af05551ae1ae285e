export {
	copyFrame,
	readByteChecked,
	readUint16LEChecked,
	toHex,
	toHexByte,
} from "./buffer";

export {
	createConsoleLogger,
	LOG_PREFIX,
	type Logger,
	silentLogger,
} from "./logger";

export {
	BLUETOOTH_UUID_BASE,
	normalizeUuid,
	toFullUuid,
	uuidMatches,
} from "./uuid";
