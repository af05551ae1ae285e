export * from "./constants";
export {
	type BuzzerResponse,
	decodeFrame,
	isDecodeError,
	type ParsedResponse,
	type SensorResponse,
} from "./decoder";
export {
	encodeBuzzerQuery,
	encodeBuzzerSet,
	encodeReadSensorRequest,
} from "./requests";
export {
	applyTransform,
	DEFAULT_SENSOR_IDS,
	getSensor,
	isSensorId,
	SENSORS,
	type SensorDescriptor,
	type SensorId,
	type SensorKey,
	type SensorTransform,
	sensorLabel,
} from "./sensors";
