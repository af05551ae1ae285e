export {
	type BluezAdapter,
	type BluezAdapterOptions,
	type BluezDeviceHandle,
	createBluezAdapter,
} from "./bluez";
