export { turnOn, turnOff, describeState, type DeviceControl } from "./DeviceControl";
export {
  DeviceTopics,
  publishDeviceEvent,
  type DeviceTopic,
  type DeviceEventPayloads,
  type DeviceStateChanged,
  type DeviceCommandRejected,
} from "./DeviceEvents";
export type { DeviceDependencies } from "./DeviceDependencies";
export { DeviceConfigurationError } from "./errors";
export { Light } from "./Light";
export { Thermostat, type ThermostatOptions } from "./Thermostat";
export { SmartLock } from "./SmartLock";
export { GarageDoor } from "./GarageDoor";
export * from "./types";
