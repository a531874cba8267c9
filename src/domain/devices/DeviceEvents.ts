import type { EventBus } from "../events/EventBus";
import type { DeviceKind, DeviceSnapshot, TemperatureOutcome } from "./types";

export const DeviceTopics = {
  StateChanged: "device.state_changed",
  CommandRejected: "device.command_rejected",
} as const;

export type DeviceTopic = (typeof DeviceTopics)[keyof typeof DeviceTopics];

export interface DeviceStateChanged {
  kind: DeviceKind;
  message: string;
  snapshot: DeviceSnapshot;
}

export interface DeviceCommandRejected {
  kind: DeviceKind;
  message: string;
  outcome: TemperatureOutcome;
}

export interface DeviceEventPayloads {
  [DeviceTopics.StateChanged]: DeviceStateChanged;
  [DeviceTopics.CommandRejected]: DeviceCommandRejected;
}

export function publishDeviceEvent<T extends DeviceTopic>(
  bus: EventBus | undefined,
  topic: T,
  payload: DeviceEventPayloads[T]
): void {
  bus?.publish(topic, payload);
}
