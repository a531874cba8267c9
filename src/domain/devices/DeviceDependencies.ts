import type { EventBus } from "../events/EventBus";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { ConsoleLogger } from "../../adapters/sys/ConsoleLogger";
import { DeviceTopics, publishDeviceEvent } from "./DeviceEvents";
import type { DeviceSnapshot } from "./types";

export interface DeviceDependencies {
  logger?: LoggerPort;
  bus?: EventBus;
}

export interface ResolvedDeviceDependencies {
  logger: LoggerPort;
  bus?: EventBus;
}

export function resolveDependencies(deps: DeviceDependencies = {}): ResolvedDeviceDependencies {
  return {
    logger: deps.logger ?? new ConsoleLogger(),
    bus: deps.bus,
  };
}

export function announceChange(
  deps: ResolvedDeviceDependencies,
  message: string,
  snapshot: DeviceSnapshot
): void {
  deps.logger.info(message);
  publishDeviceEvent(deps.bus, DeviceTopics.StateChanged, {
    kind: snapshot.kind,
    message,
    snapshot,
  });
}
