import type { DeviceKind, DeviceSnapshot } from "./types";

/**
 * Capability shared by every device model. Implementations keep their own
 * state; there is no common base class.
 */
export interface DeviceControl<S extends DeviceSnapshot = DeviceSnapshot> {
  readonly kind: DeviceKind;
  activate(): void;
  deactivate(): void;
  /** "On" polarity: lit, heating, unlocked or open depending on the device. */
  isActive(): boolean;
  snapshot(): S;
}

export function turnOn<D extends DeviceControl>(device: D): D {
  device.activate();
  return device;
}

export function turnOff<D extends DeviceControl>(device: D): D {
  device.deactivate();
  return device;
}

export function describeState(snapshot: DeviceSnapshot): string {
  switch (snapshot.kind) {
    case "light":
      return snapshot.on ? "on" : "off";
    case "thermostat":
      return `${snapshot.on ? "on" : "off"} at ${snapshot.temperature}`;
    case "smart_lock":
      return snapshot.locked ? "locked" : "unlocked";
    case "garage_door":
      return snapshot.open ? "open" : "closed";
  }
}
