export type DeviceKind = "light" | "thermostat" | "smart_lock" | "garage_door";

export interface LightSnapshot {
  readonly kind: "light";
  readonly on: boolean;
}

export interface ThermostatSnapshot {
  readonly kind: "thermostat";
  readonly on: boolean;
  readonly temperature: number;
}

export interface SmartLockSnapshot {
  readonly kind: "smart_lock";
  readonly locked: boolean;
}

export interface GarageDoorSnapshot {
  readonly kind: "garage_door";
  readonly open: boolean;
}

export type DeviceSnapshot =
  | LightSnapshot
  | ThermostatSnapshot
  | SmartLockSnapshot
  | GarageDoorSnapshot;

export const DEVICE_LABELS: Record<DeviceKind, string> = {
  light: "Light",
  thermostat: "Thermostat",
  smart_lock: "Smart Lock",
  garage_door: "Garage Door",
};

export const TemperatureStatuses = {
  Applied: "applied",
  RejectedOff: "rejected_off",
  RejectedOutOfRange: "rejected_out_of_range",
} as const;

export type TemperatureStatus = (typeof TemperatureStatuses)[keyof typeof TemperatureStatuses];

export type TemperatureOutcome =
  | { status: typeof TemperatureStatuses.Applied; temperature: number }
  | { status: typeof TemperatureStatuses.RejectedOff; temperature: number }
  | {
      status: typeof TemperatureStatuses.RejectedOutOfRange;
      temperature: number;
      min: number;
      max: number;
    };
