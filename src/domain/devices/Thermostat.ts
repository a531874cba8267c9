import type { DeviceControl } from "./DeviceControl";
import {
  announceChange,
  resolveDependencies,
  type DeviceDependencies,
  type ResolvedDeviceDependencies,
} from "./DeviceDependencies";
import { DeviceTopics, publishDeviceEvent } from "./DeviceEvents";
import { DeviceConfigurationError } from "./errors";
import {
  TemperatureStatuses,
  type TemperatureOutcome,
  type ThermostatSnapshot,
} from "./types";

export const DEFAULT_MIN_TEMPERATURE = 10;
export const DEFAULT_MAX_TEMPERATURE = 30;
export const DEFAULT_TEMPERATURE = 20;

export interface ThermostatOptions {
  minTemperature?: number;
  maxTemperature?: number;
  initialTemperature?: number;
}

interface TemperatureRange {
  min: number;
  max: number;
}

function resolveRange(options: ThermostatOptions): TemperatureRange & { initial: number } {
  const min = options.minTemperature ?? DEFAULT_MIN_TEMPERATURE;
  const max = options.maxTemperature ?? DEFAULT_MAX_TEMPERATURE;
  // An unset initial temperature follows a narrowed range; an explicit one must fit it.
  const initial =
    options.initialTemperature ?? Math.min(Math.max(DEFAULT_TEMPERATURE, min), max);

  for (const [label, value] of [
    ["minTemperature", min],
    ["maxTemperature", max],
    ["initialTemperature", initial],
  ] as const) {
    if (!Number.isInteger(value)) {
      throw new DeviceConfigurationError(`Thermostat ${label} must be an integer, got ${value}.`);
    }
  }
  if (min > max) {
    throw new DeviceConfigurationError(
      `Thermostat minTemperature (${min}) must not exceed maxTemperature (${max}).`
    );
  }
  if (initial < min || initial > max) {
    throw new DeviceConfigurationError(
      `Thermostat initialTemperature (${initial}) must be between ${min} and ${max}.`
    );
  }
  return { min, max, initial };
}

export class Thermostat implements DeviceControl<ThermostatSnapshot> {
  readonly kind = "thermostat";
  private on = false;
  private temperature: number;
  private readonly range: TemperatureRange;
  private readonly deps: ResolvedDeviceDependencies;

  constructor(deps?: DeviceDependencies, options: ThermostatOptions = {}) {
    const { min, max, initial } = resolveRange(options);
    this.range = { min, max };
    this.temperature = initial;
    this.deps = resolveDependencies(deps);
  }

  activate(): void {
    this.on = true;
    announceChange(this.deps, "Thermostat is ON", this.snapshot());
  }

  deactivate(): void {
    this.on = false;
    announceChange(this.deps, "Thermostat is OFF", this.snapshot());
  }

  /**
   * Applies a new setpoint. The off check runs before the range check, so an
   * out-of-range value sent to a switched-off thermostat reports `rejected_off`.
   */
  setTemperature(value: number): TemperatureOutcome {
    if (!this.on) {
      return this.reject("Cannot set temperature, thermostat is off.", {
        status: TemperatureStatuses.RejectedOff,
        temperature: this.temperature,
      });
    }

    const { min, max } = this.range;
    if (!Number.isInteger(value) || value < min || value > max) {
      return this.reject(`Invalid temperature. Temperature must be between ${min} and ${max}.`, {
        status: TemperatureStatuses.RejectedOutOfRange,
        temperature: this.temperature,
        min,
        max,
      });
    }

    this.temperature = value;
    announceChange(this.deps, `Thermostat temperature set to: ${value}`, this.snapshot());
    return { status: TemperatureStatuses.Applied, temperature: value };
  }

  getTemperature(): number {
    return this.temperature;
  }

  getRange(): Readonly<TemperatureRange> {
    return { ...this.range };
  }

  isOn(): boolean {
    return this.on;
  }

  isActive(): boolean {
    return this.on;
  }

  snapshot(): ThermostatSnapshot {
    return Object.freeze({ kind: this.kind, on: this.on, temperature: this.temperature });
  }

  clone(): Thermostat {
    const copy = new Thermostat(this.deps, {
      minTemperature: this.range.min,
      maxTemperature: this.range.max,
      initialTemperature: this.temperature,
    });
    copy.on = this.on;
    return copy;
  }

  private reject(message: string, outcome: TemperatureOutcome): TemperatureOutcome {
    this.deps.logger.info(message);
    publishDeviceEvent(this.deps.bus, DeviceTopics.CommandRejected, {
      kind: this.kind,
      message,
      outcome,
    });
    return outcome;
  }
}
