import type { LoggerPort } from "../ports/sys/LoggerPort";
import {
  turnOff,
  turnOn,
  type GarageDoor,
  type Light,
  type SmartLock,
  type TemperatureStatus,
  type Thermostat,
} from "../domain/devices";

export interface ScenarioDevices {
  light: Light;
  thermostat: Thermostat;
  smartLock: SmartLock;
  garageDoor: GarageDoor;
}

export interface ScenarioReport {
  checks: string[];
}

export class ScenarioCheckError extends Error {
  constructor(readonly check: string, detail: string) {
    super(`Device check failed: ${check} (${detail})`);
    this.name = "ScenarioCheckError";
  }
}

const PREFERRED_SETPOINT = 25;

/**
 * Drives each device through its on/off cycle and the thermostat through its
 * guard conditions, stopping at the first observed state that does not match.
 */
export class DeviceScenario {
  private readonly passed: string[] = [];

  constructor(
    private readonly devices: ScenarioDevices,
    private readonly logger: LoggerPort
  ) {}

  run(): ScenarioReport {
    this.passed.length = 0;
    this.runLight();
    this.runThermostat();
    this.runSmartLock();
    this.runGarageDoor();
    return { checks: [...this.passed] };
  }

  private runLight() {
    const { light } = this.devices;
    this.expect("light starts off", light.isOn(), false);
    turnOn(light);
    this.expect("light turns on", light.isOn(), true);
    turnOff(light);
    this.expect("light turns off", light.isOn(), false);
  }

  private runThermostat() {
    const { thermostat } = this.devices;
    const { min, max } = thermostat.getRange();
    const initial = thermostat.getTemperature();
    const setpoint = Math.min(Math.max(PREFERRED_SETPOINT, min), max);

    this.expect("thermostat starts off", thermostat.isOn(), false);
    this.expectStatus("thermostat ignores setpoint while off", thermostat.setTemperature(setpoint).status, "rejected_off");
    this.expect("thermostat keeps initial temperature", thermostat.getTemperature(), initial);

    turnOn(thermostat);
    this.expect("thermostat turns on", thermostat.isOn(), true);

    this.expectStatus("thermostat rejects below range", thermostat.setTemperature(min - 1).status, "rejected_out_of_range");
    this.expectStatus("thermostat rejects above range", thermostat.setTemperature(max + 1).status, "rejected_out_of_range");
    this.expectStatus("thermostat accepts lower bound", thermostat.setTemperature(min).status, "applied");
    this.expectStatus("thermostat accepts upper bound", thermostat.setTemperature(max).status, "applied");

    thermostat.setTemperature(setpoint);
    this.expect("thermostat applies setpoint", thermostat.getTemperature(), setpoint);

    turnOff(thermostat);
    thermostat.setTemperature(max);
    this.expect("thermostat holds setpoint once off", thermostat.getTemperature(), setpoint);
  }

  private runSmartLock() {
    const { smartLock } = this.devices;
    this.expect("smart lock starts locked", smartLock.isLocked(), true);
    turnOn(smartLock);
    this.expect("smart lock unlocks", smartLock.isLocked(), false);
    turnOff(smartLock);
    this.expect("smart lock locks", smartLock.isLocked(), true);
  }

  private runGarageDoor() {
    const { garageDoor } = this.devices;
    this.expect("garage door starts closed", garageDoor.isOpen(), false);
    turnOn(garageDoor);
    this.expect("garage door opens", garageDoor.isOpen(), true);
    turnOff(garageDoor);
    this.expect("garage door closes", garageDoor.isOpen(), false);
  }

  private expectStatus(check: string, actual: TemperatureStatus, expected: TemperatureStatus) {
    this.expect(check, actual, expected);
  }

  private expect<T extends boolean | number | string>(check: string, actual: T, expected: T) {
    if (actual !== expected) {
      throw new ScenarioCheckError(check, `expected ${String(expected)}, got ${String(actual)}`);
    }
    this.passed.push(check);
    this.logger.debug(`[check] ${check}`);
  }
}
