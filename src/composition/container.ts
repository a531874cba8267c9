import { loadConfig, type AppConfig } from '../config';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { SimpleEventBus } from '../adapters/sys/SimpleEventBus';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import {
  DeviceTopics,
  GarageDoor,
  Light,
  SmartLock,
  Thermostat,
  DEVICE_LABELS,
  describeState,
  type DeviceStateChanged,
} from '../domain/devices';
import { DeviceScenario, type ScenarioDevices, type ScenarioReport } from '../app/DeviceScenario';

export interface ApplicationOptions {
  configPath?: string;
  debug?: boolean;
  logger?: LoggerPort;
}

export interface ApplicationInstance {
  readonly config: AppConfig;
  readonly devices: ScenarioDevices;
  run(): ScenarioReport;
  shutdown(): void;
}

export function buildApplication(options: ApplicationOptions = {}): ApplicationInstance {
  const logger = options.logger ?? new ConsoleLogger({ debugEnabled: options.debug });
  const { config, path: configPath } = loadConfig(options.configPath, logger);
  if (configPath) {
    logger.debug(`Loaded config from ${configPath}`);
  } else if (options.configPath) {
    logger.warn(`Config file ${options.configPath} not found; proceeding with defaults.`);
  }

  const bus = new SimpleEventBus(logger);
  const deps = { logger, bus };

  const devices: ScenarioDevices = {
    light: new Light(deps),
    thermostat: new Thermostat(deps, config.thermostat),
    smartLock: new SmartLock(deps),
    garageDoor: new GarageDoor(deps),
  };

  const stateTrace = bus.subscribe<DeviceStateChanged>(DeviceTopics.StateChanged, (event) => {
    logger.debug(`[state] ${DEVICE_LABELS[event.kind]} -> ${describeState(event.snapshot)}`);
  });

  const scenario = new DeviceScenario(devices, logger);

  return {
    config,
    devices,
    run: () => scenario.run(),
    shutdown: () => {
      stateTrace.unsubscribe();
    },
  };
}
