export class DeviceConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeviceConfigurationError";
  }
}
