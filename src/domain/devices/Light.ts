import type { DeviceControl } from "./DeviceControl";
import {
  announceChange,
  resolveDependencies,
  type DeviceDependencies,
  type ResolvedDeviceDependencies,
} from "./DeviceDependencies";
import type { LightSnapshot } from "./types";

export class Light implements DeviceControl<LightSnapshot> {
  readonly kind = "light";
  private on = false;
  private readonly deps: ResolvedDeviceDependencies;

  constructor(deps?: DeviceDependencies) {
    this.deps = resolveDependencies(deps);
  }

  activate(): void {
    this.on = true;
    announceChange(this.deps, "Light is ON", this.snapshot());
  }

  deactivate(): void {
    this.on = false;
    announceChange(this.deps, "Light is OFF", this.snapshot());
  }

  isOn(): boolean {
    return this.on;
  }

  isActive(): boolean {
    return this.on;
  }

  snapshot(): LightSnapshot {
    return Object.freeze({ kind: this.kind, on: this.on });
  }

  clone(): Light {
    const copy = new Light(this.deps);
    copy.on = this.on;
    return copy;
  }
}
