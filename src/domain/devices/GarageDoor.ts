import type { DeviceControl } from "./DeviceControl";
import {
  announceChange,
  resolveDependencies,
  type DeviceDependencies,
  type ResolvedDeviceDependencies,
} from "./DeviceDependencies";
import type { GarageDoorSnapshot } from "./types";

export class GarageDoor implements DeviceControl<GarageDoorSnapshot> {
  readonly kind = "garage_door";
  private open = false;
  private readonly deps: ResolvedDeviceDependencies;

  constructor(deps?: DeviceDependencies) {
    this.deps = resolveDependencies(deps);
  }

  activate(): void {
    this.open = true;
    announceChange(this.deps, "Garage Door is OPEN", this.snapshot());
  }

  deactivate(): void {
    this.open = false;
    announceChange(this.deps, "Garage Door is CLOSED", this.snapshot());
  }

  isOpen(): boolean {
    return this.open;
  }

  isActive(): boolean {
    return this.open;
  }

  snapshot(): GarageDoorSnapshot {
    return Object.freeze({ kind: this.kind, open: this.open });
  }

  clone(): GarageDoor {
    const copy = new GarageDoor(this.deps);
    copy.open = this.open;
    return copy;
  }
}
