import type { DeviceControl } from "./DeviceControl";
import {
  announceChange,
  resolveDependencies,
  type DeviceDependencies,
  type ResolvedDeviceDependencies,
} from "./DeviceDependencies";
import type { SmartLockSnapshot } from "./types";

/** Activating a lock unlocks it; a new lock starts out locked. */
export class SmartLock implements DeviceControl<SmartLockSnapshot> {
  readonly kind = "smart_lock";
  private locked = true;
  private readonly deps: ResolvedDeviceDependencies;

  constructor(deps?: DeviceDependencies) {
    this.deps = resolveDependencies(deps);
  }

  activate(): void {
    this.locked = false;
    announceChange(this.deps, "Smart Lock is UNLOCKED", this.snapshot());
  }

  deactivate(): void {
    this.locked = true;
    announceChange(this.deps, "Smart Lock is LOCKED", this.snapshot());
  }

  isLocked(): boolean {
    return this.locked;
  }

  isActive(): boolean {
    return !this.locked;
  }

  snapshot(): SmartLockSnapshot {
    return Object.freeze({ kind: this.kind, locked: this.locked });
  }

  clone(): SmartLock {
    const copy = new SmartLock(this.deps);
    copy.locked = this.locked;
    return copy;
  }
}
