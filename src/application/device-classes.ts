import type { SensorVariant } from '../domain/index.js';

/**
 * A device class names the variants a reading from such a device must
 * carry before it counts as complete.
 */
export interface DeviceClass {
  readonly name: string;
  /** Devices whose id starts with this prefix belong to the class. */
  readonly device_prefix?: string;
  readonly expected: readonly SensorVariant[];
}

/** Field robots report a GPS fix and canopy temperature per reading. */
export const DEFAULT_DEVICE_CLASS: DeviceClass = {
  name: 'default',
  expected: ['location', 'thermal'],
};

/**
 * Resolves a device id to its class. The longest matching prefix wins;
 * devices matching no prefix fall back to the default class.
 */
export class DeviceClassTable {
  private readonly prefixed: readonly DeviceClass[];

  constructor(
    classes: readonly DeviceClass[] = [],
    private readonly fallback: DeviceClass = DEFAULT_DEVICE_CLASS,
  ) {
    this.prefixed = [...classes]
      .filter((c) => c.device_prefix !== undefined && c.device_prefix !== '')
      .sort((a, b) => (b.device_prefix?.length ?? 0) - (a.device_prefix?.length ?? 0));
  }

  resolve(deviceId: string): DeviceClass {
    return this.prefixed.find((c) => c.device_prefix !== undefined && deviceId.startsWith(c.device_prefix))
      ?? this.fallback;
  }
}
