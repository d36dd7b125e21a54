import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { SENSOR_VARIANTS } from '../../domain/index.js';
import { DEFAULT_DEVICE_CLASS, DeviceClassTable } from '../../application/device-classes.js';
import type { DeviceClass } from '../../application/device-classes.js';
import { ConfigError } from './bridge-config.js';

const deviceClassSchema = z.object({
  name: z.string().min(1).max(64),
  device_prefix: z.string().min(1).optional(),
  expected: z.array(z.enum(SENSOR_VARIANTS)).min(1),
});

const deviceClassFileSchema = z.object({
  default: deviceClassSchema.omit({ device_prefix: true }).optional(),
  classes: z.array(deviceClassSchema).default([]),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Loads the device-class table from a JSON file (relative paths resolve
 * against the working directory). A missing file yields the built-in
 * default class; an invalid one throws `ConfigError`.
 */
export function loadDeviceClasses(path: string, log: Logger): DeviceClassTable {
  const fullPath = resolve(process.cwd(), path);

  let text: string;
  try {
    text = readFileSync(fullPath, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      log.info({ path: fullPath }, 'No device-class file, using the default class');
      return new DeviceClassTable();
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigError([`${fullPath}: not valid JSON (${err instanceof Error ? err.message : String(err)})`]);
  }

  const parsed = deviceClassFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${fullPath} ${i.path.join('.')}: ${i.message}`));
  }

  const classes: DeviceClass[] = parsed.data.classes;
  const fallback: DeviceClass = parsed.data.default ?? DEFAULT_DEVICE_CLASS;
  log.info(
    { path: fullPath, classes: classes.map((c) => c.name), default: fallback.name },
    'Device classes loaded',
  );
  return new DeviceClassTable(classes, fallback);
}
