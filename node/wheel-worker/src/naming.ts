import type { Tag } from './tags.js';

export const WHEEL_EXTENSION = '.whl';
export const DIST_INFO_SUFFIX = '.dist-info';

/** Runs of anything but letters and digits become a single underscore; dots included. */
export function escapeName(name: string): string {
  return name.replace(/[^A-Za-z0-9]+/g, '_');
}

/** Like {@link escapeName} but dots survive, so `1.0-beta` stays `1.0_beta`. */
export function escapeVersion(version: string): string {
  return version.replace(/[^A-Za-z0-9.]+/g, '_');
}

export function distInfoName(name: string, version: string): string {
  return `${escapeName(name)}-${escapeVersion(version)}${DIST_INFO_SUFFIX}`;
}

export function tagString(tag: Tag): string {
  return [tag.interpreter, tag.abi, tag.platform].join('-');
}

export function wheelFileName(name: string, version: string, tag: Tag): string {
  return `${escapeName(name)}-${escapeVersion(version)}-${tagString(tag)}${WHEEL_EXTENSION}`;
}

/** Importable module name derived from a distribution name, e.g. `my-pkg` -> `my_pkg`. */
export function moduleName(name: string): string {
  return name.toLowerCase().replace(/[-_. ]+/g, '_');
}
