import type { PackageSpec } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// No names selects every configured package, in config order.
export function selectPackages(packages: PackageSpec[], names: string[]): PackageSpec[] {
  if (names.length === 0) return packages;

  const byName = new Map(packages.map((pkg) => [pkg.name, pkg]));
  const unknown = names.filter((name) => !byName.has(name));
  if (unknown.length > 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Unknown package.",
      message: `Not defined in the mirror config: ${unknown.join(", ")}.`,
      hint: "Run `upm-mirror list` to see configured packages.",
    });
  }

  const wanted = new Set(names);
  return packages.filter((pkg) => wanted.has(pkg.name));
}

export function shortRef(ref: string): string {
  return ref.slice(0, 12);
}
