import type { AppContext } from "../app/context.js";
import { describeSource, type PackageSpec } from "../core/config.js";

export function listCommand(appContext: AppContext): void {
  const { packages } = appContext.config;
  if (packages.length === 0) {
    console.log(`No packages configured in ${appContext.configPath}.`);
    return;
  }

  for (const spec of packages) {
    console.log(formatPackageLine(spec));
  }
}

export function formatPackageLine(spec: PackageSpec): string {
  const subtree = spec.extract_path === "." ? "" : `:${spec.extract_path}`;
  return `${spec.name}@${spec.version}  ${describeSource(spec.source)}${subtree}`;
}
