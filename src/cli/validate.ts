import type { AppContext } from "../app/context.js";

export function validateCommand(appContext: AppContext): void {
  const count = appContext.config.packages.length;
  console.log(`Config OK: ${appContext.configPath}`);
  console.log(`${count} package(s); output ${appContext.outputDir}`);
}
