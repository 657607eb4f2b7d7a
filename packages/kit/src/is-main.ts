import { pathToFileURL } from "node:url";

/** True when the module at `importMetaUrl` is the script node was started with. */
export function isMainModule(importMetaUrl: string, argv1: string | undefined = process.argv[1]): boolean {
  if (!argv1) return false;
  return importMetaUrl === pathToFileURL(argv1).href;
}
