import path from "node:path";
import { fileExists } from "./fs";

/**
 * Check if a command is available in one of the search path directories
 *
 * @param command - Executable name, e.g. "mvn"
 * @param searchPath - Directories separated by the platform delimiter (default: $PATH)
 */
export async function commandAvailable(
  command: string,
  searchPath: string = process.env.PATH ?? "",
): Promise<boolean> {
  const directories = searchPath.split(path.delimiter).filter(Boolean);

  for (const directory of directories) {
    if (await fileExists(path.join(directory, command))) {
      return true;
    }
  }

  return false;
}
