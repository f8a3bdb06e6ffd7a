import { promises as fs, type Dirent } from "node:fs";
import path from "node:path";

import { ValidationError, errnoCode } from "./errors.js";
import type { ArtifactFile } from "./integrity.js";

/**
 * Load the regular files of a flat artifact directory. Subdirectories are
 * rejected; hidden files (`.DS_Store`, editor swap files) are skipped.
 */
export async function readArtifactDir(dir: string): Promise<ArtifactFile[]> {
  const root = path.resolve(dir);
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new ValidationError(`Artifact directory does not exist: ${root}`, { field: "artifactDir", path: root });
    }
    throw error;
  }

  const files: ArtifactFile[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    if (entry.isDirectory()) {
      throw new ValidationError(`Artifact directory must be flat; found subdirectory ${entry.name}`, {
        field: "artifactDir",
        path: root,
      });
    }
    if (!entry.isFile()) continue;
    files.push({ name: entry.name, content: await fs.readFile(path.join(root, entry.name)) });
  }
  return files;
}
