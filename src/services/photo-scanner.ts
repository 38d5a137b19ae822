import fs from "fs";
import path from "path";

export const GENERATE_EXTENSIONS = [".jpg", ".jpeg"];
export const SYNC_EXTENSIONS = [".jpg", ".jpeg", ".nef", ".cr2", ".arw"];

/**
 * Recursively list photo files under `root` with one of `extensions`
 * (compared case-insensitively), sorted by path. Backup copies are skipped.
 */
export async function scanPhotos(
  root: string,
  extensions: string[]
): Promise<string[]> {
  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const dirents = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const dirent of dirents) {
      const fullPath = path.join(dir, dirent.name);
      if (dirent.isDirectory()) {
        await walk(fullPath);
      } else if (
        dirent.isFile() &&
        wanted.has(path.extname(dirent.name).toLowerCase()) &&
        !dirent.name.includes(".backup")
      ) {
        found.push(fullPath);
      }
    }
  };

  await walk(root);
  return found.sort();
}
