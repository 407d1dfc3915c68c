import { mkdir, rename, writeFile } from "node:fs/promises";
import * as path from "node:path";

export const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const writeJsonAtomic = async (filePath: string, value: unknown): Promise<void> => {
  const tempPath = `${filePath}.tmp`;
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  await rename(tempPath, filePath);
};
