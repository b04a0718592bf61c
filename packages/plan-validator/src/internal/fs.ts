import * as fsPromises from "node:fs/promises";

export type PlanFileSystem = {
  readFile(path: string, encoding: BufferEncoding): Promise<string>;
  readdir(path: string): Promise<string[]>;
  stat(path: string): Promise<{ isFile(): boolean }>;
};

export const nodeFileSystem: PlanFileSystem = {
  readFile: (path, encoding) => fsPromises.readFile(path, encoding),
  readdir: (path) => fsPromises.readdir(path),
  stat: (path) => fsPromises.stat(path)
};

/**
 * Check if an error is a "file not found" (ENOENT) error.
 */
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
