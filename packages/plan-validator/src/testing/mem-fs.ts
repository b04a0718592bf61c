import { Volume, createFsFromVolume } from "memfs";
import type { PlanFileSystem } from "../internal/fs.js";

export function createMemFs(files: Record<string, string> = {}): PlanFileSystem {
  const vol = Volume.fromJSON(files, "/");
  return createFsFromVolume(vol).promises as unknown as PlanFileSystem;
}
