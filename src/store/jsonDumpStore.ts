import fs from "node:fs";
import path from "node:path";
import { methodResultFileName, ownerDataDir } from "./paths";
import type { DumpStore } from "./types";

export class JsonDumpStore implements DumpStore {
  private readonly dataRoot: string;

  constructor(dataRoot: string) {
    this.dataRoot = dataRoot;
  }

  ownerDir(ownerId: number): string {
    return ownerDataDir(this.dataRoot, ownerId);
  }

  async writeMethodResult(ownerId: number, method: string, data: unknown): Promise<string> {
    const dirName = this.ownerDir(ownerId);
    await fs.promises.mkdir(dirName, { recursive: true });
    const outPath = path.join(dirName, methodResultFileName(ownerId, method));
    const tempPath = `${outPath}.part`;
    await fs.promises.writeFile(tempPath, JSON.stringify(data, null, 4), "utf-8");
    await fs.promises.rename(tempPath, outPath);
    return outPath;
  }

  async readMethodResult(ownerId: number, method: string): Promise<unknown> {
    const inPath = path.join(this.ownerDir(ownerId), methodResultFileName(ownerId, method));
    if (!fs.existsSync(inPath)) {
      return undefined;
    }
    const raw = await fs.promises.readFile(inPath, "utf-8");
    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new Error(`Malformed dump ${inPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
