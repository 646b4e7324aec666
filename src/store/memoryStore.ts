import path from "node:path";
import { methodResultFileName, ownerDataDir } from "./paths";
import type { DumpStore } from "./types";

export class InMemoryDumpStore implements DumpStore {
  private readonly documents = new Map<string, string>();
  private readonly dataRoot: string;

  constructor(dataRoot = ".") {
    this.dataRoot = dataRoot;
  }

  ownerDir(ownerId: number): string {
    return ownerDataDir(this.dataRoot, ownerId);
  }

  async writeMethodResult(ownerId: number, method: string, data: unknown): Promise<string> {
    const key = path.join(this.ownerDir(ownerId), methodResultFileName(ownerId, method));
    // Serialized so later mutation of `data` does not leak into the store.
    this.documents.set(key, JSON.stringify(data));
    return key;
  }

  async readMethodResult(ownerId: number, method: string): Promise<unknown> {
    const stored = this.documents.get(path.join(this.ownerDir(ownerId), methodResultFileName(ownerId, method)));
    return stored === undefined ? undefined : JSON.parse(stored);
  }

  listMethods(ownerId: number): string[] {
    const prefix = `club${Math.abs(ownerId)}_`;
    return [...this.documents.keys()]
      .map((key) => path.basename(key, ".json"))
      .filter((name) => name.startsWith(prefix))
      .map((name) => name.slice(prefix.length).replace(/_/g, "."));
  }
}
