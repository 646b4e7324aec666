/**
 * Persistence of top-level method results, one JSON document per owner and
 * method.
 */
export interface DumpStore {
  /** Absolute directory holding everything archived for the owner. */
  ownerDir(ownerId: number): string;
  writeMethodResult(ownerId: number, method: string, data: unknown): Promise<string>;
  /** Resolves to undefined when the method was never dumped. */
  readMethodResult(ownerId: number, method: string): Promise<unknown>;
}
