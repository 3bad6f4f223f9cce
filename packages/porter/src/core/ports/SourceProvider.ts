import type { Result } from "@portwright/core";
import type { PortSymbol } from "../model.js";

/**
 * Supplies the original definition text of a symbol.
 */
export interface SourceProvider {
  read(symbol: PortSymbol): Result<string, Error>;
}
