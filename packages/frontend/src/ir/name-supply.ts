/**
 * Fresh temporary and block names for passes that add IR to a function.
 */

import type { BlockId, IrFunction, TempId } from "./types/index.js";
import { definedTemp } from "./types/index.js";

export type NameSupply = {
  readonly temp: (hint: string) => TempId;
  readonly block: (hint: string) => BlockId;
};

const freshName = (
  used: Set<string>,
  counter: { next: number },
  hint: string,
  separator: string
): string => {
  let candidate = `${hint}${separator}${counter.next++}`;
  while (used.has(candidate)) {
    candidate = `${hint}${separator}${counter.next++}`;
  }
  used.add(candidate);
  return candidate;
};

/**
 * A supply that never returns a name already used in `fn`,
 * nor the same name twice.
 */
export const createNameSupply = (fn: IrFunction): NameSupply => {
  const temps = new Set<string>(fn.parameters.map((p) => p.temp));
  const blocks = new Set<string>();
  for (const block of fn.blocks) {
    blocks.add(block.id);
    for (const inst of block.instructions) {
      const dest = definedTemp(inst);
      if (dest !== undefined) {
        temps.add(dest);
      }
    }
  }

  const tempCounter = { next: 0 };
  const blockCounter = { next: 0 };
  return {
    temp: (hint) => freshName(temps, tempCounter, hint, ""),
    block: (hint) => freshName(blocks, blockCounter, hint, "."),
  };
};
