import type { LessEqual } from "@bitreg/const-utils";
import { assertNatural, assertAtMost } from "@bitreg/utils";
import type { StorageType } from "./storage.js";

export type CheckMaskWidth<W extends number, B extends number> =
  LessEqual<W, B> extends false ? `mask width exceeds the ${B} bits of its storage type` : W;

//value with the lowest `width` bits set, i.e. (1 << width) - 1
export function bitmask<V, const B extends number, const W extends number>(
  storageType: StorageType<V, string, B>,
  width: CheckMaskWidth<W, B>,
): V {
  assertNatural(width, "Mask width");
  assertAtMost(width, storageType.bits,
    `Mask width ${width} exceeds the ${storageType.bits} bits of ${storageType.name}`
  );
  //adding all ones is subtracting one, and since shl truncates, width === bits works out too
  return storageType.add(
    storageType.shl(storageType.from(1), width),
    storageType.not(storageType.from(0)),
  );
}
