import type { Opts, RoArray, ToNumber } from "@bitreg/const-utils";
import { definedOrThrow, hex, bignum } from "@bitreg/utils";
import type { AnyLayout, Bitwidths, StoragePreference } from "./layout.js";
import { fieldOffsets } from "./layout.js";
import type {
  StorageType,
  StorageValueOf,
  StorageSelector,
  DefaultStorage,
  LayoutStorage,
  CheckStorage,
} from "./storage.js";
import { selectStorage, resolveStorage } from "./storage.js";
import { bitmask } from "./bitmask.js";
import { defaultDebugAssertions } from "./config.js";

//number literals or members of a numeric enum (or `as const` object) with the same values
export type FieldIndex<L extends AnyLayout> = Extract<
  number extends L["fieldWidths"]["length"] ? number : Indices<L["fieldWidths"]>,
  number
>;

type Indices<W extends Bitwidths> =
  W extends readonly [...infer Init extends Bitwidths, number]
  ? Init["length"] | Indices<Init>
  : never;

export type FieldWidth<L extends AnyLayout, I extends number> = L["fieldWidths"][ToNumber<I>];

//fields use the storage type the default selector picks for their own width
export type FieldStorage<L extends AnyLayout, I extends number> =
  DefaultStorage<L["preference"], FieldWidth<L, I>>;

export type FieldValue<L extends AnyLayout, I extends number> = StorageValueOf<FieldStorage<L, I>>;

type FieldValuesOf<P extends StoragePreference, W extends Bitwidths> = {
  -readonly [K in keyof W]: W[K] extends infer FW extends number
    ? StorageValueOf<DefaultStorage<P, FW>>
    : never
};

export type FieldValues<L extends AnyLayout> = FieldValuesOf<L["preference"], L["fieldWidths"]>;

export interface Bitpack<L extends AnyLayout = AnyLayout, V = unknown> {
  storage: V;
  get<const I extends FieldIndex<L>>(index: I): FieldValue<L, I>;
  set<const I extends FieldIndex<L>>(index: I, value: FieldValue<L, I>): void;
  values(): FieldValues<L>;
  equals(other: Bitpack<L, V>): boolean;
  clone(): Bitpack<L, V>;
  toString(): string;
}

export interface BitpackClass<L extends AnyLayout = AnyLayout, S = StorageType> {
  new (raw?: StorageValueOf<S>): Bitpack<L, StorageValueOf<S>>;
  readonly layout: L;
  readonly storageType: S;
  readonly fieldOffsets: RoArray<number>;
}

export type BitpackOptions<S extends StorageType = never> = Opts<{
  selector: StorageSelector<S>;
  debugAssertions: boolean;
}>;

type FieldValueRepr = number | bigint;

//everything about a field that doesn't depend on the record's current value
interface CompiledField<V> {
  readonly width: number;
  readonly offset: number;
  readonly mask: V;
  readonly clearMask: V;
  readonly shiftedMask: V;
  readonly read: (bits: V) => FieldValueRepr;
  readonly fits: (value: FieldValueRepr) => boolean;
}

function compileField<V>(
  storageType: StorageType<V>,
  preference: StoragePreference,
  width: number,
  offset: number,
): CompiledField<V> {
  const mask = bitmask(storageType, width);
  const shiftedMask = storageType.shl(mask, offset);
  const clearMask = storageType.not(shiftedMask);
  const fieldType = selectStorage(preference, width);
  const base = { width, offset, mask, clearMask, shiftedMask };

  if (fieldType.repr === "bigint") {
    const fieldMask = bitmask(fieldType, width);
    return {
      ...base,
      read: bits => storageType.toBigInt(bits),
      fits: value => typeof value === "bigint" && fieldType.and(value, fieldMask) === value,
    };
  }

  //explicit since fieldType is still a union of uint8, uint16 and uint32 here
  const fieldMask = bitmask<number, number, number>(fieldType, width);
  return {
    ...base,
    read: bits => storageType.toNumber(bits),
    fits: value => typeof value === "number" && fieldType.and(value, fieldMask) === value,
  };
}

function defineBitpack<V>(
  layout: AnyLayout,
  storageType: StorageType<V>,
  debugAssertions: boolean,
) {
  const offsets = fieldOffsets(layout.fieldWidths);
  const fields = layout.fieldWidths.map((width, i) =>
    compileField(storageType, layout.preference, width, offsets[i] ?? 0)
  );
  const zero = storageType.from(0);
  const allOnes = storageType.not(zero);
  const byteSize = Math.ceil(storageType.bits / 8);

  const fieldAt = (index: number) =>
    definedOrThrow(
      fields[index],
      `Field index ${index} out of range for a layout with ${fields.length} fields`,
    );

  return class PackedRecord {
    static readonly layout = layout;
    static readonly storageType = storageType;
    static readonly fieldOffsets: RoArray<number> = offsets;

    storage: V;

    //raw values bypass field boundaries, only bits beyond the storage type are dropped
    constructor(raw?: V) {
      this.storage = raw === undefined ? zero : storageType.and(raw, allOnes);
    }

    get(index: number): FieldValueRepr {
      const field = fieldAt(index);
      return field.read(
        storageType.shr(storageType.and(this.storage, field.shiftedMask), field.offset)
      );
    }

    set(index: number, value: FieldValueRepr): void {
      const field = fieldAt(index);
      if (debugAssertions && !field.fits(value))
        throw new Error(
          `The value ${value} overflows the ${field.width} bit field at index ${index}`
        );

      const bits = storageType.shl(storageType.and(storageType.from(value), field.mask), field.offset);
      this.storage = storageType.or(storageType.and(this.storage, field.clearMask), bits);
    }

    values(): FieldValueRepr[] {
      return fields.map((_, i) => this.get(i));
    }

    equals(other: { readonly storage: V }): boolean {
      return storageType.equals(this.storage, other.storage);
    }

    clone(): PackedRecord {
      return new PackedRecord(this.storage);
    }

    toString(): string {
      return hex.encode(bignum.toBytes(storageType.toBigInt(this.storage), byteSize), true);
    }
  };
}

export function bitpack<const L extends AnyLayout, const S extends StorageType = never>(
  layout: L & CheckStorage<L, S>,
  opts?: BitpackOptions<S>,
): BitpackClass<L, LayoutStorage<L, S>> {
  const storageType = resolveStorage(layout, opts?.selector);
  const debugAssertions = opts?.debugAssertions ?? defaultDebugAssertions;
  //the runtime class works on plain numbers/bigints and ordinals, its typed facade is the
  //  BitpackClass interface, which tsc can't relate to the class itself
  return defineBitpack(layout, storageType, debugAssertions) as any;
}
