import type { LessEqual, Overflow } from "@bitreg/const-utils";
import { bignum, assertNatural, assertAtMost } from "@bitreg/utils";
import type { StoragePreference, AnyLayout } from "./layout.js";
import { maxBitwidth, assertBitwidths, sumBitwidths } from "./layout.js";

//The operations an unsigned integer representation must support to back a layout.
//
//All operations are modular, i.e. results are truncated to `bits` bits, just like fixed width
//  unsigned integers behave. `from` also serves to convert enum ordinals and field values.
export interface StorageType<V = unknown, N extends string = string, B extends number = number> {
  readonly name: N;
  readonly bits: B;
  from(value: number | bigint): V;
  toNumber(value: V): number;
  toBigInt(value: V): bigint;
  equals(lhs: V, rhs: V): boolean;
  and(lhs: V, rhs: V): V;
  or(lhs: V, rhs: V): V;
  not(value: V): V;
  shl(value: V, shift: number): V;
  shr(value: V, shift: number): V;
  add(lhs: V, rhs: V): V;
}

export type StorageValueOf<S> = S extends StorageType<infer V> ? V : never;

export interface NumberStorageType<N extends string = string, B extends number = number>
  extends StorageType<number, N, B> {
  readonly repr: "number";
}

export interface BigintStorageType<N extends string = string, B extends number = number>
  extends StorageType<bigint, N, B> {
  readonly repr: "bigint";
}

const numberStorage = <const N extends string, const B extends 8 | 16 | 32>(
  name: N,
  bits: B,
): NumberStorageType<N, B> => {
  //bitwise operators yield signed 32 bit integers, `>>> 0` turns them back into unsigned ones
  const wrap = bits === 32
    ? (value: number) => value >>> 0
    : (value: number) => value & (2 ** bits - 1);

  return {
    repr: "number",
    name,
    bits,
    from: value =>
      typeof value === "bigint" ? Number(BigInt.asUintN(bits, value)) : wrap(value),
    toNumber: value => value,
    toBigInt: value => BigInt(value),
    equals: (lhs, rhs) => lhs === rhs,
    and: (lhs, rhs) => wrap(lhs & rhs),
    or:  (lhs, rhs) => wrap(lhs | rhs),
    not: value => wrap(~value),
    //shift counts are taken mod 32 by the language, so full width shifts need special casing
    shl: (value, shift) => shift >= bits ? 0 : wrap(value << shift),
    shr: (value, shift) => shift >= bits ? 0 : value >>> shift,
    add: (lhs, rhs) => wrap(lhs + rhs),
  };
};

const bigintStorage = <const N extends string, const B extends number>(
  name: N,
  bits: B,
): BigintStorageType<N, B> => {
  const wrap = (value: bigint) => BigInt.asUintN(bits, value);
  //NaN and infinities become 0, like they do under `>>> 0` for number storage
  const fromNumber = (value: number) =>
    Number.isFinite(value) ? BigInt(Math.trunc(value)) : 0n;

  return {
    repr: "bigint",
    name,
    bits,
    from: value => wrap(typeof value === "bigint" ? value : fromNumber(value)),
    toNumber: value => bignum.toNumber(value),
    toBigInt: value => value,
    equals: (lhs, rhs) => lhs === rhs,
    and: (lhs, rhs) => lhs & rhs,
    or:  (lhs, rhs) => lhs | rhs,
    not: value => wrap(~value),
    shl: (value, shift) => shift >= bits ? 0n : wrap(value << BigInt(shift)),
    shr: (value, shift) => value >> BigInt(shift),
    add: (lhs, rhs) => wrap(lhs + rhs),
  };
};

export const uint8  = numberStorage("uint8",  8);
export const uint16 = numberStorage("uint16", 16);
export const uint32 = numberStorage("uint32", 32);
export const uint64 = bigintStorage("uint64", 64);

export type DefaultStorageType = typeof uint8 | typeof uint16 | typeof uint32 | typeof uint64;

//smallest type with at least N bits (cf. uint_leastN_t)
export const leastStorage = { 8: uint8, 16: uint16, 32: uint32, 64: uint64 } as const;
//fastest type with at least N bits (cf. uint_fastN_t)
//bitwise operators work on 32 bit integers, hence uint32 for everything up to 32 bits
export const fastStorage = { 8: uint32, 16: uint32, 32: uint32, 64: uint64 } as const;

export type StorageClass = keyof typeof leastStorage;
const storageClasses = [8, 16, 32, 64] as const satisfies readonly StorageClass[];

type PreferredStorage<P extends StoragePreference> =
  P extends "fast" ? typeof fastStorage : typeof leastStorage;

export const unsupportedBitwidth = "storage beyond 64 bits unsupported";
export type UnsupportedBitwidth = typeof unsupportedBitwidth;

export const insufficientStorage = "storage type is not able to store enough bits";
export type InsufficientStorage = typeof insufficientStorage;

export type DefaultStorage<P extends StoragePreference, W extends number> =
  W extends Overflow
  ? UnsupportedBitwidth
  : number extends W
  ? PreferredStorage<P>[StorageClass]
  : LessEqual<W, 8> extends true
  ? PreferredStorage<P>[8]
  : LessEqual<W, 16> extends true
  ? PreferredStorage<P>[16]
  : LessEqual<W, 32> extends true
  ? PreferredStorage<P>[32]
  : LessEqual<W, 64> extends true
  ? PreferredStorage<P>[64]
  : UnsupportedBitwidth;

export type SupportedBitwidth<P extends StoragePreference, W extends number> =
  DefaultStorage<P, W> extends UnsupportedBitwidth ? UnsupportedBitwidth : W;

//a total bit width of 0 is treated like any other width that fits into 8 bits
export function selectStorage<const P extends StoragePreference, const W extends number>(
  preference: P,
  totalBitwidth: SupportedBitwidth<P, W>,
): DefaultStorage<P, W> {
  assertNatural(totalBitwidth, "Total bit width");
  const storageClass = storageClasses.find(bits => totalBitwidth <= bits);
  if (storageClass === undefined)
    throw new Error(unsupportedBitwidth);

  const table = preference === "fast" ? fastStorage : leastStorage;
  //tsc can't follow the conditional return type through the lookup
  return table[storageClass] as any;
}

export type StorageSelector<S extends StorageType = StorageType> =
  (preference: StoragePreference, totalBitwidth: number) => S;

export const defaultStorageSelector: StorageSelector<DefaultStorageType> =
  (preference, totalBitwidth) => selectStorage(preference, totalBitwidth);

//storage of a layout, given the selector (never meaning the default one)
export type LayoutStorage<L extends AnyLayout, S = never> =
  [S] extends [never] ? DefaultStorage<L["preference"], L["totalBitwidth"]> : S;

export type CheckStorage<L extends AnyLayout, S = never> =
  L["totalBitwidth"] extends Overflow
  ? UnsupportedBitwidth
  : [S] extends [never]
  ? unknown
  : S extends StorageType<unknown, string, infer B extends number>
  ? LessEqual<L["totalBitwidth"], B> extends false ? InsufficientStorage : unknown
  : unknown;

export type LayoutTraits<L extends AnyLayout, S = never> = {
  readonly totalBitwidth: L["totalBitwidth"];
  readonly storageType: LayoutStorage<L, S>;
};

export const resolveStorage = (layout: AnyLayout, selector?: StorageSelector): StorageType => {
  assertBitwidths(layout.fieldWidths);
  const totalBitwidth = sumBitwidths(layout.fieldWidths);
  assertAtMost(totalBitwidth, maxBitwidth, unsupportedBitwidth);

  const storageType = (selector ?? defaultStorageSelector)(layout.preference, totalBitwidth);
  assertAtMost(totalBitwidth, storageType.bits,
    `${insufficientStorage}: ${storageType.name} has ${storageType.bits} bits, ` +
    `layout needs ${totalBitwidth}`
  );
  return storageType;
};

export function layoutTraits<const L extends AnyLayout, const S extends StorageType = never>(
  layout: L & CheckStorage<L, S>,
  selector?: StorageSelector<S>,
): LayoutTraits<L, S> {
  const storageType = resolveStorage(layout, selector);
  //see above
  return { totalBitwidth: layout.totalBitwidth, storageType } as any;
}
